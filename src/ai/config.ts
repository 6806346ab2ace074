export type AiProvider = 'openai' | 'anthropic' | 'mock';

export const DEFAULT_MODELS: Record<Exclude<AiProvider, 'mock'>, { chat: string; translation: string }> = {
  openai: { chat: 'gpt-4o', translation: 'gpt-4o-mini' },
  anthropic: { chat: 'claude-3-5-sonnet-latest', translation: 'claude-3-5-haiku-latest' },
};

export interface AiConfig {
  provider: AiProvider;
  model: string;
  /**
   * 일부 최신 모델/엔드포인트는 temperature를 무시/제약할 수 있어 선택 사항으로 둡니다.
   * (값이 없으면 클라이언트에 temperature를 전달하지 않습니다.)
   */
  temperature?: number;
  openaiApiKey?: string;
  anthropicApiKey?: string;
}

export interface PipelineConfig {
  /** 정렬 응답 재시도 횟수 (총 호출 수 = maxRetries + 1) */
  maxRetries: number;
  /** 백엔드 호출 1회당 타임아웃 */
  requestTimeoutMs: number;
  /** 동시에 처리할 페이지 수 (0 = 전체 페이지 동시) */
  concurrency: number;
  failFast: boolean;
  diagnosticsDir: string;
  boxWidth: number;
}

export type Env = Record<string, string | undefined>;

function getEnvString(env: Env, key: string): string | undefined {
  const v = env[key];
  return typeof v === 'string' && v.trim().length > 0 ? v.trim() : undefined;
}

function getEnvNumber(env: Env, key: string, fallback: number): number {
  const raw = getEnvString(env, key);
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

function getEnvOptionalNumber(env: Env, key: string): number | undefined {
  const raw = getEnvString(env, key);
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

function getEnvBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = getEnvString(env, key)?.toLowerCase();
  if (!raw) return fallback;
  return raw === '1' || raw === 'true' || raw === 'yes';
}

function parseProvider(raw: string | undefined): AiProvider {
  if (raw === 'anthropic' || raw === 'mock' || raw === 'openai') return raw;
  if (raw) {
    throw new Error(`Unknown PAGE_TRANSLATOR_PROVIDER "${raw}" (expected openai, anthropic or mock).`);
  }
  return 'openai';
}

export function getAiConfig(
  options?: { useFor?: 'translation' | 'chat' | undefined; env?: Env | undefined }
): AiConfig {
  const env = options?.env ?? process.env;
  const provider = parseProvider(getEnvString(env, 'PAGE_TRANSLATOR_PROVIDER'));

  // 용도에 따른 모델 선택 (번역은 가벼운 모델, 정렬은 chat 모델)
  const useFor = options?.useFor ?? 'chat';
  const defaults = DEFAULT_MODELS[provider === 'mock' ? 'openai' : provider];
  const model =
    useFor === 'translation'
      ? getEnvString(env, 'PAGE_TRANSLATOR_TRANSLATION_MODEL') ?? defaults.translation
      : getEnvString(env, 'PAGE_TRANSLATOR_MODEL') ?? defaults.chat;

  const openaiApiKey = getEnvString(env, 'OPENAI_API_KEY');
  const anthropicApiKey = getEnvString(env, 'ANTHROPIC_API_KEY');
  const temperature = getEnvOptionalNumber(env, 'PAGE_TRANSLATOR_TEMPERATURE');

  // exactOptionalPropertyTypes 대응: undefined 값은 프로퍼티 자체를 생략
  return {
    provider,
    model,
    ...(temperature !== undefined ? { temperature } : {}),
    ...(openaiApiKey ? { openaiApiKey } : {}),
    ...(anthropicApiKey ? { anthropicApiKey } : {}),
  };
}

export function getPipelineConfig(env: Env = process.env): PipelineConfig {
  return {
    maxRetries: Math.max(0, Math.floor(getEnvNumber(env, 'PAGE_TRANSLATOR_MAX_RETRIES', 2))),
    requestTimeoutMs: Math.max(1000, getEnvNumber(env, 'PAGE_TRANSLATOR_REQUEST_TIMEOUT_MS', 120_000)),
    concurrency: Math.max(0, Math.floor(getEnvNumber(env, 'PAGE_TRANSLATOR_CONCURRENCY', 0))),
    failFast: getEnvBoolean(env, 'PAGE_TRANSLATOR_FAIL_FAST', false),
    diagnosticsDir: getEnvString(env, 'PAGE_TRANSLATOR_DIAGNOSTICS_DIR') ?? 'debug_logs',
    // 60 미만이면 sink가 터미널 폭을 사용
    boxWidth: Math.floor(getEnvNumber(env, 'PAGE_TRANSLATOR_BOX_WIDTH', 80)),
  };
}
