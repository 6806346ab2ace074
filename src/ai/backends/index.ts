import { createChatModel } from '@/ai/client';
import { getAiConfig, type Env } from '@/ai/config';
import type { RetryConfig } from '@/ai/retry';
import type { ChatBackend, TranslationBackend } from '@/ai/page-translation/types';
import type { DiagnosticsSink } from '@/utils/diagnostics';
import { LangChainChatBackend, LangChainTranslationBackend } from './langchain';
import { MockChatBackend, MockTranslationBackend, type MockTranslateFn } from './mock';

export interface Backends {
  translator: TranslationBackend;
  chat: ChatBackend;
}

// mock provider: 번역 대상 언어 태그만 붙인다
const tagWithTarget: MockTranslateFn = (text, _source, target) => `[${target}] ${text}`;

/**
 * 설정된 provider에 맞는 번역/정렬 백엔드 생성
 */
export function createBackends(options: {
  sourceLanguage: string;
  targetLanguage: string;
  sink?: DiagnosticsSink | undefined;
  env?: Env | undefined;
}): Backends {
  const chatConfig = getAiConfig({ useFor: 'chat', env: options.env });

  if (chatConfig.provider === 'mock') {
    return {
      translator: new MockTranslationBackend(tagWithTarget),
      chat: new MockChatBackend(tagWithTarget, { source: options.sourceLanguage, target: options.targetLanguage }),
    };
  }

  const sink = options.sink;
  const retry: Partial<RetryConfig> = sink
    ? {
        onRetry: (attempt, error, delayMs) =>
          sink.warn(
            `Retry ${attempt} in ${Math.round(delayMs)}ms: ${error instanceof Error ? error.message : String(error)}`
          ),
      }
    : {};

  const translationConfig = getAiConfig({ useFor: 'translation', env: options.env });
  return {
    translator: new LangChainTranslationBackend(createChatModel(translationConfig), { retry }),
    chat: new LangChainChatBackend(createChatModel(chatConfig), { retry }),
  };
}
