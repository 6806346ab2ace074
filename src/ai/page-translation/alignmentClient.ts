/**
 * LLM 정렬 클라이언트
 *
 * 상태: ATTEMPT(0..maxRetries) → SUCCESS | EXHAUSTED
 * - ATTEMPT(0): 전체 지시 + 요청 JSON
 * - ATTEMPT(n>=1): 같은 세션에 짧은 교정 지시
 * - 호출 실패/타임아웃도 시도 1회로 계산
 * - 페이지당 chat 호출은 최대 maxRetries + 1회
 * - 응답 산출물 기록 실패는 경고로만 남김
 */

import { withTimeout } from '@/ai/retry';
import type { DiagnosticsSink } from '@/utils/diagnostics';
import { estimateTokens } from '@/utils/tokenCounter';
import { AlignmentExhaustedError, MalformedAlignmentResponseError, PipelineAbortedError } from './errors';
import { buildAlignmentPrompt, CORRECTIVE_PROMPT } from './prompt';
import { parseAlignmentResponse } from './responseParser';
import type { ChatBackend, ChatSession, TranslationRequest, TranslationResponse } from './types';

export interface AlignmentSuccess {
  response: TranslationResponse;
  /** 성공까지 사용한 chat 호출 수 (1부터) */
  attempts: number;
  session: ChatSession;
  raw: string;
}

export interface AlignmentClientOptions {
  chat: ChatBackend;
  sink: DiagnosticsSink;
  maxRetries: number;
  requestTimeoutMs: number;
  languages?: { source: string; target: string } | undefined;
}

export function responseArtifactName(pageNumber: number): string {
  return `translated_page_${pageNumber}.json`;
}

export class AlignmentClient {
  constructor(private readonly options: AlignmentClientOptions) {}

  get maxAttempts(): number {
    return Math.max(0, this.options.maxRetries) + 1;
  }

  async align(
    request: TranslationRequest,
    options?: {
      signal?: AbortSignal | undefined;
      onAttempt?: ((attempt: number) => void) | undefined;
    }
  ): Promise<AlignmentSuccess> {
    const { chat, sink, requestTimeoutMs, languages } = this.options;
    const pageNumber = request.page_number;
    const group = `page_${pageNumber}`;
    const signal = options?.signal;

    let session: ChatSession = null;
    // 한 번이라도 응답을 받았으면 모델이 요청을 알고 있으므로 교정 지시만 보낸다
    let hasExchange = false;
    let lastRaw = '';
    let lastFailure: MalformedAlignmentResponseError | null = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (signal?.aborted) {
        throw new PipelineAbortedError(pageNumber);
      }
      options?.onAttempt?.(attempt);

      const prompt = hasExchange ? CORRECTIVE_PROMPT : buildAlignmentPrompt(request, languages);
      sink.addMessage(
        group,
        `Alignment attempt ${attempt}/${this.maxAttempts}: ${hasExchange ? 'corrective' : 'full'} prompt, ~${estimateTokens(prompt)} tokens`
      );

      const startedAt = Date.now();
      let text: string;
      try {
        const exchange = await withTimeout(
          (callSignal) => chat.chat(prompt, session, { signal: callSignal }),
          requestTimeoutMs,
          signal
        );
        session = exchange.session;
        text = exchange.text;
      } catch (error) {
        if (signal?.aborted) {
          throw new PipelineAbortedError(pageNumber);
        }
        const detail = error instanceof Error ? error.message : String(error);
        lastFailure = new MalformedAlignmentResponseError('transport', `Chat call failed: ${detail}`, lastRaw);
        sink.addMessage(group, `Attempt ${attempt} failed after ${Date.now() - startedAt}ms: ${lastFailure.message}`);
        continue;
      }

      hasExchange = true;
      lastRaw = text;
      sink.addMessage(
        group,
        `Attempt ${attempt} answered in ${Date.now() - startedAt}ms, ~${estimateTokens(text)} tokens`
      );

      let response: TranslationResponse;
      try {
        response = parseAlignmentResponse(text);
      } catch (error) {
        if (!(error instanceof MalformedAlignmentResponseError)) {
          throw error;
        }
        lastFailure = error;
        sink.addMessage(group, `Attempt ${attempt} rejected (${error.reason}): ${error.message}`);
        continue;
      }

      sink.addMessage(group, `Attempt ${attempt} returned ${response.text_fragments.length} fragment(s)`);
      await this.persistResponse(pageNumber, response);
      return { response, attempts: attempt, session, raw: text };
    }

    throw new AlignmentExhaustedError(
      pageNumber,
      this.maxAttempts,
      lastRaw,
      lastFailure ?? new MalformedAlignmentResponseError('unparsable', 'No response received', lastRaw)
    );
  }

  /**
   * 검증된 응답 기록 (감사용)
   * - 기록 실패는 경고만 남기고 정렬 결과는 그대로 사용
   */
  private async persistResponse(pageNumber: number, response: TranslationResponse): Promise<void> {
    const { sink } = this.options;
    const name = responseArtifactName(pageNumber);
    try {
      await sink.writeArtifact(name, response);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      sink.addMessage(`page_${pageNumber}`, `Could not write ${name}: ${detail}`);
      sink.warn(`Page ${pageNumber}: could not write ${name}: ${detail}`);
    }
  }
}
