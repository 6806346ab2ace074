/**
 * 페이지 1장 번역 파이프라인
 *
 * 단계 (순서 고정, 단계별 소요 시간 기록):
 * 1. extract_full_text   전체 텍스트 추출 + 정규화
 * 2. extract_fragments   조각 추출 + 조각별 정규화 (빈 조각도 자리 유지)
 * 3. extract_paragraphs  문단 추출 (진단용)
 * 4. translate_page      전체 페이지 번역 (정렬 시 참고 문맥)
 * 5. build_request       정렬 요청 생성 + 산출물 저장 (저장 실패 시 페이지 실패)
 * 6. align               LLM 정렬 (내부 재시도)
 * 7. reintegrate         검증 후 원본 조각에 반영
 *
 * 실패한 페이지는 조각이 하나도 바뀌지 않은 상태로 failed 결과를 돌려줍니다.
 */

import { withTimeout } from '@/ai/retry';
import type { DocumentPage } from '@/document/types';
import type { PageProgressStoreApi } from '@/stores/pageProgressStore';
import type { DiagnosticsSink } from '@/utils/diagnostics';
import { normalizeText } from '@/utils/textNormalizer';
import type { AlignmentClient } from './alignmentClient';
import {
  DiagnosticsFailureError,
  ExtractionFailureError,
  isPageFailure,
  PipelineAbortedError,
  TranslationFailureError,
  type PageFailure,
} from './errors';
import { reintegrateFragments } from './reintegrator';
import { buildAndPersistRequest, requestArtifactName } from './requestBuilder';
import type { DetachedFragment, PageOutcome, PageStage, StageTiming, TranslationBackend } from './types';

export interface PagePipelineOptions {
  translator: TranslationBackend;
  aligner: AlignmentClient;
  sink: DiagnosticsSink;
  sourceLanguage: string;
  targetLanguage: string;
  /** 전체 페이지 번역 호출 1회당 타임아웃 */
  requestTimeoutMs: number;
  store?: PageProgressStoreApi | undefined;
}

type ExtractionStage = 'extract_full_text' | 'extract_fragments' | 'extract_paragraphs';

export class PagePipeline {
  constructor(private readonly options: PagePipelineOptions) {}

  async runPage(page: DocumentPage, runOptions?: { signal?: AbortSignal | undefined }): Promise<PageOutcome> {
    const { translator, aligner, sink, sourceLanguage, targetLanguage, requestTimeoutMs, store } = this.options;
    const pageNumber = page.pageNumber;
    const group = `page_${pageNumber}`;
    const signal = runOptions?.signal;
    const timings: StageTiming[] = [];

    const runStage = async <T>(
      stage: PageStage,
      fn: () => Promise<T>,
      wrap?: (error: unknown) => PageFailure
    ): Promise<T> => {
      if (signal?.aborted) {
        throw new PipelineAbortedError(pageNumber);
      }
      store?.getState().setStage(pageNumber, stage);
      const startedAt = Date.now();
      try {
        return await fn();
      } catch (error) {
        if (isPageFailure(error)) throw error;
        if (signal?.aborted) throw new PipelineAbortedError(pageNumber);
        throw wrap ? wrap(error) : error;
      } finally {
        const durationMs = Date.now() - startedAt;
        timings.push({ stage, durationMs });
        sink.addMessage(group, `[${stage}] ${durationMs}ms`);
      }
    };

    const extraction = (stage: ExtractionStage) => (error: unknown) =>
      new ExtractionFailureError(pageNumber, stage, error);

    store?.getState().markStarted(pageNumber);
    sink.addMessage(group, `Page ${pageNumber}: ${sourceLanguage} -> ${targetLanguage}`);

    try {
      const fullText = await runStage(
        'extract_full_text',
        async () => normalizeText(await page.extractFullText()),
        extraction('extract_full_text')
      );

      const originals = await runStage('extract_fragments', () => page.extractFragments(), extraction('extract_fragments'));
      const detached: DetachedFragment[] = originals.map((fragment, index) => ({
        index,
        text: normalizeText(fragment.text),
      }));

      const paragraphs = await runStage(
        'extract_paragraphs',
        () => page.extractParagraphs(),
        extraction('extract_paragraphs')
      );
      sink.addMessage(
        group,
        `Extracted ${fullText.length} chars, ${detached.length} fragment(s), ${paragraphs.length} paragraph(s)`
      );

      // 써 넣을 텍스트가 없으면 백엔드 호출 없이 완료
      if (detached.every((fragment) => fragment.text.length === 0)) {
        sink.addMessage(group, 'No translatable fragments, page left as is');
        return this.succeed(pageNumber, 0, detached.length, timings);
      }

      const translatedFullText = await runStage(
        'translate_page',
        () =>
          withTimeout(
            (callSignal) => translator.translate(fullText, sourceLanguage, targetLanguage, { signal: callSignal }),
            requestTimeoutMs,
            signal
          ),
        (error) => new TranslationFailureError(pageNumber, error)
      );

      const request = await runStage(
        'build_request',
        () => buildAndPersistRequest(sink, pageNumber, fullText, translatedFullText, detached),
        (error) => new DiagnosticsFailureError(pageNumber, requestArtifactName(pageNumber), error)
      );

      const alignment = await runStage('align', () =>
        aligner.align(request, {
          signal,
          onAttempt: (attempt) => store?.getState().recordAttempt(pageNumber, attempt),
        })
      );

      const { changed, emptied } = await runStage('reintegrate', async () =>
        reintegrateFragments(pageNumber, originals, detached, alignment.response.text_fragments)
      );
      sink.addMessage(group, `Replaced ${changed} of ${detached.length} fragment(s)`);
      if (emptied.length > 0) {
        sink.addMessage(group, `Fragment(s) ${emptied.join(', ')} left empty by the alignment`);
        sink.warn(`Page ${pageNumber}: fragment(s) ${emptied.join(', ')} left empty by the alignment`);
      }

      return this.succeed(pageNumber, alignment.attempts, detached.length, timings);
    } catch (error) {
      if (!isPageFailure(error)) {
        sink.flushGroup(group, { color: 'red' });
        throw error;
      }
      store?.getState().markFailed(pageNumber, error.kind, error.message);
      sink.addMessage(group, `FAILED (${error.kind}): ${error.message}`);
      sink.flushGroup(group, { color: 'red', title: `Page ${pageNumber} failed` });
      return { status: 'failed', pageNumber, error, timings };
    }
  }

  private succeed(pageNumber: number, attempts: number, fragmentCount: number, timings: StageTiming[]): PageOutcome {
    const { sink, store } = this.options;
    const total = timings.reduce((sum, timing) => sum + timing.durationMs, 0);
    sink.addMessage(`page_${pageNumber}`, `Done in ${total}ms (${attempts} alignment attempt(s))`);
    sink.flushGroup(`page_${pageNumber}`, { color: 'green', title: `Page ${pageNumber} translated` });
    store?.getState().markDone(pageNumber);
    return { status: 'success', pageNumber, attempts, fragmentCount, timings };
  }
}
