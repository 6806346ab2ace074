/**
 * 페이지 단위 문서 번역
 *
 * 문서를 열고 → 페이지별 파이프라인을 동시에 실행하고 → 모두 끝나면 한 번 저장합니다.
 */

import { createBackends, type Backends } from '@/ai/backends';
import { getPipelineConfig, type Env, type PipelineConfig } from '@/ai/config';
import { AlignmentClient } from '@/ai/page-translation/alignmentClient';
import { PagePipeline } from '@/ai/page-translation/pagePipeline';
import { PageScheduler } from '@/ai/page-translation/pageScheduler';
import type { RunReport } from '@/ai/page-translation/types';
import { pptxDocumentEngine } from '@/document/pptx/pptxDocument';
import type { DocumentEngine } from '@/document/types';
import type { PageProgressStoreApi } from '@/stores/pageProgressStore';
import { BoxDiagnosticsSink, type DiagnosticsSink } from '@/utils/diagnostics';

export interface TranslateDocumentFileOptions {
  inputPath: string;
  outputPath: string;
  sourceLanguage: string;
  targetLanguage: string;
  /** 환경변수 설정을 덮어쓸 값 */
  config?: Partial<PipelineConfig> | undefined;
  engine?: DocumentEngine | undefined;
  backends?: Backends | undefined;
  sink?: DiagnosticsSink | undefined;
  store?: PageProgressStoreApi | undefined;
  env?: Env | undefined;
}

export async function translateDocumentFile(options: TranslateDocumentFileOptions): Promise<RunReport> {
  const { inputPath, outputPath, sourceLanguage, targetLanguage, store } = options;
  const config: PipelineConfig = { ...getPipelineConfig(options.env), ...options.config };
  const sink =
    options.sink ??
    new BoxDiagnosticsSink({ dir: config.diagnosticsDir, boxWidth: config.boxWidth, logFileName: 'page_translation' });
  const backends = options.backends ?? createBackends({ sourceLanguage, targetLanguage, sink, env: options.env });
  const engine = options.engine ?? pptxDocumentEngine;

  sink.info(`Opening ${inputPath}`);
  const document = await engine.openDocument(inputPath);

  const aligner = new AlignmentClient({
    chat: backends.chat,
    sink,
    maxRetries: config.maxRetries,
    requestTimeoutMs: config.requestTimeoutMs,
    languages: { source: sourceLanguage, target: targetLanguage },
  });
  const pipeline = new PagePipeline({
    translator: backends.translator,
    aligner,
    sink,
    store,
    sourceLanguage,
    targetLanguage,
    requestTimeoutMs: config.requestTimeoutMs,
  });
  const scheduler = new PageScheduler({
    pipeline,
    sink,
    store,
    concurrency: config.concurrency,
    failFast: config.failFast,
  });

  return scheduler.processDocument(document, outputPath);
}

export { createBackends } from '@/ai/backends';
export type { Backends } from '@/ai/backends';
export { LangChainChatBackend, LangChainTranslationBackend } from '@/ai/backends/langchain';
export { MockChatBackend, MockTranslationBackend } from '@/ai/backends/mock';
export { getAiConfig, getPipelineConfig } from '@/ai/config';
export type { AiConfig, AiProvider, PipelineConfig } from '@/ai/config';
export { AlignmentClient } from '@/ai/page-translation/alignmentClient';
export type { AlignmentSuccess } from '@/ai/page-translation/alignmentClient';
export * from '@/ai/page-translation/errors';
export { PagePipeline } from '@/ai/page-translation/pagePipeline';
export { PageScheduler } from '@/ai/page-translation/pageScheduler';
export type { PageRunner } from '@/ai/page-translation/pageScheduler';
export { reintegrateFragments } from '@/ai/page-translation/reintegrator';
export type { ReintegrationResult } from '@/ai/page-translation/reintegrator';
export { buildTranslationRequest } from '@/ai/page-translation/requestBuilder';
export { parseAlignmentResponse } from '@/ai/page-translation/responseParser';
export type * from '@/ai/page-translation/types';
export { PptxDocument, pptxDocumentEngine } from '@/document/pptx/pptxDocument';
export type * from '@/document/types';
export { createPageProgressStore } from '@/stores/pageProgressStore';
export type { PageProgress, PageProgressStoreApi, PageStatus } from '@/stores/pageProgressStore';
export { BoxDiagnosticsSink, MemoryDiagnosticsSink } from '@/utils/diagnostics';
export type { DiagnosticsSink } from '@/utils/diagnostics';
export { decodeUnicodeEscapes, normalizeText } from '@/utils/textNormalizer';
export { estimateTokens } from '@/utils/tokenCounter';
