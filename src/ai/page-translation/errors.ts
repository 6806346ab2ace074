/**
 * 페이지 번역 파이프라인 에러 분류
 *
 * 모든 에러는 kind로 구분되며, 스케줄러는 kind를 보고
 * 페이지 단위 실패인지 실행 전체 실패인지 판단합니다.
 */

export type PageErrorKind =
  | 'extraction_failure'
  | 'translation_failure'
  | 'malformed_alignment_response'
  | 'alignment_exhausted'
  | 'fragment_mismatch'
  | 'diagnostics_failure'
  | 'aborted';

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class ExtractionFailureError extends Error {
  readonly kind = 'extraction_failure' as const;

  constructor(
    readonly pageNumber: number,
    readonly stage: 'extract_full_text' | 'extract_fragments' | 'extract_paragraphs',
    cause: unknown
  ) {
    super(`Page ${pageNumber}: ${stage} failed: ${describeCause(cause)}`, { cause });
    this.name = 'ExtractionFailureError';
  }
}

export class TranslationFailureError extends Error {
  readonly kind = 'translation_failure' as const;

  constructor(readonly pageNumber: number, cause: unknown) {
    super(`Page ${pageNumber}: page translation failed: ${describeCause(cause)}`, { cause });
    this.name = 'TranslationFailureError';
  }
}

export type MalformedReason = 'unparsable' | 'missing_fragments' | 'invalid_fragments' | 'transport';

/**
 * 한 번의 시도에서 받은 응답이 구조적으로 잘못된 경우
 * - 재시도 루프 안에서만 쓰이고, 예산을 다 쓰면 AlignmentExhaustedError로 바뀝니다.
 */
export class MalformedAlignmentResponseError extends Error {
  readonly kind = 'malformed_alignment_response' as const;

  constructor(
    readonly reason: MalformedReason,
    message: string,
    readonly raw: string
  ) {
    super(message);
    this.name = 'MalformedAlignmentResponseError';
  }
}

export class AlignmentExhaustedError extends Error {
  readonly kind = 'alignment_exhausted' as const;

  constructor(
    readonly pageNumber: number,
    readonly attempts: number,
    /** 마지막 응답 원문 (진단용, 가공하지 않음) */
    readonly lastRaw: string,
    readonly lastFailure: MalformedAlignmentResponseError
  ) {
    super(
      `Page ${pageNumber}: no valid alignment after ${attempts} attempt(s) (${lastFailure.reason}: ${lastFailure.message})`
    );
    this.name = 'AlignmentExhaustedError';
  }
}

export type FragmentMismatchKind = 'count' | 'identifier' | 'text';

export class FragmentMismatchError extends Error {
  readonly kind = 'fragment_mismatch' as const;

  constructor(
    readonly pageNumber: number,
    readonly mismatch: FragmentMismatchKind,
    message: string,
    /** 문제가 된 조각 인덱스 (count 불일치에서는 없음) */
    readonly fragmentIndex?: number | undefined
  ) {
    super(`Page ${pageNumber}: ${message}`);
    this.name = 'FragmentMismatchError';
  }
}

/**
 * 진단 산출물(요청 JSON)을 남기지 못한 경우
 * - 요청은 저장된 뒤에만 전송하므로 해당 페이지만 실패 처리
 */
export class DiagnosticsFailureError extends Error {
  readonly kind = 'diagnostics_failure' as const;

  constructor(readonly pageNumber: number, readonly artifact: string, cause: unknown) {
    super(`Page ${pageNumber}: could not write ${artifact}: ${describeCause(cause)}`, { cause });
    this.name = 'DiagnosticsFailureError';
  }
}

export class PipelineAbortedError extends Error {
  readonly kind = 'aborted' as const;

  constructor(readonly pageNumber: number) {
    super(`Page ${pageNumber}: cancelled before completion`);
    this.name = 'PipelineAbortedError';
  }
}

/**
 * 페이지 한 장의 최종 실패 사유
 */
export type PageFailure =
  | ExtractionFailureError
  | TranslationFailureError
  | AlignmentExhaustedError
  | FragmentMismatchError
  | DiagnosticsFailureError
  | PipelineAbortedError;

export function isPageFailure(error: unknown): error is PageFailure {
  return (
    error instanceof ExtractionFailureError ||
    error instanceof TranslationFailureError ||
    error instanceof AlignmentExhaustedError ||
    error instanceof FragmentMismatchError ||
    error instanceof DiagnosticsFailureError ||
    error instanceof PipelineAbortedError
  );
}

// ============================================
// 실행 전체 실패
// ============================================

export class PersistenceFailureError extends Error {
  readonly kind = 'persistence_failure' as const;

  constructor(readonly outputPath: string, cause: unknown) {
    super(`Failed to save translated document to ${outputPath}: ${describeCause(cause)}`, { cause });
    this.name = 'PersistenceFailureError';
  }
}

export class PageRunFailedError extends Error {
  readonly kind = 'page_run_failed' as const;

  constructor(readonly failures: PageFailure[]) {
    super(
      [
        `${failures.length} page(s) failed:`,
        ...failures.map((f) => `- ${f.message}`),
      ].join('\n')
    );
    this.name = 'PageRunFailedError';
  }
}
