/**
 * 페이지 단위 번역 파이프라인 타입 정의
 *
 * 페이지 전체 텍스트와 텍스트 조각(fragment)을 추출하고,
 * LLM이 조각별 번역을 정렬(alignment)해 돌려주면 원래 위치에 다시 써 넣습니다.
 */

import type { PageFailure } from './errors';

// ============================================
// Fragment
// ============================================

/**
 * 문서 엔진이 소유하는 원본 조각
 * - text만 변경 가능하며, 나머지 속성(위치/서식)은 엔진이 관리
 */
export interface EngineFragment {
  text: string;
}

/**
 * 요청/응답 구성용으로 분리된 조각 사본
 * index는 추출 순서이며 요청과 응답을 잇는 식별자로도 쓰입니다.
 */
export interface DetachedFragment {
  index: number;
  text: string;
}

// ============================================
// LLM 요청/응답 (wire 구조)
// ============================================

export interface RequestTextFragment {
  fragment_index: number;
  original_text_fragment: string;
  /** LLM이 채워야 하는 자리 (항상 빈 문자열로 시작) */
  translated_text_fragment: string;
}

export interface TranslationRequest {
  page_number: number;
  page_context: {
    original: string;
    translated: string;
  };
  text_fragments: RequestTextFragment[];
}

export interface ResponseTextFragment {
  fragment_index?: number | undefined;
  original_text_fragment: string;
  translated_text_fragment: string;
}

export interface TranslationResponse {
  text_fragments: ResponseTextFragment[];
}

// ============================================
// 외부 백엔드 계약
// ============================================

/**
 * 대화 세션 (백엔드별로 불투명한 값)
 * - 첫 시도에서는 null, 이후에는 직전 교환에서 돌려받은 값을 그대로 넘깁니다.
 */
export type ChatSession = unknown;

export interface ChatExchange {
  text: string;
  session: ChatSession;
}

export interface ChatBackend {
  chat(prompt: string, session: ChatSession, options?: { signal?: AbortSignal | undefined }): Promise<ChatExchange>;
}

export interface TranslationBackend {
  translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string,
    options?: { signal?: AbortSignal | undefined }
  ): Promise<string>;
}

// ============================================
// 실행 결과
// ============================================

export type PageStage =
  | 'extract_full_text'
  | 'extract_fragments'
  | 'extract_paragraphs'
  | 'translate_page'
  | 'build_request'
  | 'align'
  | 'reintegrate';

export interface StageTiming {
  stage: PageStage;
  durationMs: number;
}

export type PageOutcome =
  | {
      status: 'success';
      pageNumber: number;
      attempts: number;
      fragmentCount: number;
      timings: StageTiming[];
    }
  | {
      status: 'failed';
      pageNumber: number;
      error: PageFailure;
      timings: StageTiming[];
    };

export type FailedPageOutcome = Extract<PageOutcome, { status: 'failed' }>;

export interface RunReport {
  totalPages: number;
  /** 성공한 페이지 번호 (오름차순) */
  succeeded: number[];
  /** 실패한 페이지 결과 (페이지 번호 오름차순) */
  failed: FailedPageOutcome[];
  /** 건너뛴 페이지 번호 (fail-fast 중단 시) */
  skipped: number[];
  saved: boolean;
  outputPath: string;
}
