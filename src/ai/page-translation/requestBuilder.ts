import type { DiagnosticsSink } from '@/utils/diagnostics';
import type { DetachedFragment, TranslationRequest } from './types';

export function requestArtifactName(pageNumber: number): string {
  return `page_data_json_${pageNumber}_data.json`;
}

/**
 * 정렬 요청 구조 생성
 * - 조각 순서/개수를 그대로 유지 (i번째 항목 = i번째 조각)
 * - translated_text_fragment는 항상 빈 문자열
 */
export function buildTranslationRequest(
  pageNumber: number,
  originalFullText: string,
  translatedFullText: string,
  fragments: DetachedFragment[]
): TranslationRequest {
  return {
    page_number: pageNumber,
    page_context: {
      original: originalFullText,
      translated: translatedFullText,
    },
    text_fragments: fragments.map((fragment) => ({
      fragment_index: fragment.index,
      original_text_fragment: fragment.text,
      translated_text_fragment: '',
    })),
  };
}

/**
 * 요청을 만들고 보내기 전에 산출물로 남긴다
 */
export async function buildAndPersistRequest(
  sink: DiagnosticsSink,
  pageNumber: number,
  originalFullText: string,
  translatedFullText: string,
  fragments: DetachedFragment[]
): Promise<TranslationRequest> {
  const request = buildTranslationRequest(pageNumber, originalFullText, translatedFullText, fragments);
  await sink.writeArtifact(requestArtifactName(pageNumber), request);
  return request;
}
