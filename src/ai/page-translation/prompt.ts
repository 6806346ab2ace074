import type { TranslationRequest } from './types';

/** 프롬프트에서 요청 JSON이 시작되는 위치 표시 */
export const INPUT_MARKER = '=== INPUT ===';

/**
 * 정렬(alignment) 첫 시도용 프롬프트
 * - 규칙 + 직렬화된 요청 JSON
 */
export function buildAlignmentPrompt(
  request: TranslationRequest,
  languages?: { source: string; target: string } | undefined
): string {
  const lines: string[] = [
    'You are given the full text of one document page, its complete translation,',
    'and the list of text fragments the page was split into.',
  ];

  if (languages) {
    lines.push(`The page is translated from ${languages.source} to ${languages.target}.`);
  }

  lines.push(
    '',
    '=== TASK ===',
    'Fill in "translated_text_fragment" for every entry of "text_fragments",',
    'taking the wording from "page_context.translated" so the fragments read as that translation.',
    '',
    '=== RULES ===',
    '- Keep EVERY entry, in the SAME order, with the SAME "fragment_index".',
    '- Copy "original_text_fragment" exactly as given. Never edit it.',
    '- Do not add, merge, split or drop entries.',
    '- If a fragment has no counterpart in the translation, translate it on its own.',
    '- An empty "original_text_fragment" gets an empty "translated_text_fragment".',
    '',
    '=== OUTPUT FORMAT ===',
    'Return ONLY a JSON object of the form:',
    '{"text_fragments": [{"fragment_index": 0, "original_text_fragment": "...", "translated_text_fragment": "..."}]}',
    'No markdown, no code fences, no explanations.',
    '',
    INPUT_MARKER,
    JSON.stringify(request, null, 2)
  );

  return lines.join('\n');
}

/**
 * 재시도(n >= 1)용 짧은 교정 지시
 * 같은 세션에서 보내므로 직전 요청/응답은 대화 이력에 이미 있습니다.
 */
export const CORRECTIVE_PROMPT = [
  'The structure of your previous answer is incomplete or wrong. Correct it.',
  'Answer again with ONLY the JSON object {"text_fragments": [...]},',
  'one entry per fragment of the input, same order, same "fragment_index",',
  'and "original_text_fragment" copied exactly.',
].join('\n');
