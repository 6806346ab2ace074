/**
 * 정렬 응답 파싱
 *
 * 백엔드 응답은 신뢰할 수 없는 텍스트입니다. 순서대로 검사합니다:
 * 1. 리터럴 \uXXXX 복원
 * 2. 코드펜스 제거 + 첫 번째 JSON 오브젝트 추출 → JSON.parse (unparsable)
 * 3. text_fragments 배열 존재 (missing_fragments)
 * 4. 항목별 스키마 검증 (invalid_fragments)
 */

import { z } from 'zod';
import { decodeUnicodeEscapes } from '@/utils/textNormalizer';
import { MalformedAlignmentResponseError } from './errors';
import type { TranslationResponse } from './types';

const ResponseTextFragmentSchema = z.object({
  fragment_index: z.number().int().nonnegative().optional(),
  original_text_fragment: z.string(),
  translated_text_fragment: z.string(),
});

const TextFragmentsSchema = z.array(ResponseTextFragmentSchema);

/**
 * 문자열 리터럴 안의 중괄호는 무시하고, 첫 번째로 닫히는 오브젝트만 잘라낸다
 */
export function extractFirstJsonObject(raw: string): string | null {
  let inString = false;
  let escaped = false;
  let depth = 0;
  let start = -1;

  for (let i = 0; i < raw.length; i += 1) {
    const ch = raw[i];
    if (escaped) {
      escaped = false;
      continue;
    }
    if (ch === '\\') {
      escaped = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;
    if (ch === '{') {
      if (depth === 0) start = i;
      depth += 1;
    } else if (ch === '}' && depth > 0) {
      depth -= 1;
      if (depth === 0 && start !== -1) {
        return raw.slice(start, i + 1);
      }
    }
  }

  return null;
}

export function extractJsonObject(raw: string): string {
  let t = raw.trim();
  // 흔한 케이스: ```json ... ```
  t = t.replace(/^```(?:json)?\s*/i, '').replace(/```$/i, '').trim();

  const balanced = extractFirstJsonObject(t);
  return balanced ? balanced.trim() : t;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseAlignmentResponse(raw: string): TranslationResponse {
  const candidate = extractJsonObject(decodeUnicodeEscapes(raw));

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new MalformedAlignmentResponseError('unparsable', `Response is not valid JSON: ${detail}`, raw);
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.text_fragments)) {
    throw new MalformedAlignmentResponseError(
      'missing_fragments',
      'Response has no "text_fragments" list',
      raw
    );
  }

  const result = TextFragmentsSchema.safeParse(parsed.text_fragments);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue ? `text_fragments.${issue.path.join('.')}` : 'text_fragments';
    throw new MalformedAlignmentResponseError(
      'invalid_fragments',
      `Invalid entry at ${where}: ${issue?.message ?? 'schema mismatch'}`,
      raw
    );
  }

  return { text_fragments: result.data };
}
