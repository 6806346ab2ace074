/**
 * 정렬 결과를 원본 조각에 다시 써 넣기
 *
 * 모든 쌍을 먼저 검증하고, 하나라도 어긋나면 아무 조각도 바꾸지 않습니다.
 */

import { normalizeText } from '@/utils/textNormalizer';
import { FragmentMismatchError } from './errors';
import type { DetachedFragment, EngineFragment, ResponseTextFragment } from './types';

interface PlannedWrite {
  target: EngineFragment;
  text: string;
}

export interface ReintegrationResult {
  /** 실제로 바뀐 조각 수 */
  changed: number;
  /** 원문은 있는데 번역문이 비어 지워진 조각 인덱스 (번역문이 이웃 조각에 합쳐진 경우 등) */
  emptied: number[];
}

/**
 * 응답 항목을 조각 위치에 대응시킨다
 * - 모든 항목에 fragment_index가 있으면 식별자로, 하나도 없으면 순서로
 */
function pairEntries(
  pageNumber: number,
  fragmentCount: number,
  entries: ResponseTextFragment[]
): Array<ResponseTextFragment | undefined> {
  const withIndex = entries.filter((entry) => entry.fragment_index !== undefined).length;

  if (withIndex === 0) {
    return [...entries];
  }
  if (withIndex !== entries.length) {
    throw new FragmentMismatchError(
      pageNumber,
      'identifier',
      `${entries.length - withIndex} of ${entries.length} response entries have no fragment_index`
    );
  }

  const byIndex: Array<ResponseTextFragment | undefined> = Array.from({ length: fragmentCount }, () => undefined);
  for (const entry of entries) {
    const index = entry.fragment_index ?? -1;
    if (index < 0 || index >= fragmentCount) {
      throw new FragmentMismatchError(pageNumber, 'identifier', `Unknown fragment_index ${index}`, index);
    }
    if (byIndex[index]) {
      throw new FragmentMismatchError(pageNumber, 'identifier', `Duplicate fragment_index ${index}`, index);
    }
    byIndex[index] = entry;
  }
  return byIndex;
}

/**
 * 번역 문장에 원본 조각의 앞뒤 공백을 그대로 붙인다 (run 사이 띄어쓰기 유지)
 */
function withEdgeWhitespace(original: string, translated: string): string {
  const leading = original.match(/^\s*/)?.[0] ?? '';
  const trailing = original.length > leading.length ? (original.match(/\s*$/)?.[0] ?? '') : '';
  return `${leading}${translated.trim()}${trailing}`;
}

/**
 * @param originals 문서 엔진이 소유한 조각 (변경 대상)
 * @param detached 정규화된 사본 (originals와 같은 순서)
 */
export function reintegrateFragments(
  pageNumber: number,
  originals: EngineFragment[],
  detached: DetachedFragment[],
  responseFragments: ResponseTextFragment[]
): ReintegrationResult {
  if (originals.length !== detached.length || responseFragments.length !== detached.length) {
    throw new FragmentMismatchError(
      pageNumber,
      'count',
      `Fragment count mismatch: page has ${detached.length}, response has ${responseFragments.length}`
    );
  }

  const paired = pairEntries(pageNumber, detached.length, responseFragments);

  const writes: PlannedWrite[] = [];
  const emptied: number[] = [];
  for (let i = 0; i < detached.length; i++) {
    const fragment = detached[i];
    const target = originals[i];
    const entry = paired[i];
    if (!fragment || !target || !entry) {
      throw new FragmentMismatchError(pageNumber, 'identifier', `No response entry for fragment ${i}`, i);
    }

    const claimed = normalizeText(entry.original_text_fragment);
    if (claimed !== fragment.text) {
      throw new FragmentMismatchError(
        pageNumber,
        'text',
        `Fragment ${fragment.index} text mismatch: expected ${JSON.stringify(fragment.text)}, got ${JSON.stringify(entry.original_text_fragment)}`,
        fragment.index
      );
    }

    // 공백뿐인 조각은 그대로 둔다
    if (fragment.text.length === 0) {
      continue;
    }
    if (entry.translated_text_fragment.trim().length === 0) {
      emptied.push(fragment.index);
    }
    writes.push({ target, text: withEdgeWhitespace(target.text, entry.translated_text_fragment) });
  }

  for (const write of writes) {
    write.target.text = write.text;
  }
  return { changed: writes.length, emptied };
}
