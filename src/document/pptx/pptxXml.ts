/**
 * PPTX 슬라이드 XML 처리
 *
 * 슬라이드 XML(ppt/slides/slideN.xml)의 텍스트 run(<a:t>)을 조각으로,
 * 문단(<a:p>)을 문단 그룹으로 다룹니다.
 */

// 문단 요소 (<a:p/> 같은 빈 self-closing 태그는 제외)
const PARAGRAPH_REGEX = /<a:p(\s[^>]*)?(?<!\/)>(.*?)<\/a:p>/gs;

// 텍스트 run 요소
const TEXT_ELEMENT_REGEX = /<a:t(\s[^>]*)?>([^<]*)<\/a:t>/g;

/**
 * 슬라이드의 모든 텍스트 run을 문서 순서대로 추출
 */
export function extractRunTexts(xml: string): string[] {
  const texts: string[] = [];
  for (const match of xml.matchAll(TEXT_ELEMENT_REGEX)) {
    texts.push(unescapeXml(match[2] ?? ''));
  }
  return texts;
}

/**
 * 문단별로 run 텍스트를 합친 목록 (빈 문단 제외)
 */
export function extractParagraphTexts(xml: string): string[] {
  const paragraphs: string[] = [];
  for (const match of xml.matchAll(PARAGRAPH_REGEX)) {
    const combined = extractRunTexts(match[2] ?? '').join('');
    if (combined.trim().length === 0) {
      continue;
    }
    paragraphs.push(combined);
  }
  return paragraphs;
}

/**
 * i번째 <a:t>의 내용을 texts[i]로 교체
 * - run 개수가 다르면 XML과 조각이 어긋난 것이므로 에러
 */
export function replaceRunTexts(xml: string, texts: string[]): string {
  const runCount = extractRunTexts(xml).length;
  if (runCount !== texts.length) {
    throw new Error(`Run count mismatch: slide has ${runCount} run(s), got ${texts.length} text(s)`);
  }

  let index = 0;
  return xml.replace(TEXT_ELEMENT_REGEX, (_match, attrs: string | undefined) => {
    const text = texts[index] ?? '';
    index++;
    return `<a:t${attrs ?? ''}>${escapeXml(text)}</a:t>`;
  });
}

// presentation.xml의 슬라이드 순서 (<p:sldId r:id="rId2"/>)
const SLIDE_ID_REGEX = /<p:sldId\b[^>]*\br:id="([^"]+)"[^>]*\/?>/g;
// presentation.xml.rels의 관계 (<Relationship Id="rId2" Target="slides/slide1.xml" .../>)
const RELATIONSHIP_REGEX = /<Relationship\b([^>]*)\/?>/g;

function readAttribute(attrs: string, name: string): string | undefined {
  const match = attrs.match(new RegExp(`\\b${name}="([^"]*)"`));
  return match?.[1];
}

/**
 * 프레젠테이션에 표시되는 순서대로 슬라이드 XML 경로 목록을 만든다
 * - presentation.xml / rels가 없으면 파일 이름의 번호 순서로 대체
 */
export function resolveSlideOrder(files: Record<string, Uint8Array>): string[] {
  const slidePaths = Object.keys(files)
    .filter((path) => /^ppt\/slides\/slide\d+\.xml$/.test(path))
    .sort((a, b) => slideNumberOf(a) - slideNumberOf(b));

  const presentation = files['ppt/presentation.xml'];
  const rels = files['ppt/_rels/presentation.xml.rels'];
  if (!presentation || !rels) {
    return slidePaths;
  }

  const relTargets = new Map<string, string>();
  for (const match of decodeUtf8(rels).matchAll(RELATIONSHIP_REGEX)) {
    const attrs = match[1] ?? '';
    const id = readAttribute(attrs, 'Id');
    const target = readAttribute(attrs, 'Target');
    if (id && target) {
      relTargets.set(id, `ppt/${target.replace(/^\/?ppt\//, '').replace(/^\.\//, '')}`);
    }
  }

  const ordered: string[] = [];
  for (const match of decodeUtf8(presentation).matchAll(SLIDE_ID_REGEX)) {
    const target = relTargets.get(match[1] ?? '');
    if (target && files[target]) {
      ordered.push(target);
    }
  }

  return ordered.length > 0 ? ordered : slidePaths;
}

function slideNumberOf(path: string): number {
  const match = path.match(/slide(\d+)\.xml$/);
  return match?.[1] ? parseInt(match[1], 10) : 0;
}

export function decodeUtf8(data: Uint8Array): string {
  return new TextDecoder().decode(data);
}

export function encodeUtf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

/**
 * Escape special XML characters
 */
export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

/**
 * Unescape XML entities back to normal characters
 */
export function unescapeXml(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, '\'')
    .replace(/&#(\d+);/g, (_m, dec: string) => String.fromCodePoint(parseInt(dec, 10)))
    .replace(/&#x([0-9a-fA-F]+);/g, (_m, hex: string) => String.fromCodePoint(parseInt(hex, 16)))
    .replace(/&amp;/g, '&');
}
