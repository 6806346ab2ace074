/**
 * 추출 텍스트 정규화 패턴
 * 문서 엔진이 돌려주는 텍스트에는 제어 문자, 폭 없는 문자, 특수 공백이 섞여 있어
 * LLM 요청 전에 제거/치환합니다.
 */
export const NOISE_PATTERNS = {
  // 제어 문자 (탭/줄바꿈/CR은 공백 축소 단계에서 처리)
  controlChars: /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/g,
  // zero-width space/joiner, word joiner, BOM
  zeroWidth: /[\u200B-\u200D\u2060\uFEFF]/g,
  // soft hyphen
  softHyphen: /\u00AD/g,
  // 특수 공백 문자 (non-breaking space, various width spaces, ideographic space)
  specialSpaces: /[\u00A0\u2000-\u200A\u202F\u205F\u3000]/g,
} as const;

/**
 * 추출 텍스트 정규화
 *
 * 1. 제어 문자 / zero-width 문자 / soft hyphen 제거
 * 2. 특수 공백 → 일반 공백
 * 3. 줄바꿈 포함 연속 공백 → 단일 공백
 * 4. 앞뒤 공백 제거
 *
 * 정규화된 텍스트를 다시 넣어도 결과가 같습니다 (멱등).
 * 빈 문자열이 될 수 있으며, 호출 측은 조각을 버리지 말고 빈 문자열로 유지해야 합니다.
 */
export function normalizeText(text: string): string {
  return text
    .replace(NOISE_PATTERNS.controlChars, '')
    .replace(NOISE_PATTERNS.zeroWidth, '')
    .replace(NOISE_PATTERNS.softHyphen, '')
    .replace(NOISE_PATTERNS.specialSpaces, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

// 홀수 개의 백슬래시 뒤에 오는 \uXXXX만 실제 이스케이프 시퀀스
const UNICODE_ESCAPE = /(?<!\\)((?:\\\\)*)\\u([0-9a-fA-F]{4})/g;

/**
 * 응답 원문에 리터럴로 남아 있는 \uXXXX 시퀀스를 실제 문자로 복원
 *
 * JSON 파싱 전에 호출되므로 JSON 문법에 영향을 주는 문자
 * (제어 문자, 큰따옴표, 백슬래시)는 이스케이프 상태로 둡니다.
 */
export function decodeUnicodeEscapes(raw: string): string {
  return raw.replace(UNICODE_ESCAPE, (match, backslashes: string, hex: string) => {
    const code = parseInt(hex, 16);
    if (code < 0x20 || code === 0x22 || code === 0x5c) {
      return match;
    }
    return `${backslashes}${String.fromCharCode(code)}`;
  });
}
