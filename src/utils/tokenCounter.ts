/**
 * 토큰 수 추정 유틸리티
 *
 * 공백/문장부호 기준으로 나눈 근사값입니다. 로그에만 쓰이며
 * 요청 크기 제한이나 분할 기준으로 사용하지 않습니다.
 */

// 단어(문자/숫자/밑줄 연속) 또는 공백이 아닌 단일 기호
const TOKEN_PATTERN = /[\p{L}\p{N}_]+|[^\s\p{L}\p{N}_]/gu;

export function tokenize(text: string): string[] {
  return text.match(TOKEN_PATTERN) ?? [];
}

export function estimateTokens(text: string): number {
  return tokenize(text).length;
}
