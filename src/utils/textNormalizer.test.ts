import { describe, it, expect } from 'vitest';
import { normalizeText, decodeUnicodeEscapes } from './textNormalizer';

const NBSP = String.fromCharCode(0xa0);
const ZWSP = String.fromCharCode(0x200b);
const SOFT_HYPHEN = String.fromCharCode(0xad);
const IDEOGRAPHIC_SPACE = String.fromCharCode(0x3000);
const BOM = String.fromCharCode(0xfeff);

describe('normalizeText', () => {
  it('연속 공백과 줄바꿈을 단일 공백으로 축소한다', () => {
    expect(normalizeText('Hello   \n\t world')).toBe('Hello world');
    expect(normalizeText('a\r\nb')).toBe('a b');
  });

  it('앞뒤 공백을 제거한다', () => {
    expect(normalizeText('   padded  ')).toBe('padded');
  });

  it('특수 공백을 일반 공백으로 바꾼다', () => {
    expect(normalizeText(`hello${NBSP}world`)).toBe('hello world');
    expect(normalizeText(`안녕${IDEOGRAPHIC_SPACE}세계`)).toBe('안녕 세계');
  });

  it('zero-width 문자, soft hyphen, BOM을 제거한다', () => {
    expect(normalizeText(`${BOM}trans${SOFT_HYPHEN}lation${ZWSP}`)).toBe('translation');
  });

  it('제어 문자를 제거한다', () => {
    expect(normalizeText('bell\u0007 char')).toBe('bell char');
  });

  it('잡음만 있는 텍스트는 빈 문자열이 된다', () => {
    expect(normalizeText(`  ${ZWSP} \n `)).toBe('');
  });

  it('멱등이다', () => {
    const samples = [
      `  Mixed${NBSP}${NBSP}spaces\n\nand ${ZWSP}noise  `,
      'already normalized',
      '',
      `${SOFT_HYPHEN}\u0001 ${IDEOGRAPHIC_SPACE}x`,
    ];
    for (const sample of samples) {
      const once = normalizeText(sample);
      expect(normalizeText(once)).toBe(once);
    }
  });
});

describe('decodeUnicodeEscapes', () => {
  it('리터럴 \\uXXXX 시퀀스를 문자로 복원한다', () => {
    expect(decodeUnicodeEscapes('{"t":"caf\\u00e9"}')).toBe('{"t":"café"}');
  });

  it('surrogate pair도 복원한다', () => {
    expect(decodeUnicodeEscapes('\\ud83d\\ude00')).toBe('😀');
  });

  it('JSON 문법 문자는 이스케이프 상태로 둔다', () => {
    expect(decodeUnicodeEscapes('"\\u0022"')).toBe('"\\u0022"');
    expect(decodeUnicodeEscapes('"\\u005c"')).toBe('"\\u005c"');
    expect(decodeUnicodeEscapes('"\\u000a"')).toBe('"\\u000a"');
  });

  it('이스케이프된 백슬래시 뒤의 u는 건드리지 않는다', () => {
    expect(decodeUnicodeEscapes('"\\\\u0041"')).toBe('"\\\\u0041"');
    expect(decodeUnicodeEscapes('"\\\\\\u0041"')).toBe('"\\\\A"');
  });

  it('디코딩 후에도 JSON 파싱이 가능하다', () => {
    const raw = '{"text_fragments":[{"original_text_fragment":"Gr\\u00fc\\u00dfe","translated_text_fragment":"Greetings"}]}';
    const parsed = JSON.parse(decodeUnicodeEscapes(raw)) as {
      text_fragments: Array<{ original_text_fragment: string }>;
    };
    expect(parsed.text_fragments[0]?.original_text_fragment).toBe('Grüße');
  });
});
