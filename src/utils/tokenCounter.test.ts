import { describe, it, expect } from 'vitest';
import { estimateTokens, tokenize } from './tokenCounter';

describe('tokenize', () => {
  it('단어와 기호를 나눈다', () => {
    expect(tokenize('Hello, world!')).toEqual(['Hello', ',', 'world', '!']);
  });

  it('유니코드 문자도 단어로 본다', () => {
    expect(tokenize('안녕하세요 Käse 42')).toEqual(['안녕하세요', 'Käse', '42']);
  });
});

describe('estimateTokens', () => {
  it('빈 문자열은 0', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('   ')).toBe(0);
  });

  it('JSON 문법 기호도 센다', () => {
    expect(estimateTokens('{"a": 1}')).toBe(7);
  });
});
