import { describe, it, expect } from 'vitest';
import { FakeListChatModel } from '@langchain/core/utils/testing';
import { isLangChainChatSession, LangChainChatBackend, LangChainTranslationBackend } from './langchain';

describe('LangChainChatBackend', () => {
  it('세션이 없으면 새 대화를 만들고, 이후 교환은 이력을 이어 붙인다', async () => {
    const backend = new LangChainChatBackend(new FakeListChatModel({ responses: ['first', 'second'] }), {
      systemPrompt: 'system rules',
    });

    const first = await backend.chat('align this', null);
    const second = await backend.chat('fix it', first.session);

    expect(first.text).toBe('first');
    expect(second.text).toBe('second');
    if (!isLangChainChatSession(first.session) || !isLangChainChatSession(second.session)) {
      throw new Error('expected LangChain sessions');
    }
    expect(second.session.id).toBe(first.session.id);
    expect(first.session.messages.map((m) => m.content)).toEqual(['system rules', 'align this', 'first']);
    expect(second.session.messages.map((m) => m.content)).toEqual([
      'system rules',
      'align this',
      'first',
      'fix it',
      'second',
    ]);
    // 이전 세션 값은 바뀌지 않는다
    expect(first.session.messages).toHaveLength(3);
  });

  it('취소된 signal이면 모델을 호출하지 않고 재시도도 하지 않는다', async () => {
    const backend = new LangChainChatBackend(new FakeListChatModel({ responses: ['first'] }), {
      retry: { baseDelayMs: 1, onRetry: () => {} },
    });
    const controller = new AbortController();
    controller.abort(new Error('cancelled'));

    await expect(backend.chat('align this', null, { signal: controller.signal })).rejects.toThrow('cancelled');
    // 응답 목록이 소비되지 않았다
    expect((await backend.chat('align this', null)).text).toBe('first');
  });

  it('서로 다른 페이지의 세션은 섞이지 않는다', async () => {
    const backend = new LangChainChatBackend(new FakeListChatModel({ responses: ['a', 'b'] }));

    const pageOne = await backend.chat('page 1', null);
    const pageTwo = await backend.chat('page 2', null);

    if (!isLangChainChatSession(pageOne.session) || !isLangChainChatSession(pageTwo.session)) {
      throw new Error('expected LangChain sessions');
    }
    expect(pageOne.session.id).not.toBe(pageTwo.session.id);
    expect(pageTwo.session.messages.map((m) => m.content)).not.toContain('page 1');
  });
});

describe('LangChainTranslationBackend', () => {
  it('응답 텍스트를 trim해서 돌려준다', async () => {
    const backend = new LangChainTranslationBackend(new FakeListChatModel({ responses: ['  Good morning \n'] }));

    expect(await backend.translate('Guten Morgen', 'German', 'English')).toBe('Good morning');
  });

  it('빈 텍스트는 모델을 호출하지 않는다', async () => {
    const backend = new LangChainTranslationBackend(new FakeListChatModel({ responses: ['unused'] }));

    expect(await backend.translate('   ', 'German', 'English')).toBe('');
  });

  it('빈 응답은 에러', async () => {
    const backend = new LangChainTranslationBackend(new FakeListChatModel({ responses: ['   '] }));

    await expect(backend.translate('Hallo', 'German', 'English')).rejects.toThrow('Translation response was empty.');
  });
});

describe('isLangChainChatSession', () => {
  it('id와 messages가 있어야 세션으로 본다', () => {
    expect(isLangChainChatSession(null)).toBe(false);
    expect(isLangChainChatSession({ id: 'x' })).toBe(false);
    expect(isLangChainChatSession({ id: 'x', messages: [] })).toBe(true);
  });
});
