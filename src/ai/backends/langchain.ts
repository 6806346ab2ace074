/**
 * LangChain 기반 번역/대화 백엔드
 *
 * - 번역: 페이지 전체 텍스트를 한 번에 번역 (page context 용도)
 * - 대화: 같은 페이지의 재시도끼리 메시지 이력을 이어 붙이는 세션
 */

import { AIMessage, HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { BaseMessage } from '@langchain/core/messages';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { v4 as uuidv4 } from 'uuid';
import { messageContentToText } from '@/ai/client';
import { withRetry, type RetryConfig } from '@/ai/retry';
import type { ChatBackend, ChatExchange, ChatSession, TranslationBackend } from '@/ai/page-translation/types';

export interface LangChainChatSession {
  id: string;
  messages: BaseMessage[];
}

export function isLangChainChatSession(value: unknown): value is LangChainChatSession {
  if (!value || typeof value !== 'object') return false;
  return 'id' in value && typeof value.id === 'string' && 'messages' in value && Array.isArray(value.messages);
}

const ALIGNMENT_SYSTEM_PROMPT = [
  'You are a professional translator who aligns translations to text fragments of a document page.',
  'You always answer with a single JSON object and nothing else: no markdown, no code fences, no explanations.',
].join('\n');

export class LangChainChatBackend implements ChatBackend {
  constructor(
    private readonly model: BaseChatModel,
    private readonly options: {
      systemPrompt?: string | undefined;
      retry?: Partial<RetryConfig> | undefined;
    } = {},
  ) {}

  async chat(
    prompt: string,
    session: ChatSession,
    options?: { signal?: AbortSignal | undefined },
  ): Promise<ChatExchange> {
    // 세션이 없으면(첫 시도) 시스템 프롬프트로 새 대화 시작
    const base: LangChainChatSession = isLangChainChatSession(session)
      ? session
      : { id: uuidv4(), messages: [new SystemMessage(this.options.systemPrompt ?? ALIGNMENT_SYSTEM_PROMPT)] };

    const human = new HumanMessage(prompt);
    const invokeOptions = options?.signal ? { signal: options.signal } : {};
    const res = await withRetry(
      () => this.model.invoke([...base.messages, human], invokeOptions),
      { ...this.options.retry, signal: options?.signal },
    );
    const text = messageContentToText(res.content);

    const next: LangChainChatSession = {
      id: base.id,
      messages: [...base.messages, human, new AIMessage(text)],
    };
    return { text, session: next };
  }
}

export class LangChainTranslationBackend implements TranslationBackend {
  constructor(
    private readonly model: BaseChatModel,
    private readonly options: { retry?: Partial<RetryConfig> | undefined } = {},
  ) {}

  async translate(
    text: string,
    sourceLanguage: string,
    targetLanguage: string,
    options?: { signal?: AbortSignal | undefined },
  ): Promise<string> {
    if (text.trim().length === 0) {
      return '';
    }

    const messages = [
      new SystemMessage(
        [
          'You are a professional translator.',
          `Translate the user's text from ${sourceLanguage} to ${targetLanguage}.`,
          '- Preserve line breaks, numbers, URLs and placeholders.',
          '- Output ONLY the translated text, nothing else.',
        ].join('\n'),
      ),
      new HumanMessage(text),
    ];

    const invokeOptions = options?.signal ? { signal: options.signal } : {};
    const res = await withRetry(() => this.model.invoke(messages, invokeOptions), {
      ...this.options.retry,
      signal: options?.signal,
    });
    const translated = messageContentToText(res.content).trim();

    // 응답이 비어있는 경우
    if (translated.length === 0) {
      throw new Error('Translation response was empty.');
    }
    return translated;
  }
}
