/**
 * 오프라인 실행용 mock 백엔드 (PAGE_TRANSLATOR_PROVIDER=mock)
 *
 * - 번역: translate 함수로 텍스트를 변환 (기본값: 그대로 반환)
 * - 정렬: 프롬프트의 요청 JSON을 읽어 조각마다 translate 결과를 채워 응답
 */

import { z } from 'zod';
import { INPUT_MARKER } from '@/ai/page-translation/prompt';
import { extractFirstJsonObject } from '@/ai/page-translation/responseParser';
import type { ChatBackend, ChatExchange, ChatSession, TranslationBackend } from '@/ai/page-translation/types';

export type MockTranslateFn = (text: string, sourceLanguage: string, targetLanguage: string) => string;

const identity: MockTranslateFn = (text) => text;

const RequestSchema = z.object({
  text_fragments: z.array(
    z.object({
      fragment_index: z.number(),
      original_text_fragment: z.string(),
    })
  ),
});

type MockRequest = z.infer<typeof RequestSchema>;

const MockSessionSchema = z.object({
  request: RequestSchema,
  turns: z.number(),
});

export class MockTranslationBackend implements TranslationBackend {
  constructor(private readonly translateFn: MockTranslateFn = identity) {}

  async translate(text: string, sourceLanguage: string, targetLanguage: string): Promise<string> {
    return this.translateFn(text, sourceLanguage, targetLanguage);
  }
}

export class MockChatBackend implements ChatBackend {
  constructor(
    private readonly translateFn: MockTranslateFn = identity,
    private readonly languages: { source: string; target: string } = { source: 'source', target: 'target' }
  ) {}

  async chat(prompt: string, session: ChatSession): Promise<ChatExchange> {
    const previous = MockSessionSchema.safeParse(session);
    const request = this.readRequest(prompt) ?? (previous.success ? previous.data.request : null);
    if (!request) {
      return { text: 'I could not find the page data.', session };
    }

    const text = JSON.stringify({
      text_fragments: request.text_fragments.map((fragment) => ({
        fragment_index: fragment.fragment_index,
        original_text_fragment: fragment.original_text_fragment,
        translated_text_fragment:
          fragment.original_text_fragment.length > 0
            ? this.translateFn(fragment.original_text_fragment, this.languages.source, this.languages.target)
            : '',
      })),
    });
    const turns = previous.success ? previous.data.turns + 1 : 1;
    return { text, session: { request, turns } };
  }

  private readRequest(prompt: string): MockRequest | null {
    const markerAt = prompt.indexOf(INPUT_MARKER);
    if (markerAt === -1) return null;

    const json = extractFirstJsonObject(prompt.slice(markerAt + INPUT_MARKER.length));
    if (!json) return null;
    try {
      const parsed = RequestSchema.safeParse(JSON.parse(json));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }
}
