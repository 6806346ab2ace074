import { ChatOpenAI } from '@langchain/openai';
import { ChatAnthropic } from '@langchain/anthropic';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { AiConfig } from '@/ai/config';

/**
 * 설정(provider/model/temperature/API key)으로 LangChain chat 모델 생성
 * - mock provider는 모델이 없으므로 에러
 */
export function createChatModel(cfg: AiConfig): BaseChatModel {
  const model = cfg.model;

  if (cfg.provider === 'openai') {
    if (!cfg.openaiApiKey) {
      throw new Error('OPENAI API key is missing (OPENAI_API_KEY).');
    }

    // o1/o3 계열 reasoning 모델은 temperature 파라미터를 받지 않음
    const isReasoningModel = /^o\d/.test(model);
    const temperatureOption = isReasoningModel
      ? {}
      : cfg.temperature !== undefined
        ? { temperature: cfg.temperature }
        : {};

    return new ChatOpenAI({
      apiKey: cfg.openaiApiKey,
      model,
      ...temperatureOption,
    });
  }

  if (cfg.provider === 'anthropic') {
    if (!cfg.anthropicApiKey) {
      throw new Error('Anthropic API key is missing (ANTHROPIC_API_KEY).');
    }
    return new ChatAnthropic({
      apiKey: cfg.anthropicApiKey,
      model,
      ...(cfg.temperature !== undefined ? { temperature: cfg.temperature } : {}),
    });
  }

  throw new Error('AI provider is set to mock.');
}

/**
 * LangChain 응답 content를 문자열로 변환
 * - provider에 따라 string 또는 content block 배열로 옴
 */
export function messageContentToText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (Array.isArray(content)) {
    return content
      .map((c: unknown) => {
        if (typeof c === 'string') return c;
        if (c && typeof c === 'object' && 'text' in c && typeof c.text === 'string') {
          return c.text;
        }
        return '';
      })
      .join('');
  }
  return content === null || content === undefined ? '' : String(content);
}
