import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { ChatOpenAI } from '@langchain/openai';
import { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export const CHAT_MODEL = 'CHAT_MODEL';

export const chatModelProvider: FactoryProvider<BaseChatModel> = {
  provide: CHAT_MODEL,
  inject: [ConfigService],
  useFactory: (config: ConfigService): BaseChatModel => {
    const apiKey = config.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      throw new Error(
        'OPENAI_API_KEY is not configured. The agent cannot start without an LLM provider'
      );
    }
    return new ChatOpenAI({
      model: config.get<string>('LLM_MODEL_NAME', 'gpt-4o-mini'),
      temperature: config.get<number>('LLM_TEMPERATURE', 0.7),
      maxTokens: config.get<number>('LLM_MAX_TOKENS', 2048),
      timeout: 30000,
      apiKey
    });
  }
};
