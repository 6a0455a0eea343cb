import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { ChatOpenAI } from '@langchain/openai';
import { FactoryProvider, Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';

import { errorMessage, JudgeFailureError } from '../common/agent.errors';
import { messageText } from '../agent/message.util';
import { EvaluationMetric, JudgeScore } from './evaluation.types';

export const JUDGE_MODEL = 'JUDGE_MODEL';

export const judgeModelProvider: FactoryProvider<BaseChatModel> = {
  provide: JUDGE_MODEL,
  inject: [ConfigService],
  useFactory: (config: ConfigService): BaseChatModel => {
    const apiKey =
      config.get<string>('EVALUATION_API_KEY') ??
      config.get<string>('OPENAI_API_KEY');
    if (!apiKey) {
      throw new Error(
        'EVALUATION_API_KEY (or OPENAI_API_KEY) is not configured. The judge cannot score runs without an LLM provider'
      );
    }
    const baseURL = config.get<string>('EVALUATION_BASE_URL');
    return new ChatOpenAI({
      model: config.get<string>('EVALUATION_LLM', 'gpt-4o-mini'),
      temperature: 0,
      timeout: 60000,
      apiKey,
      ...(baseURL && { configuration: { baseURL } })
    });
  }
};

export const judgeScoreSchema = z.object({
  score: z.number().min(0).max(1),
  reasoning: z.string().min(1)
});

const RESPONSE_FORMAT =
  'Respond with a single JSON object and nothing else: ' +
  '{"score": <number between 0 and 1>, "reasoning": "<one sentence>"}';

const FENCE = /^```(?:json)?\s*([\s\S]*?)\s*```$/;

/** Parse and validate a judge reply; tolerates a fenced code block. */
export function parseJudgeReply(text: string): JudgeScore {
  const trimmed = text.trim();
  const body = FENCE.exec(trimmed)?.[1] ?? trimmed;

  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    throw new Error(`Judge reply is not JSON: ${body.slice(0, 100)}`);
  }

  const parsed = judgeScoreSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'reply'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Judge reply failed validation: ${issues}`);
  }
  return parsed.data;
}

@Injectable()
export class LlmJudgeService {
  private readonly logger = new Logger(LlmJudgeService.name);

  constructor(
    @Inject(JUDGE_MODEL) private readonly model: BaseChatModel,
    private readonly configService: ConfigService
  ) {}

  get modelName(): string {
    return this.configService.get<string>('EVALUATION_LLM', 'gpt-4o-mini');
  }

  /**
   * Score one generation against a metric rubric. Generation errors and
   * invalid replies are retried; the last failure surfaces as a
   * `JudgeFailureError`.
   */
  async judge(
    metric: EvaluationMetric,
    input: string,
    generation: string
  ): Promise<JudgeScore> {
    const maxAttempts = this.configService.get<number>('EVALUATION_MAX_ATTEMPTS', 3);
    const retryDelayMs = this.configService.get<number>(
      'EVALUATION_RETRY_DELAY_MS',
      10000
    );
    const messages = [
      new SystemMessage(`${metric.prompt}\n\n${RESPONSE_FORMAT}`),
      new HumanMessage(`Input: ${input}\nGeneration: ${generation}`)
    ];

    let lastError: unknown;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const reply = await this.model.invoke(messages);
        return parseJudgeReply(messageText(reply.content));
      } catch (err) {
        lastError = err;
        if (attempt < maxAttempts) {
          this.logger.warn(
            `Judge attempt ${attempt} for ${metric.name} failed, retrying: ${errorMessage(err)}`
          );
          await sleep(retryDelayMs);
        }
      }
    }

    this.logger.error(
      `Judge for ${metric.name} failed after ${maxAttempts} attempt(s): ${errorMessage(lastError)}`
    );
    throw new JudgeFailureError(metric.name, maxAttempts, lastError);
  }
}
