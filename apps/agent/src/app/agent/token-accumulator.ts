import { BaseCallbackHandler } from '@langchain/core/callbacks/base';
import type { LLMResult } from '@langchain/core/outputs';

import { TokenUsage } from '../common/interfaces';
import { isRecord } from '../common/json.util';

function count(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/** Sums prompt/completion token usage reported by every generation of a run. */
export class TokenAccumulator extends BaseCallbackHandler {
  name = 'TokenAccumulator';
  // Totals must be final by the time `invoke` resolves.
  awaitHandlers = true;
  promptTokens = 0;
  completionTokens = 0;

  handleLLMEnd(output: LLMResult): void {
    const usage = output.llmOutput?.tokenUsage;
    if (!isRecord(usage)) return;
    this.promptTokens += count(usage.promptTokens);
    this.completionTokens += count(usage.completionTokens);
  }

  get usage(): TokenUsage {
    return {
      promptTokens: this.promptTokens,
      completionTokens: this.completionTokens
    };
  }
}
