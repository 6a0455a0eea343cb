import type { CallbackManagerForLLMRun } from '@langchain/core/callbacks/manager';
import type { BaseLanguageModelInput } from '@langchain/core/language_models/base';
import {
  BaseChatModel,
  type BaseChatModelCallOptions,
  type BindToolsInput
} from '@langchain/core/language_models/chat_models';
import {
  AIMessage,
  type AIMessageChunk,
  type BaseMessage
} from '@langchain/core/messages';
import type { ChatResult } from '@langchain/core/outputs';
import type { Runnable } from '@langchain/core/runnables';

/** A canned reply, an error to throw, or a reply computed from the prompt. */
export type ScriptStep =
  | AIMessage
  | Error
  | ((messages: BaseMessage[]) => AIMessage);

export interface ScriptedCall {
  messages: BaseMessage[];
  /** Names of the tools bound for this call; empty when none were bound. */
  tools: string[];
}

interface ScriptState {
  steps: ScriptStep[];
  calls: ScriptedCall[];
  delayMs: number;
}

export function aiText(text: string): AIMessage {
  return new AIMessage(text);
}

export function aiToolCall(
  name: string,
  args: Record<string, unknown>,
  id = `call-${name}`
): AIMessage {
  return new AIMessage({
    content: '',
    tool_calls: [{ name, args, id, type: 'tool_call' }]
  });
}

function toolName(input: BindToolsInput): string {
  if (typeof input === 'object' && input !== null && 'name' in input) {
    return typeof input.name === 'string' ? input.name : 'unknown';
  }
  return 'unknown';
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        reject(new Error('Aborted'));
      },
      { once: true }
    );
  });
}

/**
 * Chat model that replays a fixed script, one step per generation, and
 * reports a fixed token usage of 10 prompt / 5 completion tokens per call.
 */
export class ScriptedChatModel extends BaseChatModel {
  private readonly state: ScriptState;
  private readonly boundTools: string[];

  constructor(
    steps: ScriptStep[] | ScriptState,
    opts: { delayMs?: number; boundTools?: string[] } = {}
  ) {
    super({});
    this.state = Array.isArray(steps)
      ? { steps: [...steps], calls: [], delayMs: opts.delayMs ?? 0 }
      : steps;
    this.boundTools = opts.boundTools ?? [];
  }

  get calls(): ScriptedCall[] {
    return this.state.calls;
  }

  get remainingSteps(): number {
    return this.state.steps.length;
  }

  _llmType(): string {
    return 'scripted';
  }

  override bindTools(
    tools: BindToolsInput[]
  ): Runnable<BaseLanguageModelInput, AIMessageChunk, BaseChatModelCallOptions> {
    return new ScriptedChatModel(this.state, {
      boundTools: tools.map(toolName)
    });
  }

  async _generate(
    messages: BaseMessage[],
    options: this['ParsedCallOptions'],
    _runManager?: CallbackManagerForLLMRun
  ): Promise<ChatResult> {
    this.state.calls.push({ messages, tools: this.boundTools });
    if (this.state.delayMs > 0) {
      await sleep(this.state.delayMs, options.signal);
    }

    const step = this.state.steps.shift();
    if (step === undefined) {
      throw new Error('ScriptedChatModel: script exhausted');
    }
    if (step instanceof Error) throw step;
    const message = typeof step === 'function' ? step(messages) : step;

    return {
      generations: [
        {
          text: typeof message.content === 'string' ? message.content : '',
          message
        }
      ],
      llmOutput: { tokenUsage: { promptTokens: 10, completionTokens: 5 } }
    };
  }
}
