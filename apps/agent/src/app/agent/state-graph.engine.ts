import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import {
  type AIMessageChunk,
  type BaseMessage,
  HumanMessage,
  SystemMessage,
  ToolMessage
} from '@langchain/core/messages';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';

import {
  errorMessage,
  NodeFailureError,
  ThreadAccessDeniedError,
  ValidationError
} from '../common/agent.errors';
import {
  ConversationThread,
  Message,
  RunStatus,
  TokenUsage,
  ToolCallRecord,
  UserAuth
} from '../common/interfaces';
import { truncate } from '../common/json.util';
import { CHECKPOINT_STORE, CheckpointStore } from '../checkpoint/checkpoint.store';
import { DirectoryClientService } from '../directory/directory-client.service';
import { ToolRegistryService, ToolSession } from '../tools/tool-registry.service';
import { TraceService } from '../tracing/trace.service';
import { CHAT_MODEL } from './chat-model.provider';
import {
  ActiveGraphState,
  GraphEvent,
  GraphOutcome,
  GraphState,
  INITIAL_STATE,
  transition
} from './graph-state';
import { messageText, toChatHistory } from './message.util';
import {
  buildExecutorPrompt,
  buildPlannerPrompt,
  STEP_BUDGET_NOTICE,
  TOOLS_WITHDRAWN_NOTICE
} from './system-prompt.builder';
import { TokenAccumulator } from './token-accumulator';

const THREAD_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;
const MAX_MESSAGE_LENGTH = 10000;
const SPAN_PREVIEW_CHARS = 100;

export const ERROR_RESPONSE =
  'I encountered an error processing your request. Please try again.';
export const TIMEOUT_RESPONSE =
  'The request took too long to complete. Please try again.';

export interface EngineInput {
  threadId?: string;
  message: string;
  userId: string;
  auth: UserAuth;
}

export interface EngineResult {
  threadId: string;
  response: string;
  plan: string | null;
  status: RunStatus;
  truncated: boolean;
  tokenUsage: TokenUsage;
  toolCalls: ToolCallRecord[];
  /** Set when `status` is `error`. */
  error?: NodeFailureError;
}

/** Reject input that must never reach the graph. */
export function validateInvocation(message: string, threadId?: string): void {
  if (message.trim().length === 0) {
    throw new ValidationError('Message must not be empty');
  }
  if (message.length > MAX_MESSAGE_LENGTH) {
    throw new ValidationError(
      `Message must be at most ${MAX_MESSAGE_LENGTH} characters`
    );
  }
  if (threadId !== undefined && !THREAD_ID_PATTERN.test(threadId)) {
    throw new ValidationError('Malformed thread id', { threadId });
  }
}

export function resolveThreadId(threadId?: string): string {
  return threadId ?? randomUUID();
}

interface TurnContext {
  history: BaseMessage[];
  userMessage: string;
  session: ToolSession;
  signal: AbortSignal;
  tokens: TokenAccumulator;
}

interface ExecutorOutput {
  response: string;
  truncated: boolean;
}

@Injectable()
export class StateGraphEngine {
  private readonly logger = new Logger(StateGraphEngine.name);

  constructor(
    @Inject(CHECKPOINT_STORE) private readonly checkpointStore: CheckpointStore,
    @Inject(CHAT_MODEL) private readonly chatModel: BaseChatModel,
    private readonly toolRegistry: ToolRegistryService,
    private readonly directory: DirectoryClientService,
    private readonly traceService: TraceService,
    private readonly configService: ConfigService
  ) {}

  /**
   * Run one turn: PLANNING → EXECUTING → DONE under the thread lock. The
   * thread is saved once, and only when the turn succeeds; a failed or
   * timed-out turn leaves it exactly as it was.
   */
  async execute(input: EngineInput): Promise<EngineResult> {
    validateInvocation(input.message, input.threadId);
    const threadId = resolveThreadId(input.threadId);

    return this.checkpointStore.withThreadLock(threadId, async () => {
      const thread = await this.checkpointStore.load(threadId);
      if (thread.ownerId !== null && thread.ownerId !== input.userId) {
        throw new ThreadAccessDeniedError(threadId);
      }

      const controller = new AbortController();
      const session = this.toolRegistry.compose({
        userId: input.userId,
        abortSignal: controller.signal,
        auth: input.auth,
        directory: this.directory
      });
      const turn: TurnContext = {
        history: toChatHistory(thread.messages),
        userMessage: input.message,
        session,
        signal: controller.signal,
        tokens: new TokenAccumulator()
      };

      const outcome = await this._runGraph(turn, controller);
      const result = this._toResult(threadId, outcome, turn);

      if (outcome.status === 'success') {
        await this._saveTurn(thread, input, outcome, session.records);
      } else {
        this.logger.warn(
          `Turn on thread ${threadId} ended with ${outcome.status}; checkpoint left unchanged`
        );
      }
      return result;
    });
  }

  private async _runGraph(
    turn: TurnContext,
    controller: AbortController
  ): Promise<GraphOutcome> {
    const budgetMs = this.configService.get<number>('AGENT_TIMEOUT_MS', 60000);
    const deadline = startDeadline(budgetMs, controller);

    try {
      let state: GraphState = INITIAL_STATE;
      while (state.kind !== 'DONE') {
        const event: GraphEvent = await Promise.race([
          this._step(state, turn),
          deadline.expired
        ]);
        state = transition(state, event);
      }
      return state.outcome;
    } finally {
      deadline.cancel();
      controller.abort();
    }
  }

  private async _step(
    state: ActiveGraphState,
    turn: TurnContext
  ): Promise<GraphEvent> {
    switch (state.kind) {
      case 'PLANNING':
        try {
          const plan = await this.traceService.withSpan('planner', (span) =>
            this._plan(turn).then((p) => {
              span.setAttribute('output', truncate(p, SPAN_PREVIEW_CHARS));
              return p;
            })
          );
          return { type: 'PLAN_READY', plan };
        } catch (err) {
          return { type: 'PLAN_FAILED', error: asNodeFailure('planner', err) };
        }

      case 'EXECUTING':
        try {
          const output = await this.traceService.withSpan('executor', () =>
            this._executeWithTools(state.plan, turn)
          );
          return { type: 'RESPONSE_READY', ...output };
        } catch (err) {
          return {
            type: 'EXECUTION_FAILED',
            error: asNodeFailure('executor', err)
          };
        }
    }
  }

  private async _plan(turn: TurnContext): Promise<string> {
    const messages = [
      new SystemMessage(
        buildPlannerPrompt(Array.from(turn.session.tools.values()))
      ),
      ...turn.history,
      new HumanMessage(turn.userMessage)
    ];
    const reply = await this.chatModel.invoke(messages, {
      signal: turn.signal,
      callbacks: [turn.tokens]
    });
    const plan = messageText(reply.content).trim();
    if (!plan) {
      throw new NodeFailureError('planner', 'model returned an empty plan');
    }
    return plan;
  }

  /**
   * Generate, run the requested tools, feed their results back, repeat.
   * Stops when the model answers without tool calls or the step budget is
   * spent. After too many consecutive rounds in which every tool call
   * failed, tools are withdrawn and the model must answer.
   */
  private async _executeWithTools(
    plan: string,
    turn: TurnContext
  ): Promise<ExecutorOutput> {
    const maxSteps = this.configService.get<number>('AGENT_MAX_STEPS', 8);
    const maxFailedRounds = this.configService.get<number>(
      'AGENT_MAX_CONSECUTIVE_TOOL_FAILURES',
      3
    );
    if (!this.chatModel.bindTools) {
      throw new NodeFailureError('executor', 'chat model cannot call tools');
    }

    const definitions = Array.from(turn.session.tools.values());
    const model = this.chatModel.bindTools(
      this.toolRegistry.toLangChainTools(turn.session)
    );
    const messages: BaseMessage[] = [
      new SystemMessage(buildExecutorPrompt(plan, definitions)),
      ...turn.history,
      new HumanMessage(turn.userMessage)
    ];
    const options = { signal: turn.signal, callbacks: [turn.tokens] };

    let failedRounds = 0;
    let lastText = '';
    for (let step = 1; step <= maxSteps; step++) {
      const reply: AIMessageChunk = await this.traceService.withSpan(
        'llm:executor',
        () => model.invoke(messages, options),
        { step }
      );
      messages.push(reply);
      const text = messageText(reply.content).trim();
      if (text) lastText = text;

      const toolCalls = reply.tool_calls ?? [];
      if (toolCalls.length === 0) {
        if (!text) {
          throw new NodeFailureError(
            'executor',
            'model returned an empty response'
          );
        }
        return { response: text, truncated: false };
      }
      if (step === maxSteps) break;

      let failures = 0;
      for (const call of toolCalls) {
        const result = await turn.session.invoke(call.name, call.args);
        if (result.error) failures++;
        messages.push(
          new ToolMessage({
            content: JSON.stringify(result),
            tool_call_id: call.id ?? `${call.name}-${step}`,
            name: call.name
          })
        );
      }

      failedRounds = failures === toolCalls.length ? failedRounds + 1 : 0;
      if (failedRounds >= maxFailedRounds) {
        this.logger.warn(
          `${failedRounds} consecutive failed tool rounds; withdrawing tools`
        );
        messages.push(new HumanMessage(TOOLS_WITHDRAWN_NOTICE));
        const final = await this.traceService.withSpan('llm:executor', () =>
          this.chatModel.invoke(messages, options)
        );
        const finalText = messageText(final.content).trim();
        return {
          response: finalText || lastText || STEP_BUDGET_NOTICE,
          truncated: !finalText
        };
      }
    }

    this.logger.warn(
      `Step budget of ${maxSteps} exhausted; returning best effort`
    );
    return { response: lastText || STEP_BUDGET_NOTICE, truncated: true };
  }

  private _toResult(
    threadId: string,
    outcome: GraphOutcome,
    turn: TurnContext
  ): EngineResult {
    const base = {
      threadId,
      plan: outcome.plan,
      tokenUsage: turn.tokens.usage,
      toolCalls: turn.session.records
    };
    switch (outcome.status) {
      case 'success':
        return {
          ...base,
          status: 'success',
          response: outcome.response,
          truncated: outcome.truncated
        };
      case 'error':
        this.logger.error(
          `Turn on thread ${threadId} failed: ${outcome.error.message}`
        );
        return {
          ...base,
          status: 'error',
          response: ERROR_RESPONSE,
          truncated: false,
          error: outcome.error
        };
      case 'timeout':
        return {
          ...base,
          status: 'timeout',
          response: TIMEOUT_RESPONSE,
          truncated: false
        };
    }
  }

  private async _saveTurn(
    thread: ConversationThread,
    input: EngineInput,
    outcome: Extract<GraphOutcome, { status: 'success' }>,
    records: ToolCallRecord[]
  ): Promise<void> {
    const now = new Date().toISOString();
    const userMessage: Message = {
      role: 'user',
      content: input.message,
      createdAt: now
    };
    const agentMessage: Message = {
      role: 'agent',
      content: outcome.response,
      createdAt: now,
      ...(records.length > 0 && {
        attachments: records.map((r) => ({
          kind: 'tool_call' as const,
          toolName: r.toolName,
          success: r.success,
          durationMs: r.durationMs
        }))
      })
    };

    await this.checkpointStore.save(
      {
        ...thread,
        ownerId: thread.ownerId ?? input.userId,
        messages: [...thread.messages, userMessage, agentMessage],
        plan: outcome.plan
      },
      thread.version
    );
  }
}

function asNodeFailure(
  node: 'planner' | 'executor',
  err: unknown
): NodeFailureError {
  return err instanceof NodeFailureError
    ? err
    : new NodeFailureError(node, errorMessage(err), err);
}

interface Deadline {
  expired: Promise<GraphEvent>;
  cancel(): void;
}

/**
 * Resolves `DEADLINE_EXCEEDED` once `budgetMs` of wall-clock time has
 * elapsed and aborts in-flight model and tool calls. Re-arms if the timer
 * fires early.
 */
function startDeadline(budgetMs: number, controller: AbortController): Deadline {
  const start = performance.now();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<GraphEvent>((resolve) => {
    const check = (): void => {
      const remaining = budgetMs - (performance.now() - start);
      if (remaining > 0) {
        timer = setTimeout(check, Math.ceil(remaining));
        return;
      }
      resolve({ type: 'DEADLINE_EXCEEDED' });
      controller.abort();
    };
    timer = setTimeout(check, budgetMs);
  });
  return { expired, cancel: () => clearTimeout(timer) };
}
