import { AIMessage, ToolMessage } from '@langchain/core/messages';
import { ConfigService } from '@nestjs/config';

import {
  NodeFailureError,
  ThreadAccessDeniedError,
  ValidationError
} from '../common/agent.errors';
import { TraceRepository } from '../database/trace.repository';
import { DirectoryClientService } from '../directory/directory-client.service';
import { ToolRegistryService } from '../tools/tool-registry.service';
import { TraceService } from '../tracing/trace.service';
import {
  aiText,
  aiToolCall,
  InMemoryCheckpointStore,
  makeDirectoryClient,
  ScriptedChatModel,
  ScriptStep
} from '../../test-fixtures';
import { messageText } from './message.util';
import {
  ERROR_RESPONSE,
  resolveThreadId,
  StateGraphEngine,
  TIMEOUT_RESPONSE,
  validateInvocation
} from './state-graph.engine';
import { STEP_BUDGET_NOTICE, TOOLS_WITHDRAWN_NOTICE } from './system-prompt.builder';

const AUTH = { mode: 'user' as const, jwt: 'test-jwt' };

function setup(
  steps: ScriptStep[],
  overrides: Record<string, unknown> = {},
  delayMs = 0
) {
  const config: Record<string, unknown> = {
    AGENT_TIMEOUT_MS: 5000,
    AGENT_MAX_STEPS: 8,
    AGENT_MAX_CONSECUTIVE_TOOL_FAILURES: 2,
    TRACING_ENABLED: false,
    ...overrides
  };
  const configService = {
    get: jest.fn((key: string, def?: unknown) => config[key] ?? def)
  } as unknown as ConfigService;
  const traceService = new TraceService(
    { saveTrace: jest.fn() } as unknown as TraceRepository,
    configService
  );
  const registry = new ToolRegistryService(traceService);
  registry.onModuleInit();

  const store = new InMemoryCheckpointStore();
  const model = new ScriptedChatModel(steps, { delayMs });
  const directory = makeDirectoryClient();
  const engine = new StateGraphEngine(
    store,
    model,
    registry,
    directory as unknown as DirectoryClientService,
    traceService,
    configService
  );
  return { engine, store, model, directory };
}

function contents(messages: { content: AIMessage['content'] }[]): string[] {
  return messages.map((m) => messageText(m.content));
}

describe('validateInvocation', () => {
  it('rejects an empty or whitespace-only message', () => {
    expect(() => validateInvocation('   ')).toThrow(ValidationError);
    expect(() => validateInvocation('')).toThrow('Message must not be empty');
  });

  it('rejects a malformed thread id', () => {
    expect(() => validateInvocation('hi', 'bad id!')).toThrow(
      'Malformed thread id'
    );
  });

  it('accepts a message with a well-formed thread id', () => {
    expect(() => validateInvocation('hi', 'thread-1:a.b')).not.toThrow();
  });
});

describe('resolveThreadId', () => {
  it('keeps a given id and generates one otherwise', () => {
    expect(resolveThreadId('thread-1')).toBe('thread-1');
    expect(resolveThreadId()).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('StateGraphEngine', () => {
  it('plans without tools, executes with tools and saves the turn', async () => {
    const { engine, store, model } = setup([
      aiText('1. Look up admin@example.com'),
      aiToolCall('lookup_user_by_email', { email: 'admin@example.com' }, 'c1'),
      aiText('The admin user is Ada Admin.')
    ]);

    const result = await engine.execute({
      threadId: 'thread-1',
      message: 'Who is admin@example.com?',
      userId: 'user-1',
      auth: AUTH
    });

    expect(result).toMatchObject({
      threadId: 'thread-1',
      status: 'success',
      response: 'The admin user is Ada Admin.',
      plan: '1. Look up admin@example.com',
      truncated: false,
      tokenUsage: { promptTokens: 30, completionTokens: 15 }
    });
    expect(result.toolCalls).toHaveLength(1);
    expect(result.toolCalls[0]).toMatchObject({
      toolName: 'lookup_user_by_email',
      success: true
    });

    expect(model.calls[0].tools).toEqual([]);
    expect(model.calls[1].tools).toEqual(
      expect.arrayContaining(['lookup_user_by_email', 'http_get'])
    );
    const toolMessage = model.calls[2].messages[model.calls[2].messages.length - 1];
    expect(toolMessage).toBeInstanceOf(ToolMessage);
    expect(JSON.parse(messageText(toolMessage.content)).data.email).toBe(
      'admin@example.com'
    );

    const thread = await store.load('thread-1');
    expect(thread.version).toBe(1);
    expect(thread.ownerId).toBe('user-1');
    expect(thread.plan).toBe('1. Look up admin@example.com');
    expect(thread.messages.map((m) => m.role)).toEqual(['user', 'agent']);
    expect(thread.messages[1].attachments).toEqual([
      {
        kind: 'tool_call',
        toolName: 'lookup_user_by_email',
        success: true,
        durationMs: expect.any(Number)
      }
    ]);
  });

  it('generates a thread id when none is given', async () => {
    const { engine } = setup([aiText('No tools needed.'), aiText('Hello!')]);
    const result = await engine.execute({
      message: 'Hi',
      userId: 'user-1',
      auth: AUTH
    });
    expect(result.threadId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('gives the follow-up turn the prior history', async () => {
    const { engine, model, directory } = setup([
      aiText('Look up the admin by email.'),
      aiToolCall('lookup_user_by_email', { email: 'admin@example.com' }, 'c1'),
      aiText('The admin user is Ada Admin (id user-admin).'),
      aiText('List the items of user-admin.'),
      aiToolCall('lookup_user_items', { user_id: 'user-admin' }, 'c2'),
      aiText('They own one item: Desk lamp.')
    ]);

    await engine.execute({
      threadId: 'thread-1',
      message: 'Who is the admin user?',
      userId: 'user-1',
      auth: AUTH
    });
    const second = await engine.execute({
      threadId: 'thread-1',
      message: 'What items do they own?',
      userId: 'user-1',
      auth: AUTH
    });

    expect(second.response).toBe('They own one item: Desk lamp.');
    expect(contents(model.calls[3].messages).slice(1)).toEqual([
      'Who is the admin user?',
      'The admin user is Ada Admin (id user-admin).',
      'What items do they own?'
    ]);
    expect(directory.listUserItems).toHaveBeenCalledWith(
      'user-admin',
      10,
      AUTH,
      expect.any(AbortSignal)
    );
  });

  it('serializes concurrent turns on one thread without losing messages', async () => {
    const { engine, store, model } = setup([
      aiText('plan 1'),
      aiText('answer 1'),
      aiText('plan 2'),
      aiText('answer 2')
    ]);

    await Promise.all([
      engine.execute({
        threadId: 'thread-1',
        message: 'first',
        userId: 'user-1',
        auth: AUTH
      }),
      engine.execute({
        threadId: 'thread-1',
        message: 'second',
        userId: 'user-1',
        auth: AUTH
      })
    ]);

    const thread = await store.load('thread-1');
    expect(thread.version).toBe(2);
    expect(thread.messages.map((m) => m.content)).toEqual([
      'first',
      'answer 1',
      'second',
      'answer 2'
    ]);
    expect(model.calls[2].messages).toHaveLength(4);
  });

  it('returns tool failures to the model instead of failing the run', async () => {
    const { engine, model } = setup([
      aiText('Look up item missing.'),
      aiToolCall('lookup_item_by_id', { item_id: 'missing' }, 'c1'),
      aiText('I could not find that item.')
    ]);

    const result = await engine.execute({
      threadId: 'thread-1',
      message: 'Show item missing',
      userId: 'user-1',
      auth: AUTH
    });

    expect(result.status).toBe('success');
    expect(result.response).toBe('I could not find that item.');
    expect(result.toolCalls[0].success).toBe(false);
    const last = model.calls[2].messages[model.calls[2].messages.length - 1];
    expect(JSON.parse(messageText(last.content)).error).toBe(
      'No item found with ID: missing'
    );
  });

  it('withdraws tools after consecutive failed rounds', async () => {
    const { engine, model } = setup([
      aiText('Look up both items.'),
      aiToolCall('lookup_item_by_id', { item_id: 'x' }, 'c1'),
      aiToolCall('lookup_item_by_id', { item_id: 'y' }, 'c2'),
      aiText('I could not retrieve those items.')
    ]);

    const result = await engine.execute({
      threadId: 'thread-1',
      message: 'Show items x and y',
      userId: 'user-1',
      auth: AUTH
    });

    expect(result).toMatchObject({
      status: 'success',
      response: 'I could not retrieve those items.',
      truncated: false
    });
    const final = model.calls[3];
    expect(final.tools).toEqual([]);
    expect(messageText(final.messages[final.messages.length - 1].content)).toBe(
      TOOLS_WITHDRAWN_NOTICE
    );
  });

  it('returns a truncated best-effort answer when the step budget runs out', async () => {
    const { engine, store, model } = setup(
      [
        aiText('Look up the admin.'),
        aiToolCall('lookup_user_by_email', { email: 'admin@example.com' }, 'c1'),
        aiToolCall('lookup_user_by_email', { email: 'admin@example.com' }, 'c2')
      ],
      { AGENT_MAX_STEPS: 2 }
    );

    const result = await engine.execute({
      threadId: 'thread-1',
      message: 'Who is the admin?',
      userId: 'user-1',
      auth: AUTH
    });

    expect(result).toMatchObject({
      status: 'success',
      response: STEP_BUDGET_NOTICE,
      truncated: true
    });
    expect(result.toolCalls).toHaveLength(1);
    expect(model.remainingSteps).toBe(0);
    expect(store.saves).toHaveLength(1);
  });

  it('ends with status error when the planner fails and saves nothing', async () => {
    const { engine, store, model } = setup([new Error('rate limited')]);

    const result = await engine.execute({
      threadId: 'thread-1',
      message: 'Hello',
      userId: 'user-1',
      auth: AUTH
    });

    expect(result.status).toBe('error');
    expect(result.response).toBe(ERROR_RESPONSE);
    expect(result.plan).toBeNull();
    expect(result.error).toBeInstanceOf(NodeFailureError);
    expect(result.error?.node).toBe('planner');
    expect(result.error?.message).toBe('planner failed: rate limited');
    expect(model.calls).toHaveLength(1);
    expect(store.saves).toHaveLength(0);
  });

  it('treats an empty plan as a planner failure', async () => {
    const { engine } = setup([aiText('   ')]);
    const result = await engine.execute({
      threadId: 'thread-1',
      message: 'Hello',
      userId: 'user-1',
      auth: AUTH
    });
    expect(result.error?.message).toBe('planner failed: model returned an empty plan');
  });

  it('keeps the plan when the executor fails', async () => {
    const { engine, store } = setup([aiText('Say hello.'), new Error('boom')]);
    const result = await engine.execute({
      threadId: 'thread-1',
      message: 'Hello',
      userId: 'user-1',
      auth: AUTH
    });
    expect(result).toMatchObject({ status: 'error', plan: 'Say hello.' });
    expect(result.error?.node).toBe('executor');
    expect(store.saves).toHaveLength(0);
  });

  it('times out without touching the thread', async () => {
    const { engine, store } = setup(
      [aiText('plan'), aiText('answer')],
      { AGENT_TIMEOUT_MS: 30 },
      200
    );

    const start = performance.now();
    const result = await engine.execute({
      threadId: 'thread-1',
      message: 'Hello',
      userId: 'user-1',
      auth: AUTH
    });

    expect(performance.now() - start).toBeGreaterThanOrEqual(30);
    expect(result).toMatchObject({
      status: 'timeout',
      response: TIMEOUT_RESPONSE,
      plan: null
    });
    expect(store.saves).toHaveLength(0);
    expect((await store.load('thread-1')).version).toBe(0);
  });

  it("rejects a turn on another user's thread", async () => {
    const { engine, model } = setup([aiText('plan'), aiText('answer')]);
    await engine.execute({
      threadId: 'thread-1',
      message: 'Hello',
      userId: 'user-1',
      auth: AUTH
    });

    await expect(
      engine.execute({
        threadId: 'thread-1',
        message: 'Hello again',
        userId: 'user-2',
        auth: AUTH
      })
    ).rejects.toThrow(ThreadAccessDeniedError);
    expect(model.calls).toHaveLength(2);
  });

  it('rejects an empty message before planning', async () => {
    const { engine, model } = setup([]);
    await expect(
      engine.execute({ message: '  ', userId: 'user-1', auth: AUTH })
    ).rejects.toThrow(ValidationError);
    expect(model.calls).toHaveLength(0);
  });
});
