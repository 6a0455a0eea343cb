import { ForbiddenException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import {
  NodeFailureError,
  StoreUnavailableError,
  ThreadAccessDeniedError,
  ValidationError
} from '../common/agent.errors';
import { TraceRepository } from '../database/trace.repository';
import { AgentRunRecorderService } from '../recorder/agent-run-recorder.service';
import { RedisService } from '../redis/redis.service';
import { ToolRegistryService } from '../tools/tool-registry.service';
import { TraceService } from '../tracing/trace.service';
import { makeRunRecord } from '../../test-fixtures';
import { AgentService } from './agent.service';
import { EngineResult, ERROR_RESPONSE, StateGraphEngine } from './state-graph.engine';

const USER = { userId: 'user-1', rawJwt: 'test-jwt' };

function engineResult(overrides?: Partial<EngineResult>): EngineResult {
  return {
    threadId: 'thread-1',
    response: 'Hello!',
    plan: 'Greet the user.',
    status: 'success',
    truncated: false,
    tokenUsage: { promptTokens: 20, completionTokens: 10 },
    toolCalls: [],
    ...overrides
  };
}

describe('AgentService', () => {
  let execute: jest.Mock;
  let recorder: { record: jest.Mock; getById: jest.Mock; list: jest.Mock };
  let saveTrace: jest.Mock;
  let isHealthy: jest.Mock;
  let service: AgentService;

  beforeEach(() => {
    const config: Record<string, unknown> = {
      TRACING_ENABLED: true,
      TRACING_SAMPLE_RATE: 1,
      TRACE_UI_BASE_URL: 'http://traces.local',
      LLM_MODEL_NAME: 'test-model'
    };
    const configService = {
      get: jest.fn((key: string, def?: unknown) => config[key] ?? def)
    } as unknown as ConfigService;

    execute = jest.fn().mockResolvedValue(engineResult());
    recorder = {
      record: jest.fn().mockReturnValue('run-1'),
      getById: jest.fn(),
      list: jest.fn()
    };
    saveTrace = jest.fn();
    isHealthy = jest.fn().mockResolvedValue(true);

    service = new AgentService(
      { execute } as unknown as StateGraphEngine,
      recorder as unknown as AgentRunRecorderService,
      new TraceService({ saveTrace } as unknown as TraceRepository, configService),
      { getAll: () => [{}, {}, {}] } as unknown as ToolRegistryService,
      { isHealthy } as unknown as RedisService,
      configService
    );
  });

  describe('run', () => {
    it('executes the engine, records the run and links the trace', async () => {
      const result = await service.run(
        { message: 'Hi', threadId: 'thread-1', metadata: { source: 'test' } },
        USER
      );

      expect(execute).toHaveBeenCalledWith({
        threadId: 'thread-1',
        message: 'Hi',
        userId: 'user-1',
        auth: { mode: 'user', jwt: 'test-jwt' }
      });
      expect(result).toMatchObject({
        response: 'Hello!',
        threadId: 'thread-1',
        runId: 'run-1',
        status: 'success',
        plan: 'Greet the user.',
        truncated: false
      });
      expect(result.traceId).toEqual(expect.any(String));
      expect(result.traceUrl).toBe(`http://traces.local/trace/${result.traceId}`);

      expect(recorder.record).toHaveBeenCalledWith({
        threadId: 'thread-1',
        userId: 'user-1',
        input: 'Hi',
        output: 'Hello!',
        status: 'success',
        latencyMs: result.latencyMs,
        traceId: result.traceId,
        tokenUsage: { promptTokens: 20, completionTokens: 10 },
        truncated: false,
        metadata: { source: 'test' }
      });
      expect(saveTrace).toHaveBeenCalledTimes(1);
      expect(saveTrace.mock.calls[0][0]).toMatchObject({
        id: result.traceId,
        name: 'agent_run',
        userId: 'user-1',
        metadata: { threadId: 'thread-1', source: 'test' }
      });
    });

    it('generates a thread id when none is given', async () => {
      const result = await service.run({ message: 'Hi' }, USER);
      expect(result.threadId).toMatch(/^[0-9a-f-]{36}$/);
      expect(execute.mock.calls[0][0].threadId).toBe(result.threadId);
    });

    it('records the node failure on an error run', async () => {
      execute.mockResolvedValue(
        engineResult({
          status: 'error',
          response: ERROR_RESPONSE,
          plan: null,
          error: new NodeFailureError('planner', 'rate limited')
        })
      );

      const result = await service.run({ message: 'Hi' }, USER);

      expect(result.status).toBe('error');
      expect(recorder.record.mock.calls[0][0]).toMatchObject({
        status: 'error',
        output: ERROR_RESPONSE,
        metadata: { error: 'planner failed: rate limited' }
      });
    });

    it('rejects an empty message without recording or tracing', async () => {
      await expect(service.run({ message: '  ' }, USER)).rejects.toThrow(
        ValidationError
      );
      expect(execute).not.toHaveBeenCalled();
      expect(recorder.record).not.toHaveBeenCalled();
      expect(saveTrace).not.toHaveBeenCalled();
    });

    it('does not record a denied thread access', async () => {
      execute.mockRejectedValue(new ThreadAccessDeniedError('thread-1'));

      await expect(
        service.run({ message: 'Hi', threadId: 'thread-1' }, USER)
      ).rejects.toThrow(ThreadAccessDeniedError);
      expect(recorder.record).not.toHaveBeenCalled();
    });

    it('records and rethrows a checkpoint store outage', async () => {
      execute.mockRejectedValue(
        new StoreUnavailableError('checkpoint', new Error('Connection is closed.'))
      );

      await expect(
        service.run({ message: 'Hi', threadId: 'thread-1' }, USER)
      ).rejects.toThrow(StoreUnavailableError);
      expect(recorder.record).toHaveBeenCalledTimes(1);
      expect(recorder.record.mock.calls[0][0]).toMatchObject({
        status: 'error',
        output: ERROR_RESPONSE,
        metadata: {
          error: 'checkpoint store unavailable: Connection is closed.'
        }
      });
      expect(saveTrace).toHaveBeenCalledTimes(1);
    });
  });

  describe('getRun', () => {
    it("returns the caller's run", () => {
      const run = makeRunRecord();
      recorder.getById.mockReturnValue(run);
      expect(service.getRun('run-1', 'user-1')).toBe(run);
    });

    it('throws NotFoundException for an unknown run', () => {
      recorder.getById.mockReturnValue(undefined);
      expect(() => service.getRun('missing', 'user-1')).toThrow(
        NotFoundException
      );
    });

    it("throws ForbiddenException for another user's run", () => {
      recorder.getById.mockReturnValue(makeRunRecord({ userId: 'user-2' }));
      expect(() => service.getRun('run-1', 'user-1')).toThrow(
        ForbiddenException
      );
    });
  });

  describe('getHealth', () => {
    it('reports healthy with the configured model and tool count', async () => {
      await expect(service.getHealth()).resolves.toEqual({
        status: 'healthy',
        tracingEnabled: true,
        tracingConfigured: true,
        modelName: 'test-model',
        availableTools: 3
      });
    });

    it('reports degraded when Redis is down', async () => {
      isHealthy.mockResolvedValue(false);
      expect((await service.getHealth()).status).toBe('degraded');
    });
  });
});
