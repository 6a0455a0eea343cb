import {
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import {
  errorMessage,
  ThreadAccessDeniedError,
  ThreadBusyError,
  ValidationError
} from '../common/agent.errors';
import {
  AgentHealth,
  AgentRunQuery,
  AgentRunRecord,
  AuthUser,
  InvocationRequest,
  InvocationResponse,
  PaginatedResponse
} from '../common/interfaces';
import { AgentRunRecorderService } from '../recorder/agent-run-recorder.service';
import { RedisService } from '../redis/redis.service';
import { ToolRegistryService } from '../tools/tool-registry.service';
import { TraceService } from '../tracing/trace.service';
import {
  ERROR_RESPONSE,
  resolveThreadId,
  StateGraphEngine,
  validateInvocation
} from './state-graph.engine';

/** Rejections that happen before the graph runs and are never recorded. */
function isRejection(err: unknown): boolean {
  return (
    err instanceof ValidationError ||
    err instanceof ThreadAccessDeniedError ||
    err instanceof ThreadBusyError
  );
}

@Injectable()
export class AgentService {
  private readonly logger = new Logger(AgentService.name);

  constructor(
    private readonly engine: StateGraphEngine,
    private readonly recorder: AgentRunRecorderService,
    private readonly traceService: TraceService,
    private readonly toolRegistry: ToolRegistryService,
    private readonly redisService: RedisService,
    private readonly configService: ConfigService
  ) {}

  /**
   * One invocation: trace it, run the graph, record the outcome. Every run
   * that reached the graph is recorded exactly once, whatever its status.
   */
  async run(
    request: InvocationRequest,
    user: AuthUser
  ): Promise<InvocationResponse> {
    validateInvocation(request.message, request.threadId);
    const threadId = resolveThreadId(request.threadId);
    const handle = this.traceService.beginTrace(user.userId, 'agent_run', {
      threadId,
      ...request.metadata
    });
    const start = performance.now();

    try {
      const result = await this.traceService.runInTrace(handle, () =>
        this.engine.execute({
          threadId,
          message: request.message,
          userId: user.userId,
          auth: { mode: 'user', jwt: user.rawJwt }
        })
      );
      const latencyMs = Math.ceil(performance.now() - start);

      const runId = this.recorder.record({
        threadId,
        userId: user.userId,
        input: request.message,
        output: result.response,
        status: result.status,
        latencyMs,
        traceId: handle.traceId,
        tokenUsage: result.tokenUsage,
        truncated: result.truncated,
        metadata: result.error
          ? { ...request.metadata, error: result.error.message }
          : request.metadata
      });

      return {
        response: result.response,
        threadId,
        traceId: handle.traceId,
        traceUrl: handle.sampled
          ? this.traceService.traceUrl(handle.traceId)
          : null,
        runId,
        latencyMs,
        status: result.status,
        plan: result.plan,
        truncated: result.truncated
      };
    } catch (err) {
      if (!isRejection(err)) {
        this.logger.error(
          `Run on thread ${threadId} failed outside the graph: ${errorMessage(err)}`
        );
        this.recorder.record({
          threadId,
          userId: user.userId,
          input: request.message,
          output: ERROR_RESPONSE,
          status: 'error',
          latencyMs: Math.ceil(performance.now() - start),
          traceId: handle.traceId,
          metadata: { ...request.metadata, error: errorMessage(err) }
        });
      }
      throw err;
    } finally {
      this.traceService.flush(handle);
    }
  }

  getRun(runId: string, userId: string): AgentRunRecord {
    const run = this.recorder.getById(runId);
    if (!run) {
      throw new NotFoundException(`Run ${runId} not found`);
    }
    if (run.userId !== userId) {
      throw new ForbiddenException('Run does not belong to this user');
    }
    return run;
  }

  listRuns(query: AgentRunQuery): PaginatedResponse<AgentRunRecord> {
    return this.recorder.list(query);
  }

  async getHealth(): Promise<AgentHealth> {
    const redisHealthy = await this.redisService.isHealthy();
    return {
      status: redisHealthy ? 'healthy' : 'degraded',
      tracingEnabled: this.traceService.enabled,
      tracingConfigured: Boolean(
        this.configService.get<string>('TRACE_UI_BASE_URL')
      ),
      modelName: this.configService.get<string>('LLM_MODEL_NAME', 'gpt-4o-mini'),
      availableTools: this.toolRegistry.getAll().length
    };
  }
}
