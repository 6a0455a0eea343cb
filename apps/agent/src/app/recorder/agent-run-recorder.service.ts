import { Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';

import { errorMessage } from '../common/agent.errors';
import {
  AgentRunQuery,
  AgentRunRecord,
  PaginatedResponse,
  RunStatus,
  TokenUsage
} from '../common/interfaces';
import { AgentRunRepository } from '../database/agent-run.repository';

export const MAX_PAGE_SIZE = 1000;

export interface RunSummary {
  threadId: string;
  userId: string;
  input: string;
  output: string;
  status: RunStatus;
  latencyMs: number;
  traceId?: string | null;
  tokenUsage?: TokenUsage;
  truncated?: boolean;
  metadata?: Record<string, unknown>;
}

@Injectable()
export class AgentRunRecorderService {
  private readonly logger = new Logger(AgentRunRecorderService.name);

  constructor(private readonly agentRunRepository: AgentRunRepository) {}

  /**
   * Persist one terminated invocation. The run id is generated before the
   * write and returned even when the write fails.
   */
  record(summary: RunSummary): string {
    const runId = randomUUID();
    const record: AgentRunRecord = {
      id: runId,
      threadId: summary.threadId,
      userId: summary.userId,
      input: summary.input,
      output: summary.output,
      status: summary.status,
      latencyMs: summary.latencyMs,
      traceId: summary.traceId ?? undefined,
      promptTokens: summary.tokenUsage?.promptTokens,
      completionTokens: summary.tokenUsage?.completionTokens,
      truncated: summary.truncated ?? false,
      metadata: summary.metadata,
      createdAt: new Date().toISOString()
    };

    try {
      this.agentRunRepository.insert(record);
    } catch (err) {
      this.logger.warn(`Failed to record run ${runId}: ${errorMessage(err)}`);
    }
    return runId;
  }

  getById(runId: string): AgentRunRecord | undefined {
    return this.agentRunRepository.getById(runId);
  }

  list(query: AgentRunQuery): PaginatedResponse<AgentRunRecord> {
    return this.agentRunRepository.list({
      ...query,
      skip: Math.max(0, query.skip),
      limit: Math.min(Math.max(1, query.limit), MAX_PAGE_SIZE)
    });
  }
}
