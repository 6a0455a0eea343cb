import { RunStatus } from './agent.types';

export interface AgentRunRecord {
  id: string;
  threadId: string;
  userId: string;
  input: string;
  output: string;
  status: RunStatus;
  latencyMs: number;
  traceId?: string;
  promptTokens?: number;
  completionTokens?: number;
  truncated: boolean;
  metadata?: Record<string, unknown>;
  createdAt: string;
}

export interface AgentRunQuery {
  userId: string;
  skip: number;
  limit: number;
  threadId?: string;
  search?: string;
  status?: RunStatus;
}

export interface PaginatedResponse<T> {
  data: T[];
  total: number;
  limit: number;
  offset: number;
}

export interface EvaluationScoreRecord {
  id: string;
  runId: string;
  metricName: string;
  score: number;
  source: 'judge' | 'manual';
  metadata?: Record<string, unknown>;
  createdAt: string;
}

export interface TraceRecord {
  id: string;
  name: string;
  userId: string;
  metadata?: Record<string, unknown>;
  startedAt: string;
  endedAt: string;
}

export type SpanStatus = 'ok' | 'error';

export interface SpanRecord {
  id: string;
  traceId: string;
  parentSpanId?: string;
  name: string;
  startedAt: string;
  endedAt: string;
  durationMs: number;
  status: SpanStatus;
  attributes?: Record<string, unknown>;
  error?: string;
}
