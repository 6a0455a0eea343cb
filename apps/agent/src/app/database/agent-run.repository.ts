import { Injectable } from '@nestjs/common';

import { isRecord, safeParseJson } from '../common/json.util';
import {
  AgentRunQuery,
  AgentRunRecord,
  PaginatedResponse,
  RunStatus
} from '../common/interfaces';
import { DatabaseService } from './database.service';

interface AgentRunRow {
  id: string;
  thread_id: string;
  user_id: string;
  input: string;
  output: string;
  status: string;
  latency_ms: number;
  trace_id: string | null;
  prompt_tokens: number | null;
  completion_tokens: number | null;
  truncated: number;
  metadata: string | null;
  created_at: string;
}

const RUN_STATUSES: readonly RunStatus[] = ['success', 'error', 'timeout'];

/** Escape LIKE wildcards so `search` is matched as a literal substring. */
function likePattern(search: string): string {
  return `%${search.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

@Injectable()
export class AgentRunRepository {
  constructor(private readonly db: DatabaseService) {}

  insert(record: AgentRunRecord): void {
    this.db
      .getDb()
      .prepare(
        `INSERT INTO agent_runs (
          id, thread_id, user_id, input, output, status, latency_ms,
          trace_id, prompt_tokens, completion_tokens, truncated, metadata, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        record.id,
        record.threadId,
        record.userId,
        record.input,
        record.output,
        record.status,
        record.latencyMs,
        record.traceId ?? null,
        record.promptTokens ?? null,
        record.completionTokens ?? null,
        record.truncated ? 1 : 0,
        record.metadata ? JSON.stringify(record.metadata) : null,
        record.createdAt
      );
  }

  getById(runId: string): AgentRunRecord | undefined {
    const row = this.db
      .getDb()
      .prepare<unknown[], AgentRunRow>(`SELECT * FROM agent_runs WHERE id = ?`)
      .get(runId);
    return row ? this._mapRow(row) : undefined;
  }

  /** Newest first. `search` is a case-insensitive substring match over input and output. */
  list(query: AgentRunQuery): PaginatedResponse<AgentRunRecord> {
    const clauses = ['user_id = ?'];
    const params: (string | number)[] = [query.userId];

    if (query.threadId) {
      clauses.push('thread_id = ?');
      params.push(query.threadId);
    }
    if (query.status) {
      clauses.push('status = ?');
      params.push(query.status);
    }
    if (query.search) {
      const pattern = likePattern(query.search);
      clauses.push(`(input LIKE ? ESCAPE '\\' OR output LIKE ? ESCAPE '\\')`);
      params.push(pattern, pattern);
    }

    const where = clauses.join(' AND ');
    const db = this.db.getDb();
    const totalRow = db
      .prepare<unknown[], { total: number }>(
        `SELECT COUNT(*) as total FROM agent_runs WHERE ${where}`
      )
      .get(...params);
    const rows = db
      .prepare<unknown[], AgentRunRow>(
        `SELECT * FROM agent_runs WHERE ${where}
         ORDER BY created_at DESC, rowid DESC LIMIT ? OFFSET ?`
      )
      .all(...params, query.limit, query.skip);

    return {
      data: rows.map((row) => this._mapRow(row)),
      total: totalRow?.total ?? 0,
      limit: query.limit,
      offset: query.skip
    };
  }

  /**
   * Runs created in `[since, until)` that are missing a score for at least one
   * of `metricNames`, oldest first.
   */
  findMissingScores(
    since: string,
    until: string,
    metricNames: string[],
    limit = 100
  ): AgentRunRecord[] {
    if (metricNames.length === 0) return [];
    const placeholders = metricNames.map(() => '?').join(', ');
    const rows = this.db
      .getDb()
      .prepare<unknown[], AgentRunRow>(
        `SELECT r.* FROM agent_runs r
         WHERE r.created_at >= ? AND r.created_at < ?
           AND (
             SELECT COUNT(DISTINCT s.metric_name) FROM evaluation_scores s
             WHERE s.run_id = r.id AND s.metric_name IN (${placeholders})
           ) < ?
         ORDER BY r.created_at ASC, r.rowid ASC
         LIMIT ?`
      )
      .all(since, until, ...metricNames, metricNames.length, limit);
    return rows.map((row) => this._mapRow(row));
  }

  private _mapRow(row: AgentRunRow): AgentRunRecord {
    const metadata = safeParseJson(row.metadata);
    const status = RUN_STATUSES.find((s) => s === row.status) ?? 'error';
    return {
      id: row.id,
      threadId: row.thread_id,
      userId: row.user_id,
      input: row.input,
      output: row.output,
      status,
      latencyMs: row.latency_ms,
      traceId: row.trace_id ?? undefined,
      promptTokens: row.prompt_tokens ?? undefined,
      completionTokens: row.completion_tokens ?? undefined,
      truncated: row.truncated === 1,
      metadata: isRecord(metadata) ? metadata : undefined,
      createdAt: row.created_at
    };
  }
}
