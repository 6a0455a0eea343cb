import { Injectable } from '@nestjs/common';

import { isRecord, safeParseJson } from '../common/json.util';
import { SpanRecord, TraceRecord } from '../common/interfaces';
import { DatabaseService } from './database.service';

interface SpanRow {
  id: string;
  trace_id: string;
  parent_span_id: string | null;
  name: string;
  started_at: string;
  ended_at: string;
  duration_ms: number;
  status: string;
  attributes: string | null;
  error: string | null;
}

interface TraceRow {
  id: string;
  name: string;
  user_id: string;
  metadata: string | null;
  started_at: string;
  ended_at: string;
}

@Injectable()
export class TraceRepository {
  constructor(private readonly db: DatabaseService) {}

  /** Persist a finished trace and its spans in one transaction. */
  saveTrace(trace: TraceRecord, spans: SpanRecord[]): void {
    const db = this.db.getDb();
    const insertTrace = db.prepare(
      `INSERT INTO traces (id, name, user_id, metadata, started_at, ended_at)
       VALUES (?, ?, ?, ?, ?, ?)`
    );
    const insertSpan = db.prepare(
      `INSERT INTO spans (
        id, trace_id, parent_span_id, name, started_at, ended_at,
        duration_ms, status, attributes, error
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );

    const txn = db.transaction(() => {
      insertTrace.run(
        trace.id,
        trace.name,
        trace.userId,
        trace.metadata ? JSON.stringify(trace.metadata) : null,
        trace.startedAt,
        trace.endedAt
      );
      for (const span of spans) {
        insertSpan.run(
          span.id,
          span.traceId,
          span.parentSpanId ?? null,
          span.name,
          span.startedAt,
          span.endedAt,
          span.durationMs,
          span.status,
          span.attributes ? JSON.stringify(span.attributes) : null,
          span.error ?? null
        );
      }
    });
    txn();
  }

  getTrace(traceId: string): TraceRecord | undefined {
    const row = this.db
      .getDb()
      .prepare<unknown[], TraceRow>(`SELECT * FROM traces WHERE id = ?`)
      .get(traceId);
    if (!row) return undefined;
    const metadata = safeParseJson(row.metadata);
    return {
      id: row.id,
      name: row.name,
      userId: row.user_id,
      metadata: isRecord(metadata) ? metadata : undefined,
      startedAt: row.started_at,
      endedAt: row.ended_at
    };
  }

  /** Spans in start order, optionally restricted to names starting with `namePrefix`. */
  getSpans(traceId: string, namePrefix?: string): SpanRecord[] {
    const rows = namePrefix
      ? this.db
          .getDb()
          .prepare<unknown[], SpanRow>(
            `SELECT * FROM spans WHERE trace_id = ? AND substr(name, 1, ?) = ?
             ORDER BY started_at, rowid`
          )
          .all(traceId, namePrefix.length, namePrefix)
      : this.db
          .getDb()
          .prepare<unknown[], SpanRow>(
            `SELECT * FROM spans WHERE trace_id = ? ORDER BY started_at, rowid`
          )
          .all(traceId);
    return rows.map((row) => this._mapSpan(row));
  }

  private _mapSpan(row: SpanRow): SpanRecord {
    const attributes = safeParseJson(row.attributes);
    return {
      id: row.id,
      traceId: row.trace_id,
      parentSpanId: row.parent_span_id ?? undefined,
      name: row.name,
      startedAt: row.started_at,
      endedAt: row.ended_at,
      durationMs: row.duration_ms,
      status: row.status === 'error' ? 'error' : 'ok',
      attributes: isRecord(attributes) ? attributes : undefined,
      error: row.error ?? undefined
    };
  }
}
