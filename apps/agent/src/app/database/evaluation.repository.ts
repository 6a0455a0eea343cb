import { Injectable } from '@nestjs/common';

import { isRecord, safeParseJson } from '../common/json.util';
import { EvaluationScoreRecord } from '../common/interfaces';
import { DatabaseService } from './database.service';

interface EvaluationScoreRow {
  id: string;
  run_id: string;
  metric_name: string;
  score: number;
  source: string;
  metadata: string | null;
  created_at: string;
}

@Injectable()
export class EvaluationRepository {
  constructor(private readonly db: DatabaseService) {}

  /**
   * Insert unless `(runId, metricName)` already has a score. Returns `false`
   * when the pair was already scored; the stored score is never overwritten.
   */
  insertIfAbsent(record: EvaluationScoreRecord): boolean {
    const result = this.db
      .getDb()
      .prepare(
        `INSERT INTO evaluation_scores (id, run_id, metric_name, score, source, metadata, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT (run_id, metric_name) DO NOTHING`
      )
      .run(
        record.id,
        record.runId,
        record.metricName,
        record.score,
        record.source,
        record.metadata ? JSON.stringify(record.metadata) : null,
        record.createdAt
      );
    return result.changes === 1;
  }

  getByRunAndMetric(
    runId: string,
    metricName: string
  ): EvaluationScoreRecord | undefined {
    const row = this.db
      .getDb()
      .prepare<unknown[], EvaluationScoreRow>(
        `SELECT * FROM evaluation_scores WHERE run_id = ? AND metric_name = ?`
      )
      .get(runId, metricName);
    return row ? this._mapRow(row) : undefined;
  }

  getByRun(runId: string): EvaluationScoreRecord[] {
    return this.db
      .getDb()
      .prepare<unknown[], EvaluationScoreRow>(
        `SELECT * FROM evaluation_scores WHERE run_id = ? ORDER BY metric_name`
      )
      .all(runId)
      .map((row) => this._mapRow(row));
  }

  getScoredMetricNames(runId: string): Set<string> {
    const rows = this.db
      .getDb()
      .prepare<unknown[], { metric_name: string }>(
        `SELECT metric_name FROM evaluation_scores WHERE run_id = ?`
      )
      .all(runId);
    return new Set(rows.map((row) => row.metric_name));
  }

  countAll(): number {
    const row = this.db
      .getDb()
      .prepare<unknown[], { n: number }>(
        `SELECT COUNT(*) as n FROM evaluation_scores`
      )
      .get();
    return row?.n ?? 0;
  }

  private _mapRow(row: EvaluationScoreRow): EvaluationScoreRecord {
    const metadata = safeParseJson(row.metadata);
    return {
      id: row.id,
      runId: row.run_id,
      metricName: row.metric_name,
      score: row.score,
      source: row.source === 'manual' ? 'manual' : 'judge',
      metadata: isRecord(metadata) ? metadata : undefined,
      createdAt: row.created_at
    };
  }
}
