import {
  ConflictException,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
  OnModuleDestroy
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { Observable, Subject } from 'rxjs';
import { setTimeout as sleep } from 'timers/promises';

import { errorMessage } from '../common/agent.errors';
import { AgentRunRecord, EvaluationScoreRecord } from '../common/interfaces';
import { truncate } from '../common/json.util';
import { AgentRunRepository } from '../database/agent-run.repository';
import { EvaluationRepository } from '../database/evaluation.repository';
import { TraceRepository } from '../database/trace.repository';
import {
  EvaluationEvent,
  EvaluationMetric,
  EvaluationReport,
  EvaluationWindow,
  MetricResult,
  MetricSummary,
  RunEvaluationDetail
} from './evaluation.types';
import { LlmJudgeService } from './llm-judge.service';
import { loadMetrics } from './metric-loader';

const MAX_RUNS_PER_BATCH = 100;
const TOOL_OUTPUT_PREVIEW_CHARS = 100;
const HOUR_MS = 60 * 60 * 1000;

export interface ManualScoreInput {
  runId: string;
  metricName: string;
  score: number;
  metadata?: Record<string, unknown>;
}

function emptySummary(metrics: EvaluationMetric[]): Record<string, MetricSummary> {
  const summary: Record<string, MetricSummary> = {};
  for (const metric of metrics) {
    summary[metric.name] = { successCount: 0, failureCount: 0, avgScore: 0 };
  }
  return summary;
}

@Injectable()
export class EvaluationPipelineService implements OnModuleDestroy {
  private readonly logger = new Logger(EvaluationPipelineService.name);
  private readonly events$ = new Subject<EvaluationEvent>();
  private running = false;

  constructor(
    private readonly agentRunRepository: AgentRunRepository,
    private readonly evaluationRepository: EvaluationRepository,
    private readonly traceRepository: TraceRepository,
    private readonly judge: LlmJudgeService,
    private readonly configService: ConfigService
  ) {}

  onModuleDestroy(): void {
    this.events$.complete();
  }

  get events(): Observable<EvaluationEvent> {
    return this.events$.asObservable();
  }

  get isRunning(): boolean {
    return this.running;
  }

  metrics(): EvaluationMetric[] {
    return loadMetrics(
      this.configService.get<string>('EVALUATION_PROMPTS_DIR', 'evals/prompts')
    );
  }

  /** The default window: the last `EVALUATION_LOOKBACK_HOURS` up to now. */
  lookbackWindow(now = new Date()): EvaluationWindow {
    const hours = this.configService.get<number>('EVALUATION_LOOKBACK_HOURS', 24);
    return { since: new Date(now.getTime() - hours * HOUR_MS), until: now };
  }

  /**
   * Score every unscored `(run, metric)` pair among the runs created in the
   * window. A judge failure is counted against its metric and the batch
   * moves on. Pairs that already have a score are never judged again.
   */
  async run(
    window: EvaluationWindow = this.lookbackWindow()
  ): Promise<EvaluationReport> {
    if (this.running) {
      throw new ConflictException('Evaluation run already in progress');
    }
    this.running = true;
    try {
      return await this._run(window);
    } catch (err) {
      this.events$.next({
        type: 'run_error',
        data: { error: errorMessage(err) }
      });
      throw err;
    } finally {
      this.running = false;
    }
  }

  /** Store a caller-supplied score on one of the caller's runs. Idempotent. */
  recordManualScore(
    userId: string,
    input: ManualScoreInput
  ): { created: boolean; score: EvaluationScoreRecord } {
    const run = this.agentRunRepository.getById(input.runId);
    if (!run) {
      throw new NotFoundException(`Run ${input.runId} not found`);
    }
    if (run.userId !== userId) {
      throw new ForbiddenException('Run does not belong to this user');
    }

    const created = this.evaluationRepository.insertIfAbsent({
      id: randomUUID(),
      runId: input.runId,
      metricName: input.metricName,
      score: input.score,
      source: 'manual',
      metadata: input.metadata,
      createdAt: new Date().toISOString()
    });
    const score = this.evaluationRepository.getByRunAndMetric(
      input.runId,
      input.metricName
    );
    if (!score) {
      throw new NotFoundException(
        `Score ${input.metricName} for run ${input.runId} not found`
      );
    }
    return { created, score };
  }

  getScores(runId: string, userId: string): EvaluationScoreRecord[] {
    const run = this.agentRunRepository.getById(runId);
    if (!run) {
      throw new NotFoundException(`Run ${runId} not found`);
    }
    if (run.userId !== userId) {
      throw new ForbiddenException('Run does not belong to this user');
    }
    return this.evaluationRepository.getByRun(runId);
  }

  private async _run(window: EvaluationWindow): Promise<EvaluationReport> {
    const start = performance.now();
    const metrics = this.metrics();
    const since = window.since.toISOString();
    const until = window.until.toISOString();
    const sleepMs = this.configService.get<number>('EVALUATION_SLEEP_MS', 1000);

    const runs = this.agentRunRepository.findMissingScores(
      since,
      until,
      metrics.map((m) => m.name),
      MAX_RUNS_PER_BATCH
    );
    this.logger.log(
      `Evaluating ${runs.length} run(s) against ${metrics.length} metric(s) from ${since} to ${until}`
    );
    this.events$.next({
      type: 'run_started',
      data: { since, until, runs: runs.length }
    });

    const perMetricSummary = emptySummary(metrics);
    const scoreTotals: Record<string, number> = {};
    const details: RunEvaluationDetail[] = [];

    for (const [index, run] of runs.entries()) {
      const detail = await this._evaluateRun(run, metrics);
      for (const [metricName, result] of Object.entries(detail.metricsResults)) {
        const summary = perMetricSummary[metricName];
        if (result.success) {
          summary.successCount++;
          scoreTotals[metricName] = (scoreTotals[metricName] ?? 0) + result.score;
        } else {
          summary.failureCount++;
        }
      }
      details.push(detail);
      if (sleepMs > 0 && index < runs.length - 1) await sleep(sleepMs);
    }

    for (const [metricName, summary] of Object.entries(perMetricSummary)) {
      if (summary.successCount > 0) {
        summary.avgScore =
          Math.round((scoreTotals[metricName] / summary.successCount) * 100) / 100;
      }
    }

    const successCount = details.filter((d) => d.success).length;
    const report: EvaluationReport = {
      timestamp: new Date().toISOString(),
      model: this.judge.modelName,
      since,
      until,
      durationMs: Math.round(performance.now() - start),
      total: details.length,
      successCount,
      failureCount: details.length - successCount,
      perMetricSummary,
      details
    };
    this.logger.log(
      `Evaluation completed: ${successCount}/${report.total} run(s) succeeded in ${report.durationMs}ms`
    );
    this.events$.next({ type: 'run_complete', data: report });
    return report;
  }

  private async _evaluateRun(
    run: AgentRunRecord,
    metrics: EvaluationMetric[]
  ): Promise<RunEvaluationDetail> {
    const scored = this.evaluationRepository.getScoredMetricNames(run.id);
    const generation = this._formatGeneration(run);
    const detail: RunEvaluationDetail = {
      runId: run.id,
      success: false,
      metricsEvaluated: 0,
      metricsSucceeded: 0,
      metricsResults: {}
    };

    for (const metric of metrics) {
      if (scored.has(metric.name)) continue;
      const result = await this._scoreMetric(run, metric, generation);
      detail.metricsEvaluated++;
      if (result.success) detail.metricsSucceeded++;
      detail.metricsResults[metric.name] = result;
      this.events$.next({
        type: 'metric_scored',
        data: { runId: run.id, metricName: metric.name, result }
      });
    }

    detail.success = detail.metricsSucceeded === detail.metricsEvaluated;
    return detail;
  }

  private async _scoreMetric(
    run: AgentRunRecord,
    metric: EvaluationMetric,
    generation: string
  ): Promise<MetricResult> {
    if (!run.input.trim() || !run.output.trim()) {
      this.logger.warn(
        `Skipping ${metric.name} for run ${run.id}: missing input or output`
      );
      return { success: false, error: 'missing input or output' };
    }

    try {
      const { score, reasoning } = await this.judge.judge(
        metric,
        run.input,
        generation
      );
      this.evaluationRepository.insertIfAbsent({
        id: randomUUID(),
        runId: run.id,
        metricName: metric.name,
        score,
        source: 'judge',
        metadata: { reasoning, model: this.judge.modelName },
        createdAt: new Date().toISOString()
      });
      return { success: true, score, reasoning };
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }

  /** The run's answer, preceded by the tool calls recorded on its trace. */
  private _formatGeneration(run: AgentRunRecord): string {
    const toolSpans = run.traceId
      ? this.traceRepository.getSpans(run.traceId, 'tool:')
      : [];
    if (toolSpans.length === 0) return run.output;

    const toolLines = toolSpans.map((span) => {
      const output = span.attributes?.output;
      const text = typeof output === 'string' ? output : (span.error ?? '');
      return `tool ${span.name.slice('tool:'.length)}: ${truncate(text, TOOL_OUTPUT_PREVIEW_CHARS)}`;
    });
    return [...toolLines, `agent: ${run.output}`].join('\n');
  }
}
