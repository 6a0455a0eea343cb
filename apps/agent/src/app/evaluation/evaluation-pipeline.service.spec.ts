import {
  ConflictException,
  ForbiddenException,
  NotFoundException
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { JudgeFailureError } from '../common/agent.errors';
import { AgentRunRepository } from '../database/agent-run.repository';
import { DatabaseService } from '../database/database.service';
import { EvaluationRepository } from '../database/evaluation.repository';
import { TraceRepository } from '../database/trace.repository';
import { makeRunRecord } from '../../test-fixtures';
import { EvaluationPipelineService } from './evaluation-pipeline.service';
import { EvaluationEvent, EvaluationMetric, JudgeScore } from './evaluation.types';
import { LlmJudgeService } from './llm-judge.service';

const WINDOW = {
  since: new Date('2025-06-15T00:00:00.000Z'),
  until: new Date('2025-06-16T00:00:00.000Z')
};

describe('EvaluationPipelineService', () => {
  let tmpDir: string;
  let dbService: DatabaseService;
  let runs: AgentRunRepository;
  let scores: EvaluationRepository;
  let traces: TraceRepository;
  let judge: jest.Mock<
    Promise<JudgeScore>,
    [EvaluationMetric, string, string]
  >;
  let service: EvaluationPipelineService;

  beforeEach(() => {
    tmpDir = mkdtempSync(join(tmpdir(), 'evaluation-pipeline-test-'));
    const promptsDir = join(tmpDir, 'prompts');
    mkdirSync(promptsDir);
    writeFileSync(join(promptsDir, 'correctness.md'), 'Rate correctness.');
    writeFileSync(join(promptsDir, 'helpfulness.md'), 'Rate helpfulness.');

    const config: Record<string, unknown> = {
      AGENT_DB_PATH: join(tmpDir, 'agent.db'),
      EVALUATION_PROMPTS_DIR: promptsDir,
      EVALUATION_SLEEP_MS: 0,
      EVALUATION_LOOKBACK_HOURS: 24
    };
    const configService = {
      get: jest.fn((key: string, def?: unknown) => config[key] ?? def)
    } as unknown as ConfigService;

    dbService = new DatabaseService(configService);
    dbService.onModuleInit();
    runs = new AgentRunRepository(dbService);
    scores = new EvaluationRepository(dbService);
    traces = new TraceRepository(dbService);

    runs.insert(makeRunRecord({ id: 'run-1', createdAt: '2025-06-15T11:00:00.000Z' }));
    runs.insert(makeRunRecord({ id: 'run-2', createdAt: '2025-06-15T11:30:00.000Z' }));
    runs.insert(makeRunRecord({ id: 'run-old', createdAt: '2025-06-14T11:00:00.000Z' }));

    judge = jest.fn<Promise<JudgeScore>, [EvaluationMetric, string, string]>(
      async () => ({ score: 0.8, reasoning: 'Accurate.' })
    );
    service = new EvaluationPipelineService(
      runs,
      scores,
      traces,
      { judge, modelName: 'judge-model' } as unknown as LlmJudgeService,
      configService
    );
  });

  afterEach(() => {
    dbService.onModuleDestroy();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('scores every unscored (run, metric) pair in the window', async () => {
    const report = await service.run(WINDOW);

    expect(report).toMatchObject({
      model: 'judge-model',
      since: '2025-06-15T00:00:00.000Z',
      until: '2025-06-16T00:00:00.000Z',
      total: 2,
      successCount: 2,
      failureCount: 0,
      perMetricSummary: {
        correctness: { successCount: 2, failureCount: 0, avgScore: 0.8 },
        helpfulness: { successCount: 2, failureCount: 0, avgScore: 0.8 }
      }
    });
    expect(report.details.map((d) => d.runId)).toEqual(['run-1', 'run-2']);
    expect(judge).toHaveBeenCalledTimes(4);
    expect(scores.countAll()).toBe(4);
    expect(scores.getByRunAndMetric('run-1', 'correctness')).toMatchObject({
      score: 0.8,
      source: 'judge',
      metadata: { reasoning: 'Accurate.', model: 'judge-model' }
    });
  });

  it('never re-scores a pair on an overlapping window', async () => {
    await service.run(WINDOW);
    const second = await service.run({
      since: new Date('2025-06-15T10:00:00.000Z'),
      until: WINDOW.until
    });

    expect(second.total).toBe(0);
    expect(judge).toHaveBeenCalledTimes(4);
    expect(scores.countAll()).toBe(4);
  });

  it('judges only the metrics a run is still missing', async () => {
    scores.insertIfAbsent({
      id: 'manual-1',
      runId: 'run-1',
      metricName: 'correctness',
      score: 1,
      source: 'manual',
      createdAt: '2025-06-15T12:00:00.000Z'
    });

    const report = await service.run(WINDOW);

    expect(judge).toHaveBeenCalledTimes(3);
    expect(report.details[0]).toMatchObject({
      runId: 'run-1',
      success: true,
      metricsEvaluated: 1,
      metricsSucceeded: 1
    });
    expect(scores.getByRunAndMetric('run-1', 'correctness')?.score).toBe(1);
  });

  it('counts a judge failure and continues with the batch', async () => {
    judge.mockImplementation(async (metric, input) => {
      if (metric.name === 'helpfulness' && input === 'fail me') {
        throw new JudgeFailureError('helpfulness', 3, new Error('timeout'));
      }
      return { score: metric.name === 'correctness' ? 0.6 : 0.8, reasoning: 'ok' };
    });
    runs.insert(
      makeRunRecord({
        id: 'run-3',
        input: 'fail me',
        createdAt: '2025-06-15T12:00:00.000Z'
      })
    );

    const report = await service.run(WINDOW);

    expect(report).toMatchObject({ total: 3, successCount: 2, failureCount: 1 });
    expect(report.perMetricSummary.helpfulness).toEqual({
      successCount: 2,
      failureCount: 1,
      avgScore: 0.8
    });
    expect(report.perMetricSummary.correctness.avgScore).toBe(0.6);
    expect(report.details[2].metricsResults.helpfulness).toEqual({
      success: false,
      error: 'Judge for helpfulness failed after 3 attempt(s): timeout'
    });

    judge.mockClear();
    await service.run(WINDOW);
    expect(judge).toHaveBeenCalledTimes(1);
    expect(judge.mock.calls[0][0].name).toBe('helpfulness');
  });

  it('averages scores per metric rounded to two decimals', async () => {
    judge
      .mockResolvedValueOnce({ score: 0.8, reasoning: 'a' })
      .mockResolvedValueOnce({ score: 0.3, reasoning: 'b' })
      .mockResolvedValueOnce({ score: 0.6, reasoning: 'c' })
      .mockResolvedValueOnce({ score: 0.4, reasoning: 'd' });

    const report = await service.run(WINDOW);

    expect(report.perMetricSummary.correctness.avgScore).toBe(0.7);
    expect(report.perMetricSummary.helpfulness.avgScore).toBe(0.35);
  });

  it('fails a metric without calling the judge when the run has no output', async () => {
    runs.insert(
      makeRunRecord({
        id: 'run-empty',
        output: '',
        createdAt: '2025-06-15T13:00:00.000Z'
      })
    );

    const report = await service.run(WINDOW);

    expect(judge).toHaveBeenCalledTimes(4);
    expect(report.details[2]).toMatchObject({
      runId: 'run-empty',
      success: false,
      metricsResults: {
        correctness: { success: false, error: 'missing input or output' }
      }
    });
  });

  it('gives the judge the tool calls recorded on the run trace', async () => {
    traces.saveTrace(
      {
        id: 'trace-1',
        name: 'agent_run',
        userId: 'user-1',
        startedAt: '2025-06-15T11:00:00.000Z',
        endedAt: '2025-06-15T11:00:01.000Z'
      },
      [
        {
          id: 'span-1',
          traceId: 'trace-1',
          name: 'tool:lookup_user_by_email',
          startedAt: '2025-06-15T11:00:00.100Z',
          endedAt: '2025-06-15T11:00:00.200Z',
          durationMs: 100,
          status: 'ok',
          attributes: { output: '{"tool":"lookup_user_by_email"}' }
        }
      ]
    );
    runs.insert(
      makeRunRecord({
        id: 'run-traced',
        traceId: 'trace-1',
        output: 'Ada Admin.',
        createdAt: '2025-06-15T14:00:00.000Z'
      })
    );

    await service.run(WINDOW);

    const call = judge.mock.calls.find(
      ([, , generation]) => generation.startsWith('tool ')
    );
    expect(call?.[2]).toBe(
      'tool lookup_user_by_email: {"tool":"lookup_user_by_email"}\nagent: Ada Admin.'
    );
  });

  it('emits progress events', async () => {
    const events: EvaluationEvent['type'][] = [];
    const subscription = service.events.subscribe((e) => events.push(e.type));

    await service.run(WINDOW);
    subscription.unsubscribe();

    expect(events).toEqual([
      'run_started',
      'metric_scored',
      'metric_scored',
      'metric_scored',
      'metric_scored',
      'run_complete'
    ]);
  });

  it('rejects a second run while one is in flight', async () => {
    const first = service.run(WINDOW);
    await expect(service.run(WINDOW)).rejects.toThrow(ConflictException);
    await first;
    expect(service.isRunning).toBe(false);
  });

  it('defaults to the configured lookback window', () => {
    const now = new Date('2025-06-16T00:00:00.000Z');
    expect(service.lookbackWindow(now)).toEqual({
      since: new Date('2025-06-15T00:00:00.000Z'),
      until: now
    });
  });

  describe('recordManualScore', () => {
    it('stores the first score and keeps it on repeat', () => {
      const first = service.recordManualScore('user-1', {
        runId: 'run-1',
        metricName: 'correctness',
        score: 0.9
      });
      const second = service.recordManualScore('user-1', {
        runId: 'run-1',
        metricName: 'correctness',
        score: 0.1
      });

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.score).toMatchObject({ score: 0.9, source: 'manual' });
    });

    it("rejects scoring another user's run", () => {
      expect(() =>
        service.recordManualScore('user-2', {
          runId: 'run-1',
          metricName: 'correctness',
          score: 0.9
        })
      ).toThrow(ForbiddenException);
    });

    it('throws NotFoundException for an unknown run', () => {
      expect(() =>
        service.recordManualScore('user-1', {
          runId: 'missing',
          metricName: 'correctness',
          score: 0.9
        })
      ).toThrow(NotFoundException);
    });
  });
});
