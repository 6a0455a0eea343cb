export interface EvaluationMetric {
  /** File name of the rubric without `.md`. */
  name: string;
  prompt: string;
}

export interface JudgeScore {
  score: number;
  reasoning: string;
}

export interface MetricSummary {
  successCount: number;
  failureCount: number;
  avgScore: number;
}

export type MetricResult =
  | { success: true; score: number; reasoning: string }
  | { success: false; error: string };

export interface RunEvaluationDetail {
  runId: string;
  success: boolean;
  metricsEvaluated: number;
  metricsSucceeded: number;
  metricsResults: Record<string, MetricResult>;
}

export interface EvaluationReport {
  timestamp: string;
  model: string;
  since: string;
  until: string;
  durationMs: number;
  total: number;
  successCount: number;
  failureCount: number;
  perMetricSummary: Record<string, MetricSummary>;
  details: RunEvaluationDetail[];
}

export interface EvaluationWindow {
  since: Date;
  until: Date;
}

export type EvaluationEvent =
  | { type: 'run_started'; data: { since: string; until: string; runs: number } }
  | {
      type: 'metric_scored';
      data: { runId: string; metricName: string; result: MetricResult };
    }
  | { type: 'run_complete'; data: EvaluationReport }
  | { type: 'run_error'; data: { error: string } };
