// Evaluation report exporter: JSON for tooling, HTML for reading.
import { mkdirSync, writeFileSync } from 'fs';
import { resolve } from 'path';

import { EvaluationReport } from '../apps/agent/src/app/evaluation/evaluation.types';

export function reportBaseName(report: EvaluationReport): string {
  return `evaluation_report_${report.timestamp.replace(/[:.]/g, '-')}`;
}

// ── JSON Export ──────────────────────────────────────────────

export function writeJsonReport(report: EvaluationReport, outDir: string): string {
  mkdirSync(outDir, { recursive: true });
  const filepath = resolve(outDir, `${reportBaseName(report)}.json`);
  writeFileSync(filepath, JSON.stringify(report, null, 2));
  return filepath;
}

// ── HTML Export ──────────────────────────────────────────────

export function escHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function fmtMs(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

export function successRate(report: EvaluationReport): string {
  if (report.total === 0) return 'n/a';
  return `${((report.successCount / report.total) * 100).toFixed(1)}%`;
}

export function renderHtmlReport(report: EvaluationReport): string {
  const metricRows = Object.entries(report.perMetricSummary)
    .map(
      ([name, m]) => `
      <tr>
        <td>${escHtml(name)}</td>
        <td class="pass">${m.successCount}</td>
        <td class="${m.failureCount > 0 ? 'fail' : ''}">${m.failureCount}</td>
        <td>${m.avgScore.toFixed(2)}</td>
      </tr>`
    )
    .join('');

  const runCards = report.details
    .map((detail) => {
      const rows = Object.entries(detail.metricsResults)
        .map(([name, result]) =>
          result.success
            ? `<tr><td>${escHtml(name)}</td><td class="pass">${result.score.toFixed(2)}</td><td>${escHtml(result.reasoning)}</td></tr>`
            : `<tr><td>${escHtml(name)}</td><td class="fail">failed</td><td>${escHtml(result.error)}</td></tr>`
        )
        .join('');
      return `
      <details class="eval-card ${detail.success ? '' : 'eval-failed'}">
        <summary>
          <span class="${detail.success ? 'pass' : 'fail'}">${detail.success ? '✓' : '✗'}</span>
          <strong>${escHtml(detail.runId)}</strong>
          <span class="dim">${detail.metricsSucceeded}/${detail.metricsEvaluated} metrics</span>
        </summary>
        <table>
          <thead><tr><th>Metric</th><th>Score</th><th>Reasoning</th></tr></thead>
          <tbody>${rows}</tbody>
        </table>
      </details>`;
    })
    .join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>Evaluation Report ${escHtml(report.timestamp)}</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, monospace;
           background: #0d1117; color: #c9d1d9; padding: 2rem; max-width: 1200px; margin: 0 auto; }
    h1, h2 { color: #58a6ff; }
    .pass { color: #3fb950; font-weight: bold; }
    .fail { color: #f85149; font-weight: bold; }
    .dim { color: #8b949e; }
    table { width: 100%; border-collapse: collapse; margin: 1rem 0; font-size: 0.85rem; }
    th, td { padding: 0.5rem 0.75rem; text-align: left; border-bottom: 1px solid #21262d; }
    .eval-card { background: #161b22; border: 1px solid #30363d; border-radius: 6px; margin: 0.5rem 0; padding: 0.5rem 1rem; }
    .eval-card.eval-failed { border-color: #f8514966; }
    .eval-card summary { cursor: pointer; display: flex; gap: 0.6rem; }
  </style>
</head>
<body>
  <h1>Evaluation Report</h1>
  <p class="dim">Generated ${escHtml(report.timestamp)} &middot; judge ${escHtml(report.model)} &middot; ${fmtMs(report.durationMs)}</p>
  <p class="dim">Window ${escHtml(report.since)} to ${escHtml(report.until)}</p>
  <p>${report.successCount}/${report.total} runs succeeded (${successRate(report)})</p>

  <h2>Metrics</h2>
  <table>
    <thead><tr><th>Metric</th><th>Succeeded</th><th>Failed</th><th>Average</th></tr></thead>
    <tbody>${metricRows}</tbody>
  </table>

  <h2>Runs</h2>
  ${runCards || '<p class="dim">No runs needed scoring.</p>'}
</body>
</html>`;
}

export function writeHtmlReport(report: EvaluationReport, outDir: string): string {
  mkdirSync(outDir, { recursive: true });
  const filepath = resolve(outDir, `${reportBaseName(report)}.html`);
  writeFileSync(filepath, renderHtmlReport(report));
  return filepath;
}

// ── Console Summary ──────────────────────────────────────────

export function formatSummary(report: EvaluationReport): string[] {
  const lines = [
    `Model: ${report.model}`,
    `Window: ${report.since} .. ${report.until}`,
    `Duration: ${fmtMs(report.durationMs)}`,
    `Total runs: ${report.total}`
  ];
  if (report.total > 0) {
    lines.push(
      `Success rate: ${successRate(report)} (${report.successCount}/${report.total})`
    );
  }
  const metrics = Object.entries(report.perMetricSummary);
  if (metrics.length > 0) {
    lines.push('Metrics:');
    for (const [name, m] of metrics) {
      lines.push(
        `  ${name}: ${m.successCount} ok, ${m.failureCount} failed, avg ${m.avgScore.toFixed(2)}`
      );
    }
  }
  return lines;
}
