import { existsSync, readdirSync, readFileSync } from 'fs';
import { basename, join, resolve } from 'path';

import { EvaluationMetric } from './evaluation.types';

/**
 * Every `*.md` file in `dir` is one metric; the file name is the metric
 * name and the contents are the judge's rubric. Sorted by name.
 */
export function loadMetrics(dir: string): EvaluationMetric[] {
  const root = resolve(process.cwd(), dir);
  if (!existsSync(root)) return [];

  return readdirSync(root)
    .filter((file) => file.endsWith('.md'))
    .sort()
    .map((file) => ({
      name: basename(file, '.md'),
      prompt: readFileSync(join(root, file), 'utf-8').trim()
    }))
    .filter((metric) => metric.prompt.length > 0);
}
