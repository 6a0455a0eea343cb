#!/usr/bin/env ts-node
// Evaluation CLI: scores recent agent runs with the LLM judge.
//
// Usage:
//   npm run eval [--hours N] [--no-report] [--html] [--out DIR]
import 'reflect-metadata';

import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { resolve } from 'path';

import { validateAgentConfig } from '../apps/agent/src/app/config/agent.config';
import { DatabaseModule } from '../apps/agent/src/app/database/database.module';
import { EvaluationPipelineService } from '../apps/agent/src/app/evaluation/evaluation-pipeline.service';
import {
  judgeModelProvider,
  LlmJudgeService
} from '../apps/agent/src/app/evaluation/llm-judge.service';
import { formatSummary, writeHtmlReport, writeJsonReport } from './report';

const BOLD = '\x1b[1m';
const RED = '\x1b[31m';
const GREEN = '\x1b[32m';
const RESET = '\x1b[0m';
const LINE = '─'.repeat(61);

const HOUR_MS = 60 * 60 * 1000;

export interface CliOptions {
  hours?: number;
  report: boolean;
  html: boolean;
  outDir: string;
}

export function parseCliArgs(args: string[]): CliOptions {
  const hoursIdx = args.indexOf('--hours');
  let hours: number | undefined;
  if (hoursIdx !== -1) {
    hours = Number(args[hoursIdx + 1]);
    if (!Number.isFinite(hours) || hours <= 0) {
      throw new Error(`--hours expects a positive number, got "${args[hoursIdx + 1] ?? ''}"`);
    }
  }
  const outIdx = args.indexOf('--out');
  const outDir =
    outIdx !== -1 && args[outIdx + 1] ? args[outIdx + 1] : 'evals/reports';

  return {
    hours,
    report: !args.includes('--no-report'),
    html: args.includes('--html'),
    outDir: resolve(process.cwd(), outDir)
  };
}

/** Only what the pipeline needs: no HTTP surface, no Redis. */
@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateAgentConfig }),
    DatabaseModule
  ],
  providers: [judgeModelProvider, LlmJudgeService, EvaluationPipelineService]
})
class EvaluationCliModule {}

async function main(): Promise<void> {
  const options = parseCliArgs(process.argv.slice(2));
  const app = await NestFactory.createApplicationContext(EvaluationCliModule, {
    logger: ['log', 'warn', 'error']
  });

  try {
    const pipeline = app.get(EvaluationPipelineService);
    const config = app.get(ConfigService);
    const hours =
      options.hours ?? config.get<number>('EVALUATION_LOOKBACK_HOURS', 24);
    const until = new Date();
    const since = new Date(until.getTime() - hours * HOUR_MS);

    console.log(`\n${BOLD} Evaluation${RESET} (last ${hours}h)`);
    console.log(LINE);

    const report = await pipeline.run({ since, until });
    for (const line of formatSummary(report)) {
      console.log(`  ${line}`);
    }

    if (options.report) {
      console.log(`\n  ${GREEN}Report:${RESET} ${writeJsonReport(report, options.outDir)}`);
      if (options.html) {
        console.log(`          ${writeHtmlReport(report, options.outDir)}`);
      }
    }

    process.exitCode = report.failureCount > 0 ? 1 : 0;
  } finally {
    await app.close();
  }
}

if (require.main === module) {
  main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    new Logger('EvaluationCli').error(message);
    console.error(`${RED}Fatal error:${RESET} ${message}`);
    process.exit(1);
  });
}
