import {
  Body,
  Controller,
  Get,
  MessageEvent,
  Param,
  Post,
  Sse
} from '@nestjs/common';
import {
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Max,
  MaxLength,
  Min
} from 'class-validator';
import { map, Observable } from 'rxjs';

import { RateLimit } from '../admission/rate-limit.decorator';
import { CurrentUser } from '../common/decorators/current-user.decorator';
import { EvaluationScoreRecord } from '../common/interfaces';
import { EvaluationPipelineService } from './evaluation-pipeline.service';
import { EvaluationEvent, EvaluationReport } from './evaluation.types';

export class ManualScoreDto {
  @IsNotEmpty()
  @IsString()
  @MaxLength(128)
  runId!: string;

  @IsNotEmpty()
  @IsString()
  @Matches(/^[a-z][a-z0-9_-]*$/, {
    message: 'metricName must be lowercase letters, digits, - or _'
  })
  @MaxLength(64)
  metricName!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(1)
  score!: number;

  @IsOptional()
  @IsObject()
  metadata?: Record<string, unknown>;
}

@Controller('v1/agent/evaluations')
export class EvaluationController {
  constructor(private readonly pipeline: EvaluationPipelineService) {}

  /** Score the lookback window now and return the report. */
  @Post('run')
  @RateLimit('agent_evaluation')
  public run(): Promise<EvaluationReport> {
    return this.pipeline.run();
  }

  @Post()
  @RateLimit('agent_evaluation')
  public recordScore(
    @Body() body: ManualScoreDto,
    @CurrentUser('userId') userId: string
  ): { created: boolean; score: EvaluationScoreRecord } {
    return this.pipeline.recordManualScore(userId, body);
  }

  @Get('runs/:runId')
  @RateLimit('agent_history')
  public getScores(
    @Param('runId') runId: string,
    @CurrentUser('userId') userId: string
  ): EvaluationScoreRecord[] {
    return this.pipeline.getScores(runId, userId);
  }

  @Sse('stream')
  public stream(): Observable<MessageEvent> {
    return this.pipeline.events.pipe(
      map((event: EvaluationEvent) => ({ type: event.type, data: event }))
    );
  }
}
