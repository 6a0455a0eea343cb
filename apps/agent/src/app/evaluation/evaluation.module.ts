import { Module } from '@nestjs/common';

import { EvaluationPipelineService } from './evaluation-pipeline.service';
import { EvaluationController } from './evaluation.controller';
import { judgeModelProvider, LlmJudgeService } from './llm-judge.service';

@Module({
  controllers: [EvaluationController],
  providers: [judgeModelProvider, LlmJudgeService, EvaluationPipelineService],
  exports: [EvaluationPipelineService]
})
export class EvaluationModule {}
