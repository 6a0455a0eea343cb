import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AgentRunRepository } from './agent-run.repository';
import { DatabaseService } from './database.service';
import { EvaluationRepository } from './evaluation.repository';
import { TraceRepository } from './trace.repository';

@Global()
@Module({
  exports: [
    DatabaseService,
    AgentRunRepository,
    EvaluationRepository,
    TraceRepository
  ],
  imports: [ConfigModule],
  providers: [
    DatabaseService,
    AgentRunRepository,
    EvaluationRepository,
    TraceRepository
  ]
})
export class DatabaseModule {}
