import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';

import { AdmissionModule } from './admission/admission.module';
import { AgentModule } from './agent/agent.module';
import { CheckpointModule } from './checkpoint/checkpoint.module';
import { AgentExceptionFilter } from './common/agent-exception.filter';
import { CorrelationIdMiddleware } from './common/correlation-id.middleware';
import { JwtAuthGuard } from './common/guards/jwt-auth.guard';
import { validateAgentConfig } from './config/agent.config';
import { DatabaseModule } from './database/database.module';
import { DirectoryModule } from './directory/directory.module';
import { EvaluationModule } from './evaluation/evaluation.module';
import { HealthModule } from './health/health.module';
import { RecorderModule } from './recorder/recorder.module';
import { RedisModule } from './redis/redis.module';
import { ToolsModule } from './tools/tools.module';
import { TracingModule } from './tracing/tracing.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateAgentConfig }),
    DatabaseModule,
    RedisModule,
    TracingModule,
    CheckpointModule,
    DirectoryModule,
    ToolsModule,
    RecorderModule,
    AdmissionModule,
    AgentModule,
    EvaluationModule,
    HealthModule
  ],
  providers: [
    { provide: APP_FILTER, useClass: AgentExceptionFilter },
    { provide: APP_GUARD, useClass: JwtAuthGuard }
  ]
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
