import { Global, Module } from '@nestjs/common';

import { AgentRunRecorderService } from './agent-run-recorder.service';

// AgentRunRepository is injected from DatabaseModule (@Global, no import needed here)
@Global()
@Module({
  providers: [AgentRunRecorderService],
  exports: [AgentRunRecorderService]
})
export class RecorderModule {}
