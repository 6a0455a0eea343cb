import { Module } from '@nestjs/common';

import { AgentController } from './agent.controller';
import { AgentService } from './agent.service';
import { chatModelProvider } from './chat-model.provider';
import { StateGraphEngine } from './state-graph.engine';

@Module({
  providers: [chatModelProvider, StateGraphEngine, AgentService],
  controllers: [AgentController],
  exports: [AgentService]
})
export class AgentModule {}
