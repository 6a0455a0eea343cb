import { Global, Module } from '@nestjs/common';

import { ToolRegistryService } from './tool-registry.service';
import { ToolsController } from './tools.controller';

@Global()
@Module({
  providers: [ToolRegistryService],
  controllers: [ToolsController],
  exports: [ToolRegistryService]
})
export class ToolsModule {}
