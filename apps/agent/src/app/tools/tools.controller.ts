import { Controller, Get } from '@nestjs/common';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { Public } from '../common/decorators/public.decorator';
import { ToolCategory } from '../common/interfaces';
import { ToolRegistryService } from './tool-registry.service';

export interface ToolMetadata {
  name: string;
  description: string;
  parameters: ReturnType<typeof zodToJsonSchema>;
  category: ToolCategory;
  timeoutMs: number;
  tags: string[];
}

@Public()
@Controller('v1/tools')
export class ToolsController {
  constructor(private readonly toolRegistry: ToolRegistryService) {}

  @Get()
  public getTools(): ToolMetadata[] {
    return this.toolRegistry.getAll().map((def) => ({
      name: def.name,
      description: def.description,
      parameters: zodToJsonSchema(def.schema),
      category: def.category,
      timeoutMs: def.timeout,
      tags: def.tags ?? []
    }));
  }
}
