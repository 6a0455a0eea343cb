import { ToolDefinition } from '../common/interfaces';
import * as toolExports from './tools.exports';

export * from './tools.exports';
export const ALL_TOOLS: ToolDefinition[] = Object.values(toolExports);
