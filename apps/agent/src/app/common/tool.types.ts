import { z } from 'zod';

import { UserAuth } from './auth.types';
import { IDirectoryClient } from './client.types';

/**
 * `lookup` tools are bound to the caller's directory access and built per
 * invocation; `network` tools are stateless and shared.
 */
export type ToolCategory = 'lookup' | 'network';

export interface ToolContext {
  userId: string;
  abortSignal: AbortSignal;
  auth: UserAuth;
  directory: IDirectoryClient;
}

export interface ToolResult {
  tool: string;
  fetchedAt: string;
  data?: unknown;
  error?: string;
}

export interface ToolDefinition {
  name: string;
  description: string;
  schema: z.ZodTypeAny;
  category: ToolCategory;
  timeout: number;
  tags?: string[];
  execute: (params: unknown, context: ToolContext) => Promise<ToolResult>;
}

export interface ToolCallRecord {
  toolName: string;
  params: unknown;
  result: string;
  calledAt: string;
  durationMs: number;
  success: boolean;
}
