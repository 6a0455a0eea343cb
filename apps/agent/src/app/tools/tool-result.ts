import { z } from 'zod';

import { ToolContext, ToolDefinition, ToolResult } from '../common/interfaces';

export function toolData(tool: string, data: unknown): ToolResult {
  return { tool, fetchedAt: new Date().toISOString(), data };
}

export function toolError(
  tool: string,
  error: string,
  data?: unknown
): ToolResult {
  return { tool, fetchedAt: new Date().toISOString(), error, data };
}

type TypedToolDefinition<TParams> = Omit<
  ToolDefinition,
  'schema' | 'execute'
> & {
  schema: z.ZodType<TParams, z.ZodTypeDef, unknown>;
  execute: (params: TParams, context: ToolContext) => Promise<ToolResult>;
};

/**
 * Build a `ToolDefinition` whose `execute` receives parsed, typed params.
 * Input that fails the schema comes back as a structured error result.
 */
export function defineTool<TParams>(
  def: TypedToolDefinition<TParams>
): ToolDefinition {
  return {
    ...def,
    execute: async (params, context) => {
      const parsed = def.schema.safeParse(params);
      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) =>
            issue.path.length > 0
              ? `${issue.path.join('.')}: ${issue.message}`
              : issue.message
          )
          .join('; ');
        return toolError(def.name, `Invalid input: ${issues}`);
      }
      return def.execute(parsed.data, context);
    }
  };
}
