import { StructuredToolInterface, tool } from '@langchain/core/tools';
import { Injectable, OnModuleInit } from '@nestjs/common';

import { errorMessage } from '../common/agent.errors';
import {
  ToolCallRecord,
  ToolContext,
  ToolDefinition,
  ToolResult
} from '../common/interfaces';
import { truncate } from '../common/json.util';
import { TraceService } from '../tracing/trace.service';
import { ALL_TOOLS } from './index';
import { toolError } from './tool-result';

const SNAKE_CASE = /^[a-z][a-z0-9_]*$/;
const SPAN_PREVIEW_CHARS = 100;

/**
 * The tools one invocation may call, bound to that invocation's caller.
 * `records` is owned by the session; never share a session across requests.
 */
export interface ToolSession {
  readonly tools: ReadonlyMap<string, ToolDefinition>;
  readonly records: ToolCallRecord[];
  invoke(name: string, params: unknown): Promise<ToolResult>;
}

@Injectable()
export class ToolRegistryService implements OnModuleInit {
  private readonly tools = new Map<string, ToolDefinition>();

  constructor(private readonly traceService: TraceService) {}

  onModuleInit(): void {
    ALL_TOOLS.forEach((t) => this.register(t));
  }

  register(def: ToolDefinition): void {
    if (!def.name || !def.description) {
      throw new Error(
        `Tool "${def.name || 'unnamed'}" is missing required field name or description`
      );
    }
    if (!SNAKE_CASE.test(def.name)) {
      throw new Error(`Tool "${def.name}": name must be snake_case`);
    }
    if (this.tools.has(def.name)) {
      throw new Error(`Tool "${def.name}" is already registered`);
    }
    this.tools.set(def.name, def);
  }

  getAll(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  /**
   * Build the tool set for one invocation: the caller-bound lookup tools
   * plus the shared network tools. Every call through the session is
   * validated, time-boxed, traced and recorded; no call throws.
   */
  compose(context: ToolContext): ToolSession {
    const tools = new Map<string, ToolDefinition>();
    for (const def of this.getAll()) {
      if (def.category === 'lookup') tools.set(def.name, def);
    }
    for (const def of this.getAll()) {
      if (def.category === 'network') tools.set(def.name, def);
    }

    const records: ToolCallRecord[] = [];
    const invoke = async (name: string, params: unknown): Promise<ToolResult> => {
      const def = tools.get(name);
      if (!def) return toolError(name, `Unknown tool: ${name}`);

      return this.traceService.withSpan(
        `tool:${name}`,
        async (span) => {
          const start = Date.now();
          const result = await this._execute(def, params, context);
          const serialized = JSON.stringify(result);
          records.push({
            toolName: name,
            params,
            result: serialized,
            calledAt: new Date(start).toISOString(),
            durationMs: Date.now() - start,
            success: !result.error
          });
          span.setAttribute('success', !result.error);
          span.setAttribute('output', truncate(serialized, SPAN_PREVIEW_CHARS));
          return result;
        },
        { input: truncate(JSON.stringify(params ?? null), SPAN_PREVIEW_CHARS) }
      );
    };

    return { tools, records, invoke };
  }

  /** LangChain views of a session's tools, for binding to a chat model. */
  toLangChainTools(session: ToolSession): StructuredToolInterface[] {
    return Array.from(session.tools.values()).map((def) =>
      tool(
        async (params: unknown) =>
          JSON.stringify(await session.invoke(def.name, params)),
        {
          name: def.name,
          description: def.description,
          schema: def.schema
        }
      )
    );
  }

  private async _execute(
    def: ToolDefinition,
    params: unknown,
    context: ToolContext
  ): Promise<ToolResult> {
    if (context.abortSignal.aborted) {
      return toolError(def.name, 'Request was cancelled');
    }

    let timer: NodeJS.Timeout | undefined;
    let onAbort: (() => void) | undefined;
    const cutoff = new Promise<ToolResult>((resolve) => {
      timer = setTimeout(
        () =>
          resolve(toolError(def.name, `Tool timed out after ${def.timeout}ms`)),
        def.timeout
      );
      onAbort = () => resolve(toolError(def.name, 'Request was cancelled'));
      context.abortSignal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      return await Promise.race([def.execute(params, context), cutoff]);
    } catch (err) {
      return toolError(def.name, errorMessage(err));
    } finally {
      clearTimeout(timer);
      if (onAbort) context.abortSignal.removeEventListener('abort', onAbort);
    }
  }
}
