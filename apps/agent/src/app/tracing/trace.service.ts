import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

import { errorMessage } from '../common/agent.errors';
import { TraceRepository } from '../database/trace.repository';
import { ActiveSpan, TraceFrame, TraceHandle } from './trace.types';

const NOOP_SPAN: ActiveSpan = {
  id: null,
  setAttribute: () => undefined
};

@Injectable()
export class TraceService {
  private readonly logger = new Logger(TraceService.name);
  private readonly storage = new AsyncLocalStorage<TraceFrame>();

  constructor(
    private readonly traceRepository: TraceRepository,
    private readonly configService: ConfigService
  ) {}

  get enabled(): boolean {
    return this.configService.get<boolean>('TRACING_ENABLED', true);
  }

  /**
   * Open a trace for one invocation. The sampling decision is made here,
   * once; unsampled traces keep their id but record no spans.
   */
  beginTrace(
    userId: string,
    name: string,
    metadata?: Record<string, unknown>,
    sample?: boolean
  ): TraceHandle {
    const enabled = this.enabled;
    const rate = this.configService.get<number>('TRACING_SAMPLE_RATE', 1);
    return {
      traceId: enabled ? randomUUID() : null,
      sampled: enabled && (sample ?? Math.random() < rate),
      name,
      userId,
      metadata,
      startedAt: new Date().toISOString(),
      spans: [],
      flushed: false
    };
  }

  /** Run `fn` with `handle` as the ambient trace of everything it awaits. */
  runInTrace<T>(handle: TraceHandle, fn: () => Promise<T>): Promise<T> {
    return this.storage.run({ handle, spanStack: [] }, fn);
  }

  currentTraceId(): string | null {
    return this.storage.getStore()?.handle.traceId ?? null;
  }

  /**
   * Time `fn` as a span nested under the innermost open span of the ambient
   * trace. Outside a trace, or when unsampled, `fn` runs with a no-op span.
   */
  async withSpan<T>(
    name: string,
    fn: (span: ActiveSpan) => Promise<T>,
    attributes?: Record<string, unknown>
  ): Promise<T> {
    const frame = this.storage.getStore();
    if (!frame || !frame.handle.sampled || !frame.handle.traceId) {
      return fn(NOOP_SPAN);
    }

    const { handle, spanStack } = frame;
    const traceId = frame.handle.traceId;
    const id = randomUUID();
    const attrs: Record<string, unknown> = { ...attributes };
    const span: ActiveSpan = {
      id,
      setAttribute: (key, value) => {
        attrs[key] = value;
      }
    };
    const startedAt = new Date();
    const start = performance.now();

    const finish = (error?: unknown): void => {
      handle.spans.push({
        id,
        traceId,
        parentSpanId: spanStack[spanStack.length - 1],
        name,
        startedAt: startedAt.toISOString(),
        endedAt: new Date().toISOString(),
        durationMs: Math.round(performance.now() - start),
        status: error === undefined ? 'ok' : 'error',
        attributes: Object.keys(attrs).length > 0 ? attrs : undefined,
        error: error === undefined ? undefined : errorMessage(error)
      });
    };

    try {
      const result = await this.storage.run(
        { handle, spanStack: [...spanStack, id] },
        () => fn(span)
      );
      finish();
      return result;
    } catch (err) {
      finish(err);
      throw err;
    }
  }

  /**
   * Persist the captured spans and discard them. Idempotent; a sink failure
   * is logged and never reaches the caller.
   */
  flush(handle: TraceHandle): void {
    if (handle.flushed) return;
    handle.flushed = true;
    if (!handle.sampled || !handle.traceId) {
      handle.spans = [];
      return;
    }

    try {
      this.traceRepository.saveTrace(
        {
          id: handle.traceId,
          name: handle.name,
          userId: handle.userId,
          metadata: handle.metadata,
          startedAt: handle.startedAt,
          endedAt: new Date().toISOString()
        },
        handle.spans
      );
    } catch (err) {
      this.logger.warn(
        `Failed to flush trace ${handle.traceId}: ${errorMessage(err)}`
      );
    } finally {
      handle.spans = [];
    }
  }

  traceUrl(traceId: string | null): string | null {
    const base = this.configService.get<string>('TRACE_UI_BASE_URL');
    if (!traceId || !base) return null;
    return `${base.replace(/\/+$/, '')}/trace/${traceId}`;
  }
}
