import { SpanRecord } from '../common/interfaces';

/**
 * State of one invocation's trace. Owned by the invocation that called
 * `beginTrace`; never shared with another run.
 */
export interface TraceHandle {
  /** Null only when tracing is disabled. Unsampled traces still carry an id. */
  traceId: string | null;
  sampled: boolean;
  name: string;
  userId: string;
  metadata?: Record<string, unknown>;
  startedAt: string;
  spans: SpanRecord[];
  flushed: boolean;
}

/** Ambient frame carried through the async call tree of one invocation. */
export interface TraceFrame {
  handle: TraceHandle;
  /** Ids of the open spans, innermost last. */
  spanStack: readonly string[];
}

export interface ActiveSpan {
  readonly id: string | null;
  setAttribute(key: string, value: unknown): void;
}
