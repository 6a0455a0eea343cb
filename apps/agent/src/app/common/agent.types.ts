export type MessageRole = 'user' | 'agent' | 'tool';

export interface ToolCallAttachment {
  kind: 'tool_call';
  toolName: string;
  success: boolean;
  durationMs: number;
}

export type MessageAttachment = ToolCallAttachment;

export interface Message {
  role: MessageRole;
  content: string;
  attachments?: MessageAttachment[];
  createdAt: string;
}

export interface ConversationThread {
  threadId: string;
  /** Identity that opened the thread. Null only for threads created before the first save. */
  ownerId: string | null;
  messages: Message[];
  plan: string | null;
  /** Incremented by one on every successful save; 0 for a thread that was never saved. */
  version: number;
  updatedAt: string | null;
}

export type RunStatus = 'success' | 'error' | 'timeout';

export interface InvocationRequest {
  message: string;
  threadId?: string;
  metadata?: Record<string, unknown>;
}

export interface InvocationResponse {
  response: string;
  threadId: string;
  traceId: string | null;
  traceUrl: string | null;
  runId: string;
  latencyMs: number;
  status: RunStatus;
  plan: string | null;
  truncated: boolean;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface AgentHealth {
  status: 'healthy' | 'degraded';
  tracingEnabled: boolean;
  tracingConfigured: boolean;
  modelName: string;
  availableTools: number;
}
