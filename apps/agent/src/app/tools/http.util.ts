import { errorMessage } from '../common/agent.errors';
import { ToolResult } from '../common/interfaces';
import { toolData, toolError } from './tool-result';

/**
 * Perform an outbound request and shape the outcome as a `ToolResult`.
 * Non-2xx statuses and transport failures become error results. The request
 * is aborted by `signal` or after `timeoutSeconds`, whichever comes first.
 */
export async function httpToolRequest(
  tool: string,
  url: string,
  init: RequestInit,
  timeoutSeconds: number,
  signal: AbortSignal
): Promise<ToolResult> {
  let response: Response;
  try {
    response = await fetch(url, {
      ...init,
      signal: AbortSignal.any([
        signal,
        AbortSignal.timeout(timeoutSeconds * 1000)
      ])
    });
  } catch (err) {
    return toolError(tool, `Request error: ${errorMessage(err)}`);
  }

  try {
    const body = await response.text();
    if (!response.ok) {
      return toolError(tool, `HTTP error ${response.status}: ${body}`, {
        status_code: response.status
      });
    }
    return toolData(tool, {
      status_code: response.status,
      headers: Object.fromEntries(response.headers.entries()),
      body,
      url: response.url || url
    });
  } catch (err) {
    return toolError(tool, `Unexpected error: ${errorMessage(err)}`);
  }
}

/** True for values that survive a JSON round trip unchanged. */
export function isJsonValue(value: unknown): boolean {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      if (Object.getPrototypeOf(value) !== Object.prototype) return false;
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}
