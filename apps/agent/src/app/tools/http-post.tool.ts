import { z } from 'zod';

import { httpToolRequest, isJsonValue } from './http.util';
import { defineTool } from './tool-result';

export const httpPostTool = defineTool({
  name: 'http_post',
  description:
    'Make an HTTP POST request to a URL with a JSON body. Returns the status code, response headers and body text.',
  category: 'network',
  timeout: 35000,
  tags: ['http'],
  schema: z.object({
    url: z.string().url().describe('URL to send POST request to'),
    json_data: z
      .unknown()
      .refine((value) => value === undefined || isJsonValue(value), {
        message:
          'json_data must be valid JSON (no NaN/Infinity, must be serializable)'
      })
      .describe('JSON data to send in the request body'),
    headers: z
      .record(z.string())
      .optional()
      .describe('Optional headers to include in the request'),
    timeout: z
      .number()
      .int()
      .positive()
      .max(30)
      .default(30)
      .describe('Request timeout in seconds (default: 30)')
  }),
  execute: async ({ url, json_data, headers, timeout }, context) =>
    httpToolRequest(
      'http_post',
      url,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...headers },
        body: json_data === undefined ? undefined : JSON.stringify(json_data)
      },
      timeout,
      context.abortSignal
    )
});
