import { z } from 'zod';

import { httpToolRequest } from './http.util';
import { defineTool } from './tool-result';

export const httpGetTool = defineTool({
  name: 'http_get',
  description:
    'Make an HTTP GET request to a URL. Returns the status code, response headers and body text.',
  category: 'network',
  timeout: 35000,
  tags: ['http'],
  schema: z.object({
    url: z.string().url().describe('URL to send GET request to'),
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
  execute: async ({ url, headers, timeout }, context) =>
    httpToolRequest(
      'http_get',
      url,
      { method: 'GET', headers: headers ?? {} },
      timeout,
      context.abortSignal
    )
});
