import { z } from 'zod';

import { errorMessage } from '../common/agent.errors';
import { defineTool, toolData, toolError } from './tool-result';

export const lookupUserItemsTool = defineTool({
  name: 'lookup_user_items',
  description:
    'Look up the items owned by a specific user. Takes the user ID (not the email); resolve an email with lookup_user_by_email first.',
  category: 'lookup',
  timeout: 15000,
  tags: ['directory', 'items'],
  schema: z.object({
    user_id: z.string().min(1).describe('ID of the user whose items to retrieve'),
    limit: z
      .number()
      .int()
      .min(1)
      .max(100)
      .default(10)
      .describe('Maximum number of items to return (1-100)')
  }),
  execute: async ({ user_id, limit }, context) => {
    try {
      const items = await context.directory.listUserItems(
        user_id,
        limit,
        context.auth,
        context.abortSignal
      );
      return toolData('lookup_user_items', {
        count: items.length,
        items,
        limit
      });
    } catch (err) {
      return toolError(
        'lookup_user_items',
        `Directory error: ${errorMessage(err)}`
      );
    }
  }
});
