import { z } from 'zod';

import { errorMessage } from '../common/agent.errors';
import { defineTool, toolData, toolError } from './tool-result';

export const lookupItemByIdTool = defineTool({
  name: 'lookup_item_by_id',
  description:
    'Look up an item by its ID. Returns item details including title, description, and owner.',
  category: 'lookup',
  timeout: 15000,
  tags: ['directory', 'items'],
  schema: z.object({
    item_id: z.string().min(1).describe('ID of the item to look up')
  }),
  execute: async ({ item_id }, context) => {
    try {
      const item = await context.directory.findItemById(
        item_id,
        context.auth,
        context.abortSignal
      );
      if (!item) {
        return toolError('lookup_item_by_id', `No item found with ID: ${item_id}`);
      }
      return toolData('lookup_item_by_id', item);
    } catch (err) {
      return toolError(
        'lookup_item_by_id',
        `Directory error: ${errorMessage(err)}`
      );
    }
  }
});
