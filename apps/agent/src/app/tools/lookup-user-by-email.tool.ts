import { z } from 'zod';

import { errorMessage } from '../common/agent.errors';
import { defineTool, toolData, toolError } from './tool-result';

export const lookupUserByEmailTool = defineTool({
  name: 'lookup_user_by_email',
  description:
    'Look up a user by their email address. Returns user details including ID, name, active status and whether the user is an administrator (isSuperuser).',
  category: 'lookup',
  timeout: 15000,
  tags: ['directory', 'users'],
  schema: z.object({
    email: z.string().min(1).describe('Email address of the user to look up')
  }),
  execute: async ({ email }, context) => {
    try {
      const user = await context.directory.findUserByEmail(
        email,
        context.auth,
        context.abortSignal
      );
      if (!user) {
        return toolError(
          'lookup_user_by_email',
          `No user found with email: ${email}`
        );
      }
      return toolData('lookup_user_by_email', user);
    } catch (err) {
      return toolError(
        'lookup_user_by_email',
        `Directory error: ${errorMessage(err)}`
      );
    }
  }
});
