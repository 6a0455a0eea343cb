import {
  createParamDecorator,
  ExecutionContext,
  UnauthorizedException
} from '@nestjs/common';

import { AuthUser } from '../auth.types';

/**
 * The caller set by `JwtAuthGuard`. `@CurrentUser('userId')` yields a single
 * field. Throws 401 on a route that never ran the guard.
 */
export const CurrentUser = createParamDecorator<keyof AuthUser | undefined>(
  (field, ctx: ExecutionContext): AuthUser | string => {
    const { user } = ctx
      .switchToHttp()
      .getRequest<{ user?: AuthUser }>();
    if (!user) {
      throw new UnauthorizedException('No authenticated caller');
    }
    return field ? user[field] : user;
  }
);
