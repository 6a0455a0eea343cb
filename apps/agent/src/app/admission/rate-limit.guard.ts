import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { Request, Response } from 'express';

import { AdmissionRejectedError } from '../common/agent.errors';
import { AuthUser } from '../common/auth.types';
import { AdmissionService } from './admission.service';
import { AdmissionScope } from './admission.types';

export const RATE_LIMIT_SCOPE_KEY = 'rateLimitScope';

/**
 * Runs after authentication, so the identity is the caller's user id; the
 * client address is the fallback for routes without one.
 */
@Injectable()
export class RateLimitGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly admissionService: AdmissionService
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const scope = this.reflector.getAllAndOverride<AdmissionScope | undefined>(
      RATE_LIMIT_SCOPE_KEY,
      [context.getHandler(), context.getClass()]
    );
    if (!scope) return true;

    const http = context.switchToHttp();
    const request = http.getRequest<Request & { user?: AuthUser }>();
    const response = http.getResponse<Response>();
    const identity = request.user
      ? `user:${request.user.userId}`
      : `ip:${request.ip ?? 'unknown'}`;

    const decision = await this.admissionService.admit(identity, scope);
    response.setHeader('X-RateLimit-Limit', String(decision.limit));
    response.setHeader(
      'X-RateLimit-Reset',
      String(Math.ceil(decision.resetAt / 1000))
    );

    if (!decision.allowed) {
      response.setHeader('X-RateLimit-Remaining', '0');
      throw new AdmissionRejectedError(
        scope,
        decision.retryAfterSeconds,
        decision.limit
      );
    }
    response.setHeader('X-RateLimit-Remaining', String(decision.remaining));
    return true;
  }
}
