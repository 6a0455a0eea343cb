import { applyDecorators, SetMetadata, UseGuards } from '@nestjs/common';

import { AdmissionScope } from './admission.types';
import { RATE_LIMIT_SCOPE_KEY, RateLimitGuard } from './rate-limit.guard';

/** Count the route against `scope`'s per-minute budget for the caller. */
export const RateLimit = (scope: AdmissionScope) =>
  applyDecorators(
    SetMetadata(RATE_LIMIT_SCOPE_KEY, scope),
    UseGuards(RateLimitGuard)
  );
