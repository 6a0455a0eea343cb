import { Global, Module } from '@nestjs/common';

import { AdmissionService } from './admission.service';
import { RateLimitGuard } from './rate-limit.guard';

@Global()
@Module({
  providers: [AdmissionService, RateLimitGuard],
  exports: [AdmissionService, RateLimitGuard]
})
export class AdmissionModule {}
