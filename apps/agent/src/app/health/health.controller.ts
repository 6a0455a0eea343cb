import { Controller, Get } from '@nestjs/common';

import { Public } from '../common/decorators/public.decorator';

export const SERVICE_NAME = 'agent-execution-core';

export interface ServiceHealth {
  status: 'ok';
  service: string;
  uptimeSeconds: number;
  timestamp: string;
}

/** Liveness only; dependency checks live on `GET v1/agent/health`. */
@Public()
@Controller('v1/health')
export class HealthController {
  @Get()
  public getHealth(): ServiceHealth {
    return {
      status: 'ok',
      service: SERVICE_NAME,
      uptimeSeconds: Math.floor(process.uptime()),
      timestamp: new Date().toISOString()
    };
  }
}
