import {
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown
} from '@nestjs/common';
import type Redis from 'ioredis';

import { REDIS_CLIENT } from './redis.constants';

@Injectable()
export class RedisService implements OnApplicationShutdown {
  private readonly logger = new Logger(RedisService.name);

  public constructor(@Inject(REDIS_CLIENT) private readonly redis: Redis) {}

  public async isHealthy(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (error) {
      this.logger.warn(`Redis health check failed: ${error}`);
      return false;
    }
  }

  public async onApplicationShutdown(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      this.logger.warn(`Redis quit failed: ${error}`);
    }
  }
}
