import { Global, Module } from '@nestjs/common';

import { CHECKPOINT_STORE } from './checkpoint.store';
import { RedisCheckpointStore } from './redis-checkpoint.store';

@Global()
@Module({
  exports: [CHECKPOINT_STORE],
  providers: [{ provide: CHECKPOINT_STORE, useClass: RedisCheckpointStore }]
})
export class CheckpointModule {}
