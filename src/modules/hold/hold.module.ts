import { Module } from '@nestjs/common';
import { HOLD_STORE } from './hold-store.interface';
import { RedisHoldStore } from './redis-hold.store';

/**
 * HoldModule provides the seat hold store. RedisService comes from the
 * global RedisModule.
 */
@Module({
  providers: [{ provide: HOLD_STORE, useClass: RedisHoldStore }],
  exports: [HOLD_STORE],
})
export class HoldModule {}
