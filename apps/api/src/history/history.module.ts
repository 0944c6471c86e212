import { Module } from '@nestjs/common';
import { InteractionHistoryStore } from './interaction-history.store';

@Module({
  providers: [InteractionHistoryStore],
  exports: [InteractionHistoryStore],
})
export class HistoryModule {}
