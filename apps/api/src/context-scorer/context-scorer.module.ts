import { Module } from '@nestjs/common';
import { ContextScorerService } from './context-scorer.service';

@Module({
  providers: [ContextScorerService],
  exports: [ContextScorerService],
})
export class ContextScorerModule {}
