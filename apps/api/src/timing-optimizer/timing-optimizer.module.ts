import { Module } from '@nestjs/common';
import { TimingOptimizerService } from './timing-optimizer.service';

/**
 * Reads thresholds and caps from NUDGE_CONFIG (NudgeConfigModule is global).
 */
@Module({
  providers: [TimingOptimizerService],
  exports: [TimingOptimizerService],
})
export class TimingOptimizerModule {}
