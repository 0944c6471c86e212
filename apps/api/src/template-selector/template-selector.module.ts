import { Module } from '@nestjs/common';
import { TemplateSelectorService } from './template-selector.service';
import { constantStrategyFit, STRATEGY_FIT_SCORER } from './strategy-fit';

/**
 * Swap the strategy-fit model by overriding STRATEGY_FIT_SCORER.
 */
@Module({
  providers: [
    TemplateSelectorService,
    { provide: STRATEGY_FIT_SCORER, useValue: constantStrategyFit },
  ],
  exports: [TemplateSelectorService],
})
export class TemplateSelectorModule {}
