import { Module } from '@nestjs/common';
import { NudgeController } from './nudge.controller';
import { NudgeService } from './nudge.service';
import { CatalogModule } from '../catalog/catalog.module';
import { ContextScorerModule } from '../context-scorer/context-scorer.module';
import { TemplateSelectorModule } from '../template-selector/template-selector.module';
import { ActionPersonalizerModule } from '../action-personalizer/action-personalizer.module';
import { TimingOptimizerModule } from '../timing-optimizer/timing-optimizer.module';
import { ResponseFormatterModule } from '../response-formatter/response-formatter.module';
import { HistoryModule } from '../history/history.module';
import { TraceModule } from '../trace/trace.module';

/**
 * Nudge Module
 *
 * Endpoint:
 * - POST /nudges
 *
 * Wires the five pipeline stages together with the catalog and the
 * in-memory interaction history.
 */
@Module({
  imports: [
    CatalogModule,
    ContextScorerModule,
    TemplateSelectorModule,
    ActionPersonalizerModule,
    TimingOptimizerModule,
    ResponseFormatterModule,
    HistoryModule,
    TraceModule,
  ],
  controllers: [NudgeController],
  providers: [NudgeService],
  exports: [NudgeService],
})
export class NudgeModule {}
