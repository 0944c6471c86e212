import { Global, Module } from '@nestjs/common';
import { loadNudgeConfig, NUDGE_CONFIG } from './nudge.config';

/**
 * Global so every pipeline stage can inject NUDGE_CONFIG without
 * re-importing. useFactory reads the environment at module init, after
 * main.ts (or a test) has populated it.
 */
@Global()
@Module({
  providers: [
    {
      provide: NUDGE_CONFIG,
      useFactory: () => loadNudgeConfig(),
    },
  ],
  exports: [NUDGE_CONFIG],
})
export class NudgeConfigModule {}
