import { Module, NestModule, MiddlewareConsumer } from '@nestjs/common';
import { NudgeConfigModule } from './config/nudge-config.module';
import { TraceModule } from './trace/trace.module';
import { TraceMiddleware } from './trace/trace.middleware';
import { CatalogModule } from './catalog/catalog.module';
import { NudgeModule } from './nudge/nudge.module';

/**
 * Root Application Module
 *
 * - NudgeModule: POST /nudges
 * - CatalogModule: GET /catalog/personas, GET /catalog/templates
 */
@Module({
  imports: [NudgeConfigModule, TraceModule, CatalogModule, NudgeModule],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(TraceMiddleware).forRoutes('*');
  }
}
