import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigurationErrorFilter } from './common/filters/configuration-error.filter';

/**
 * Global pipes and filters, shared by main.ts and the e2e tests so both
 * run the same request handling.
 */
export function configureApp(app: INestApplication): void {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new ConfigurationErrorFilter());
}
