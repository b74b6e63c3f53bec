/**
 * Todos API - application wiring shared by main.ts and the e2e tests
 */

import { INestApplication, ValidationPipe, VersioningType } from '@nestjs/common';
import { ApiErrorFilter, validationExceptionFactory } from '@todos/common/errors';
import { VersionedDispatcher } from '@todos/common/versioning';
import { createVersionExtractor } from './versioning/version-extractor';

export function configureApp(app: INestApplication): void {
  // Single translation point for every failure
  app.useGlobalFilters(new ApiErrorFilter());

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      exceptionFactory: validationExceptionFactory,
    }),
  );

  // Must run before init so routes are registered with the version filter
  const dispatcher = app.get(VersionedDispatcher);
  app.enableVersioning({
    type: VersioningType.CUSTOM,
    extractor: createVersionExtractor(dispatcher),
  });
}
