import { INestApplication, ValidationPipe } from '@nestjs/common';
import { FakehookErrorFilter } from '@fakehook/common/errors';

/**
 * Global filters and pipes shared by the server and its tests
 */
export function configureApp(app: INestApplication): INestApplication {
  // Global exception filter for FakehookError
  app.useGlobalFilters(new FakehookErrorFilter());

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  return app;
}
