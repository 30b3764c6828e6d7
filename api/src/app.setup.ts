import { INestApplication, ValidationPipe, VersioningType } from '@nestjs/common';
import helmet from 'helmet';
import compression from 'compression';

/**
 * Middleware, routing and validation shared by the server and the tests.
 */
export function configureApp(app: INestApplication): INestApplication {
  // Security + performance
  app.use(helmet());
  app.use(compression());

  // Global URL prefix and versioning (e.g., /api/v1/...)
  app.setGlobalPrefix('api');
  app.enableVersioning({ type: VersioningType.URI, defaultVersion: '1' });

  app.enableCors({
    origin: true,
    credentials: true,
  });

  // Unknown properties on DTO bodies are rejected. Query maps are plain
  // objects and pass through untouched: unrecognized feature names are ignored.
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  return app;
}
