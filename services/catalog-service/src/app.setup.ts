/**
 * Pipes, filters and interceptors shared by the server and the e2e tests.
 */

import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GlobalExceptionFilter } from './common/filters';
import { LoggingInterceptor, TimeoutInterceptor } from './common/interceptors';

export function configureApp(app: INestApplication): INestApplication {
  const configService = app.get(ConfigService);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  app.useGlobalFilters(new GlobalExceptionFilter());

  app.useGlobalInterceptors(
    new LoggingInterceptor(),
    new TimeoutInterceptor(configService.get<number>('http.requestTimeoutMs', 30000)),
  );

  app.enableCors({
    origin: true,
    methods: ['GET', 'POST', 'PUT', 'OPTIONS'],
  });

  return app;
}
