import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { EnvConfigService } from '@infrastructure/config';
import { createValidationPipe } from '@infrastructure/http';

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, { bufferLogs: true });

  app.useLogger(app.get(Logger));

  const config = app.get(EnvConfigService);

  app.enableCors({
    origin: config.allowsAnyOrigin ? true : config.corsOrigins,
    credentials: true,
  });

  app.useGlobalPipes(createValidationPipe());

  const swaggerConfig = new DocumentBuilder()
    .setTitle('Art Prints Storefront API')
    .setDescription(
      `REST API for an art prints storefront.

- Browse the print catalog, optionally only featured prints
- Add prints to the catalog
- Place orders priced server side from the catalog`,
    )
    .setVersion('1.0')
    .addTag('Prints', 'Browse and extend the catalog')
    .addTag('Orders', 'Place and look up orders')
    .addTag('Health', 'Liveness, readiness and store diagnostics')
    .build();

  const document = SwaggerModule.createDocument(app, swaggerConfig);
  SwaggerModule.setup('api/docs', app, document, {
    swaggerOptions: {
      docExpansion: 'list',
      filter: true,
      showRequestDuration: true,
    },
  });

  app.enableShutdownHooks();

  await app.listen(config.port);

  app.get(Logger).log(`Art Prints API listening on port ${config.port} (docs at /api/docs)`);
}

void bootstrap();
