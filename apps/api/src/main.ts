import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import configuration from './config/configuration';

async function bootstrap(): Promise<void> {
  const config = configuration();
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter({ bodyLimit: config.server.bodyLimitBytes }),
    { logger: config.logLevels },
  );

  app.enableCors({
    origin: config.server.corsOrigin,
    credentials: true,
  });

  const document = SwaggerModule.createDocument(
    app,
    new DocumentBuilder()
      .setTitle('Statement Insights')
      .setDescription('Groups recorded query executions by statement and template')
      .setVersion('0.1.0')
      .build(),
  );
  SwaggerModule.setup('docs', app, document);

  await app.listen(config.server.port, config.server.host);
  new Logger('Bootstrap').log(`API server running on http://${config.server.host}:${config.server.port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start API server', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
