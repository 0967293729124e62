import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ConfigurationService } from './modules';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');
  const adcpConfig = app.get(ConfigurationService);

  const globalPrefix = adcpConfig.getGlobalPrefix();
  if (globalPrefix) {
    app.setGlobalPrefix(globalPrefix);
  }

  if (adcpConfig.isSwaggerEnabled()) {
    const config = new DocumentBuilder()
      .setTitle('AdCP Webhooks')
      .setDescription(
        'Receives MCP and A2A task webhooks from AdCP agents and returns normalized task results.',
      )
      .setVersion('0.1.0')
      .addTag('Ingest', 'Receive task webhooks from agents')
      .addTag('Health', 'Liveness and pipeline statistics')
      .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup('api', app, document);
  }

  const port = app.get(ConfigService).get<string>('PORT') ?? '4010';
  await app.listen(port);
  logger.log(`AdCP webhook receiver is running on http://localhost:${port}`);
  if (adcpConfig.isSwaggerEnabled()) {
    logger.log(`OpenAPI documentation available at http://localhost:${port}/api`);
  }
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Failed to start AdCP webhook receiver',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
