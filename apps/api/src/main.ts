import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { SwaggerModule, DocumentBuilder } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { ConfigService } from './config/config.service';
import { configureApp } from './app.setup';

async function bootstrap() {
  const app = await NestFactory.create(AppModule);
  const logger = new Logger('Bootstrap');

  const configService = app.get(ConfigService);
  configureApp(app);

  // Swagger documentation (not in production)
  if (!configService.isProduction) {
    const config = new DocumentBuilder()
      .setTitle('Tablesweep API')
      .setDescription('Scrape an HTML table across paginated pages into CSV or JSON')
      .setVersion('0.1.0')
      .addTag('Health', 'Health check endpoints')
      .addTag('Scrape', 'Table scraping endpoints')
      .build();

    const document = SwaggerModule.createDocument(app, config);
    SwaggerModule.setup(`${configService.apiPrefix}/docs`, app, document);

    logger.log(`Swagger docs available at http://localhost:${configService.port}/${configService.apiPrefix}/docs`);
  }

  const port = configService.port;
  await app.listen(port);

  logger.log(`Tablesweep API running on http://localhost:${port}/${configService.apiPrefix}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
    error instanceof Error ? error.stack : undefined,
  );
  process.exit(1);
});
