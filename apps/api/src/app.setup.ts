import { INestApplication, Logger, ValidationPipe } from '@nestjs/common';
import type { Request, Response } from 'express';
import { buildErrorBody } from './common/filters';
import { ConfigService } from './config/config.service';
import { HomePageService } from './home/home-page.service';

/**
 * Global prefix, CORS, validation and the static home page.
 * Shared by bootstrap and the HTTP-level tests.
 */
export function configureApp(app: INestApplication): void {
  const configService = app.get(ConfigService);
  const homePage = app.get(HomePageService);

  // Global prefix
  app.setGlobalPrefix(configService.apiPrefix);

  // CORS
  app.enableCors({
    origin: configService.corsOrigins,
    credentials: true,
  });

  // Global validation pipe
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // Static home page at the root, outside the API prefix
  const httpAdapter = app.getHttpAdapter();
  httpAdapter.get('/', (_req: Request, res: Response) => {
    void homePage
      .render()
      .then(html => {
        if (html === null) {
          res.status(404).json(buildErrorBody(404, 'Home page not found', '/'));
          return;
        }
        res.type('html').send(html);
      })
      .catch((error: unknown) => {
        Logger.error(
          `Home page failed: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error.stack : undefined,
          'HomePage',
        );
        res.status(500).json(buildErrorBody(500, 'Internal server error', '/'));
      });
  });
}
