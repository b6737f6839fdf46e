import { Injectable } from '@nestjs/common';
import { ConfigService as NestConfigService } from '@nestjs/config';
import { resolve } from 'path';
import { EnvConfig } from './env.validation';

/** apps/api, the base for relative file settings whatever the working directory */
export const APP_ROOT = resolve(__dirname, '..', '..');

@Injectable()
export class ConfigService {
  constructor(private configService: NestConfigService<EnvConfig, true>) {}

  get nodeEnv(): string {
    return this.configService.get('NODE_ENV', { infer: true });
  }

  get port(): number {
    return parseInt(this.configService.get('PORT', { infer: true }), 10);
  }

  get apiPrefix(): string {
    return this.configService.get('API_PREFIX', { infer: true });
  }

  get throttleTtl(): number {
    return parseInt(this.configService.get('THROTTLE_TTL', { infer: true }), 10);
  }

  get throttleLimit(): number {
    return parseInt(this.configService.get('THROTTLE_LIMIT', { infer: true }), 10);
  }

  get corsOrigins(): string[] {
    return this.configService
      .get('CORS_ORIGINS', { infer: true })
      .split(',')
      .map(origin => origin.trim());
  }

  get fetchTimeoutMs(): number {
    return parseInt(this.configService.get('FETCH_TIMEOUT_MS', { infer: true }), 10);
  }

  get fetchUserAgent(): string {
    return this.configService.get('FETCH_USER_AGENT', { infer: true });
  }

  get homePagePath(): string {
    return resolve(APP_ROOT, this.configService.get('HOME_PAGE_PATH', { infer: true }));
  }

  get isProduction(): boolean {
    return this.nodeEnv === 'production';
  }
}
