import { ConfigService as NestConfigService } from '@nestjs/config';
import { join } from 'path';
import { APP_ROOT, ConfigService } from './config.service';
import { EnvConfig } from './env.validation';

function configWith(values: Partial<EnvConfig>): ConfigService {
  return new ConfigService(new NestConfigService<EnvConfig, true>(values));
}

describe('ConfigService', () => {
  it('should resolve the home page against the app directory', () => {
    const config = configWith({ HOME_PAGE_PATH: 'public/index.html' });

    expect(config.homePagePath).toBe(join(APP_ROOT, 'public', 'index.html'));
    expect(APP_ROOT).toBe(join(__dirname, '..', '..'));
  });

  it('should keep an absolute home page path', () => {
    const config = configWith({ HOME_PAGE_PATH: '/srv/www/index.html' });

    expect(config.homePagePath).toBe('/srv/www/index.html');
  });

  it('should parse numeric settings', () => {
    const config = configWith({ FETCH_TIMEOUT_MS: '5000', THROTTLE_LIMIT: '7' });

    expect(config.fetchTimeoutMs).toBe(5000);
    expect(config.throttleLimit).toBe(7);
  });

  it('should split CORS origins', () => {
    const config = configWith({ CORS_ORIGINS: 'http://a.test, http://b.test' });

    expect(config.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });
});
