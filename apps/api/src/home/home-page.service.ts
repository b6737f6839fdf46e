import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { ConfigService } from '../config/config.service';

/**
 * Serves the static HTML page shown at `/`, read from HOME_PAGE_PATH on every request
 */
@Injectable()
export class HomePageService {
  private readonly logger = new Logger(HomePageService.name);

  constructor(private configService: ConfigService) {}

  get filePath(): string {
    return this.configService.homePagePath;
  }

  /**
   * File contents, or null when the file cannot be read
   */
  async render(): Promise<string | null> {
    try {
      return await readFile(this.filePath, 'utf-8');
    } catch (error) {
      this.logger.warn(
        `Home page unavailable at ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return null;
    }
  }
}
