import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { pageRange, scrapePages } from '@tablesweep/extractor';
import type { ScrapedTable, TableSpec } from '@tablesweep/shared';
import { ConfigService } from '../config/config.service';
import { ScrapeRequestDto } from './dto/scrape-request.dto';

@Injectable()
export class ScrapeService {
  private readonly logger = new Logger(ScrapeService.name);

  constructor(private configService: ConfigService) {}

  /**
   * Reject impossible page ranges before any page is fetched
   */
  validatePageRange(dto: Pick<ScrapeRequestDto, 'start_page' | 'end_page' | 'max_pages_per_request'>): number {
    if (dto.end_page < dto.start_page) {
      throw new BadRequestException('end_page must be >= start_page');
    }

    const pageCount = dto.end_page - dto.start_page + 1;
    if (pageCount > dto.max_pages_per_request) {
      throw new BadRequestException(`Too many pages (max ${dto.max_pages_per_request}).`);
    }

    return pageCount;
  }

  /**
   * Scrape start_page..end_page and merge the tables found.
   * Pages that fail to load or have no table are skipped; null when none had data.
   */
  async scrape(dto: ScrapeRequestDto): Promise<ScrapedTable | null> {
    const pageCount = this.validatePageRange(dto);

    const spec: TableSpec = {
      selector: dto.css_selector,
      tableIndex: dto.table_index,
      headerStrategy: dto.header_strategy,
    };

    const startTime = Date.now();
    const result = await scrapePages({
      template: dto.template,
      pages: pageRange(dto.start_page, dto.end_page),
      spec,
      concurrency: dto.concurrency,
      fetch: {
        timeout: this.configService.fetchTimeoutMs,
        userAgent: this.configService.fetchUserAgent,
      },
    });

    const withData = result.pages.filter(outcome => outcome.status === 'ok').length;
    this.logger.log(
      `Scraped ${dto.template} pages ${dto.start_page}-${dto.end_page}: ` +
        `${withData}/${pageCount} with data, ${result.table?.rows.length ?? 0} rows in ${Date.now() - startTime}ms`,
    );

    return result.table;
  }
}
