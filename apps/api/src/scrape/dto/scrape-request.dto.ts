import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsString,
  Max,
  Min,
} from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { HEADER_STRATEGIES, OUTPUT_FORMATS } from '@tablesweep/shared';
import type { HeaderStrategy, OutputFormat } from '@tablesweep/shared';
import { DEFAULT_CONCURRENCY, MAX_CONCURRENCY, MIN_CONCURRENCY } from '@tablesweep/extractor';

/** Hard ceiling on pages per request, whatever max_pages_per_request asks for */
export const MAX_PAGES_HARD_CAP = 100;

/**
 * Omitted fields keep their initializer defaults through the transforming
 * ValidationPipe; an explicit null is validated like any other value.
 */
export class ScrapeRequestDto {
  @ApiProperty({
    description: 'Page URL template. {page} is replaced by the page number; without it an existing page= parameter is replaced or ?page= is appended',
    example: 'https://example.com/results?page={page}',
  })
  @IsString()
  @IsNotEmpty()
  template!: string;

  @ApiPropertyOptional({
    description: 'CSS selector matching candidate tables',
    default: 'table',
    example: 'table.results',
  })
  @IsString()
  css_selector: string = 'table';

  @ApiPropertyOptional({
    description: 'Zero-based index among the tables matched by css_selector',
    default: 0,
    minimum: 0,
  })
  @IsInt()
  @Min(0)
  table_index: number = 0;

  @ApiPropertyOptional({
    description: 'How column names are derived',
    enum: [...HEADER_STRATEGIES],
    default: 'auto',
  })
  @IsIn([...HEADER_STRATEGIES])
  header_strategy: HeaderStrategy = 'auto';

  @ApiPropertyOptional({ description: 'First page to scrape', default: 1, minimum: 1 })
  @IsInt()
  @Min(1)
  start_page: number = 1;

  @ApiPropertyOptional({ description: 'Last page to scrape (inclusive)', default: 1, minimum: 1 })
  @IsInt()
  @Min(1)
  end_page: number = 1;

  @ApiPropertyOptional({
    description: 'Pages fetched in parallel',
    default: DEFAULT_CONCURRENCY,
    minimum: MIN_CONCURRENCY,
    maximum: MAX_CONCURRENCY,
  })
  @IsInt()
  @Min(MIN_CONCURRENCY)
  @Max(MAX_CONCURRENCY)
  concurrency: number = DEFAULT_CONCURRENCY;

  @ApiPropertyOptional({
    description: 'Safety cap on the number of pages in this request',
    default: MAX_PAGES_HARD_CAP,
    minimum: 1,
    maximum: MAX_PAGES_HARD_CAP,
  })
  @IsInt()
  @Min(1)
  @Max(MAX_PAGES_HARD_CAP)
  max_pages_per_request: number = MAX_PAGES_HARD_CAP;

  @ApiPropertyOptional({
    description: 'Response format',
    enum: [...OUTPUT_FORMATS],
    default: 'csv',
  })
  @IsIn([...OUTPUT_FORMATS])
  format: OutputFormat = 'csv';
}
