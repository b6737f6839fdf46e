import { Body, Controller, HttpCode, HttpStatus, Post, StreamableFile } from '@nestjs/common';
import {
  ApiBadRequestResponse,
  ApiOperation,
  ApiProduces,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { ScrapeService } from './scrape.service';
import { ScrapeRequestDto } from './dto/scrape-request.dto';
import { CSV_FILENAME, toCsv, toRecords } from './table-output';

export const NO_DATA_MESSAGE = 'No data found. Tweak selector/table index/header strategy.';

export interface ScrapeEmptyResponse {
  rows: 0;
  message: string;
}

export interface ScrapeJsonResponse {
  rows: number;
  data: Record<string, string>[];
}

@ApiTags('Scrape')
@Controller()
export class ScrapeController {
  constructor(private scrapeService: ScrapeService) {}

  @Post('scrape')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Scrape a table across a range of pages',
    description:
      'Fetches every page from start_page to end_page, extracts the selected table and returns the merged rows as CSV (attachment) or JSON.',
  })
  @ApiProduces('text/csv', 'application/json')
  @ApiResponse({
    status: HttpStatus.OK,
    description: 'Merged table, or rows: 0 with a message when no page had data',
  })
  @ApiBadRequestResponse({
    description: 'Bad request - invalid fields, end_page < start_page, or too many pages',
  })
  async scrape(
    @Body() dto: ScrapeRequestDto,
  ): Promise<ScrapeEmptyResponse | ScrapeJsonResponse | StreamableFile> {
    const table = await this.scrapeService.scrape(dto);

    if (!table) {
      return { rows: 0, message: NO_DATA_MESSAGE };
    }

    if (dto.format === 'json') {
      return { rows: table.rows.length, data: toRecords(table) };
    }

    return new StreamableFile(Buffer.from(toCsv(table), 'utf-8'), {
      type: 'text/csv',
      disposition: `attachment; filename=${CSV_FILENAME}`,
    });
  }
}
