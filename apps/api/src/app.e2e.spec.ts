import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { readFileSync } from 'fs';
import { resolve } from 'path';
import request from 'supertest';
import { MockAgent, getGlobalDispatcher, setGlobalDispatcher } from 'undici';
import type { Dispatcher } from 'undici';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';

const ORIGIN = 'http://catalog.test';
const HOME_PAGE = resolve(__dirname, '../public/index.html');

function pageHtml(rows: string[][]): string {
  const body = rows.map(row => `<tr>${row.map(cell => `<td>${cell}</td>`).join('')}</tr>`).join('');
  return `<html><body><table class="catalog"><tr><th>Title</th><th>Year</th></tr>${body}</table></body></html>`;
}

describe('Tablesweep API (e2e)', () => {
  let app: INestApplication;
  let originalDispatcher: Dispatcher;
  let mockAgent: MockAgent;

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication({ logger: false });
    configureApp(app);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    originalDispatcher = getGlobalDispatcher();
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
    setGlobalDispatcher(mockAgent);
  });

  afterEach(async () => {
    await mockAgent.close();
    setGlobalDispatcher(originalDispatcher);
  });

  it('GET /api/health', async () => {
    const response = await request(app.getHttpServer()).get('/api/health').expect(200);

    expect(response.body).toEqual({ status: 'ok' });
  });

  it('GET / serves the home page file as-is', async () => {
    const response = await request(app.getHttpServer()).get('/').expect(200);

    expect(response.headers['content-type']).toMatch(/^text\/html/);
    expect(response.text).toBe(readFileSync(HOME_PAGE, 'utf-8'));
  });

  describe('POST /api/scrape', () => {
    it('should reject an end page before the start page', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/scrape')
        .send({ template: `${ORIGIN}/list`, start_page: 5, end_page: 3 })
        .expect(400);

      expect(response.body).toEqual(
        expect.objectContaining({ statusCode: 400, detail: 'end_page must be >= start_page' }),
      );
    });

    it('should reject more pages than max_pages_per_request', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/scrape')
        .send({ template: `${ORIGIN}/list`, start_page: 1, end_page: 50, max_pages_per_request: 10 })
        .expect(400);

      expect(response.body.detail).toBe('Too many pages (max 10).');
    });

    it('should reject out-of-range fields', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/scrape')
        .send({ template: `${ORIGIN}/list`, concurrency: 64 })
        .expect(400);

      expect(response.body.detail).toEqual(['concurrency must not be greater than 32']);
    });

    it('should reject an unknown header strategy', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/scrape')
        .send({ template: `${ORIGIN}/list`, header_strategy: 'guess' })
        .expect(400);

      expect(response.body.detail).toEqual([
        'header_strategy must be one of the following values: auto, th, first_row',
      ]);
    });

    it('should reject a null header strategy', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/scrape')
        .send({ template: `${ORIGIN}/list`, header_strategy: null })
        .expect(400);

      expect(response.body.detail).toEqual([
        'header_strategy must be one of the following values: auto, th, first_row',
      ]);
    });

    it('should reject a null start page', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/scrape')
        .send({ template: `${ORIGIN}/list`, start_page: null, end_page: 1 })
        .expect(400);

      expect(response.body.detail).toEqual(expect.arrayContaining(['start_page must be an integer number']));
    });

    it('should reject a start page of 0', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/scrape')
        .send({ template: `${ORIGIN}/list`, start_page: 0, end_page: 1 })
        .expect(400);

      expect(response.body.detail).toEqual(['start_page must not be less than 1']);
    });

    it('should reject null in place of a default', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/scrape')
        .send({ template: `${ORIGIN}/list`, format: null })
        .expect(400);

      expect(response.body.detail).toEqual(['format must be one of the following values: csv, json']);
    });

    it('should reject unknown fields', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/scrape')
        .send({ template: `${ORIGIN}/list`, pages: 3 })
        .expect(400);

      expect(response.body.detail).toEqual(['property pages should not exist']);
    });

    it('should require a template', async () => {
      await request(app.getHttpServer()).post('/api/scrape').send({}).expect(400);
    });

    it('should answer 200 with rows 0 when no page has data', async () => {
      mockAgent.get(ORIGIN).intercept({ path: '/list?page=1', method: 'GET' }).reply(500, 'down');

      const response = await request(app.getHttpServer())
        .post('/api/scrape')
        .send({ template: `${ORIGIN}/list` })
        .expect(200);

      expect(response.body).toEqual({
        rows: 0,
        message: 'No data found. Tweak selector/table index/header strategy.',
      });
    });

    it('should return json records', async () => {
      const pool = mockAgent.get(ORIGIN);
      pool.intercept({ path: '/books/1', method: 'GET' }).reply(200, pageHtml([['Dune', '1965']]));
      pool.intercept({ path: '/books/2', method: 'GET' }).reply(200, pageHtml([['Emma', '1815']]));

      const response = await request(app.getHttpServer())
        .post('/api/scrape')
        .send({
          template: `${ORIGIN}/books/{page}`,
          css_selector: 'table.catalog',
          start_page: 1,
          end_page: 2,
          concurrency: 1,
          format: 'json',
        })
        .expect(200);

      expect(response.body).toEqual({
        rows: 2,
        data: [
          { Title: 'Dune', Year: '1965' },
          { Title: 'Emma', Year: '1815' },
        ],
      });
    });

    it('should return a csv attachment', async () => {
      mockAgent
        .get(ORIGIN)
        .intercept({ path: '/books?page=3', method: 'GET' })
        .reply(200, pageHtml([['Ulysses, Annotated', '1922']]));

      const response = await request(app.getHttpServer())
        .post('/api/scrape')
        .send({ template: `${ORIGIN}/books?page=1`, start_page: 3, end_page: 3 })
        .expect(200);

      expect(response.headers['content-type']).toMatch(/^text\/csv/);
      expect(response.headers['content-disposition']).toBe('attachment; filename=scraped_table.csv');
      expect(response.text).toBe('Title,Year\n"Ulysses, Annotated",1922\n');
    });
  });
});
