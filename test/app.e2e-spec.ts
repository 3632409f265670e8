import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { App } from 'supertest/types';
import { AppModule } from './../src/app.module';
import { buildConfig } from './../src/briefing/testing/fixtures';

describe('Briefing API (e2e)', () => {
  let app: INestApplication<App>;

  beforeEach(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule.register(buildConfig())],
    }).compile();

    app = moduleFixture.createNestApplication({ logger: false });
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('/health (GET)', () => {
    return request(app.getHttpServer()).get('/health').expect(200).expect({
      status: 'ok',
      service: 'sports-briefing-assistant',
    });
  });

  it('/ (GET)', () => {
    return request(app.getHttpServer())
      .get('/')
      .expect(200)
      .expect((res) => {
        const body = res.body as { service?: string; sources?: number };
        expect(body.service).toBe('sports-briefing-assistant');
        expect(body.sources).toBe(2);
      });
  });

  it('/pipeline/runs (GET) starts empty', () => {
    return request(app.getHttpServer())
      .get('/pipeline/runs')
      .expect(200)
      .expect([]);
  });

  it('/pipeline/run (POST) rejects a malformed date', () => {
    return request(app.getHttpServer())
      .post('/pipeline/run')
      .send({ date: '2026-02-30' })
      .expect(400);
  });

  it('/pipeline/stages/:stage (POST) needs a staged batch for index', () => {
    return request(app.getHttpServer())
      .post('/pipeline/stages/index')
      .send({ date: '2026-03-10' })
      .expect(400)
      .expect((res) => {
        const body = res.body as { message?: string };
        expect(body.message).toBe(
          'no staged records for 2026-03-10; run the collect stage first',
        );
      });
  });

  it('/reports/:date (GET) is 404 before any report exists', () => {
    return request(app.getHttpServer()).get('/reports/2026-03-10').expect(404);
  });

  it('/chat/ask (POST) rejects an empty question', () => {
    return request(app.getHttpServer())
      .post('/chat/ask')
      .send({ question: '   ' })
      .expect(400);
  });
});
