import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { TerminusModule, TypeOrmHealthIndicator } from '@nestjs/terminus';
import request from 'supertest';
import { QueueHealthIndicator, REDIS_CLIENT } from '@invoice-intake/queue';
import { FakeRedis } from '@invoice-intake/queue/testing';
import { HealthController } from './health.controller';

describe('GET /health', () => {
  let app: INestApplication;
  let redis: FakeRedis;
  const db = {
    pingCheck: jest.fn(() => Promise.resolve({ database: { status: 'up' } })),
  };

  beforeEach(async () => {
    redis = new FakeRedis();
    const moduleRef = await Test.createTestingModule({
      imports: [TerminusModule],
      controllers: [HealthController],
      providers: [QueueHealthIndicator, { provide: REDIS_CLIENT, useValue: redis }],
    })
      .overrideProvider(TypeOrmHealthIndicator)
      .useValue(db)
      .compile();

    app = moduleRef.createNestApplication({ logger: false });
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports the database and the queue as up', async () => {
    const response = await request(app.getHttpServer()).get('/health').expect(200);

    expect(response.body).toEqual({
      status: 'ok',
      info: { database: { status: 'up' }, queue: { status: 'up' } },
      error: {},
      details: { database: { status: 'up' }, queue: { status: 'up' } },
    });
    expect(db.pingCheck).toHaveBeenCalledWith('database', { timeout: 3000 });
  });

  it('answers 503 when Redis is unreachable', async () => {
    await redis.quit();

    const response = await request(app.getHttpServer()).get('/health').expect(503);

    expect(response.body.status).toBe('error');
    expect(response.body.info).toEqual({ database: { status: 'up' } });
    expect(response.body.error).toEqual({
      queue: { status: 'down', message: 'Connection is closed.' },
    });
  });
});
