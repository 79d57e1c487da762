import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { TerminusModule, TypeOrmHealthIndicator } from '@nestjs/terminus';
import request from 'supertest';
import { QueueHealthIndicator, REDIS_CLIENT } from '@invoice-intake/queue';
import { FakeRedis } from '@invoice-intake/queue/testing';
import { JobWorkerService } from '../document-processing/job-worker.service';
import { HealthController } from './health.controller';
import { WorkerPoolHealthIndicator } from './worker-pool.health';

describe('GET /health (worker)', () => {
  let app: INestApplication;
  let redis: FakeRedis;
  let worker: { isRunning: boolean };
  const db = {
    pingCheck: jest.fn(() => Promise.resolve({ database: { status: 'up' } })),
  };

  beforeEach(async () => {
    redis = new FakeRedis();
    worker = { isRunning: true };
    const moduleRef = await Test.createTestingModule({
      imports: [TerminusModule],
      controllers: [HealthController],
      providers: [
        QueueHealthIndicator,
        WorkerPoolHealthIndicator,
        { provide: REDIS_CLIENT, useValue: redis },
        { provide: JobWorkerService, useValue: worker },
      ],
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

  it('reports database, queue and worker loops as up', async () => {
    const response = await request(app.getHttpServer()).get('/health').expect(200);

    expect(response.body.status).toBe('ok');
    expect(response.body.info).toEqual({
      database: { status: 'up' },
      queue: { status: 'up' },
      workers: { status: 'up' },
    });
  });

  it('answers 503 once the worker loops have stopped', async () => {
    worker.isRunning = false;

    const response = await request(app.getHttpServer()).get('/health').expect(503);

    expect(response.body.error).toEqual({
      workers: { status: 'down', message: 'Worker loops are stopped' },
    });
    expect(response.body.info).toEqual({
      database: { status: 'up' },
      queue: { status: 'up' },
    });
  });

  it('answers 503 when Redis is unreachable', async () => {
    await redis.quit();

    const response = await request(app.getHttpServer()).get('/health').expect(503);

    expect(response.body.error).toEqual({
      queue: { status: 'down', message: 'Connection is closed.' },
    });
  });
});
