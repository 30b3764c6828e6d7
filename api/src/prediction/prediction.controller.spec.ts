import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';

import { AppModule } from '../app.module';
import { configureApp } from '../app.setup';
import { FEATURE_SCHEMA } from '../features/feature-schema';
import { SCORER } from '../scoring/scorer';

describe('PredictionController (http)', () => {
  let app: INestApplication;
  const invoke = jest.fn<Promise<string>, [string, string]>();

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(SCORER)
      .useValue({ invoke })
      .compile();

    app = configureApp(moduleRef.createNestApplication());
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => invoke.mockReset());

  it('GET /api/v1/predict scores query parameters', async () => {
    invoke.mockResolvedValue('0.123456');

    const res = await request(app.getHttpServer())
      .get('/api/v1/predict')
      .query({ age: '56', campaign: '1', month_may: '1', unknown_field: 'x' })
      .expect(200)
      .expect('Content-Type', /application\/json/);

    expect(res.body).toEqual({ status: 'success', prediction: 0.123456 });
    const [payload, contentType] = invoke.mock.calls[0];
    const values = payload.split(',');
    expect(values).toHaveLength(58);
    expect(values[0]).toBe('56');
    expect(values[1]).toBe('1');
    expect(values[FEATURE_SCHEMA.indexOf('month_may')]).toBe('1');
    expect(contentType).toBe('text/csv');
  });

  it('GET /api/v1/predict with no parameters sends 58 zeros', async () => {
    invoke.mockResolvedValue('0.01');

    await request(app.getHttpServer()).get('/api/v1/predict').expect(200);

    expect(invoke).toHaveBeenCalledWith(new Array(58).fill('0').join(','), 'text/csv');
  });

  it('answers 400 for a malformed feature value', async () => {
    const res = await request(app.getHttpServer())
      .get('/api/v1/predict?age=56&campaign=abc')
      .expect(400)
      .expect('Content-Type', /application\/json/);

    expect(res.body).toEqual({
      status: 'error',
      error: 'EncodingError',
      message: 'Invalid value for feature "campaign": "abc" is not a number',
      feature: 'campaign',
    });
    expect(invoke).not.toHaveBeenCalled();
  });

  it('answers 502 with a generic message when the scorer fails', async () => {
    invoke.mockRejectedValue(new Error('socket hang up at 10.0.0.7'));

    const res = await request(app.getHttpServer()).get('/api/v1/predict?age=30').expect(502);

    expect(res.body).toEqual({
      status: 'error',
      error: 'ScoringTransportError',
      message: 'Scoring service unavailable',
    });
  });

  it('POST /api/v1/predict scores a features body', async () => {
    invoke.mockResolvedValue('0.6');

    const res = await request(app.getHttpServer())
      .post('/api/v1/predict')
      .send({ features: { age: 41, loan_yes: true } })
      .expect(200);

    expect(res.body).toEqual({ status: 'success', prediction: 0.6 });
    const values = invoke.mock.calls[0][0].split(',');
    expect(values[0]).toBe('41');
    expect(values[FEATURE_SCHEMA.indexOf('loan_yes')]).toBe('1');
  });

  it('POST /api/v1/predict rejects a body without a features object', async () => {
    await request(app.getHttpServer())
      .post('/api/v1/predict')
      .send({ features: 'age=41' })
      .expect(400);

    await request(app.getHttpServer())
      .post('/api/v1/predict')
      .send({ features: {}, extra: 1 })
      .expect(400);

    expect(invoke).not.toHaveBeenCalled();
  });

  it('GET /api/v1/predict/features lists the schema', async () => {
    const res = await request(app.getHttpServer()).get('/api/v1/predict/features').expect(200);

    expect(res.body.count).toBe(58);
    expect(res.body.features).toEqual([...FEATURE_SCHEMA]);
  });

  it('GET /api/v1/health reports the feature count', async () => {
    const res = await request(app.getHttpServer()).get('/api/v1/health').expect(200);

    expect(res.body).toMatchObject({ ok: true, version: 'v1', features: 58 });
  });
});
