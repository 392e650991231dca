import { describe, it, expect, jest, afterEach } from '@jest/globals';
import express from 'express';
import request from 'supertest';
import { HttpError } from '../errors/http-error.js';
import { errorHandler } from '../middleware/error-handler.js';

function appFailingWith(err: unknown) {
  const app = express();
  app.get('/boom', (_req, _res, next) => next(err));
  app.use(errorHandler);
  return app;
}

afterEach(() => {
  jest.restoreAllMocks();
});

describe('errorHandler', () => {
  it('uses the status of an HttpError', async () => {
    const res = await request(appFailingWith(new HttpError(409, 'busy'))).get('/boom').expect(409);
    expect(res.body).toEqual({ error: 'busy' });
  });

  it('keeps a status attached by express middleware', async () => {
    const err = Object.assign(new Error('gone'), { status: 404 });
    const res = await request(appFailingWith(err)).get('/boom').expect(404);
    expect(res.body).toEqual({ error: 'gone' });
  });

  it('logs and returns 500 for other errors', async () => {
    const log = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const res = await request(appFailingWith(new Error('kaput'))).get('/boom').expect(500);
    expect(res.body).toEqual({ error: 'kaput' });
    expect(log).toHaveBeenCalledTimes(1);
  });

  it('hides thrown non-errors', async () => {
    const res = await request(appFailingWith('oops')).get('/boom').expect(500);
    expect(res.body).toEqual({ error: 'Internal server error' });
  });
});
