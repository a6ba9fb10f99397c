import express, { NextFunction, Request, Response } from 'express';
import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { CustomError, errorHandler, notFound } from './errorHandler';

const createResponse = () => {
  const sent: { status?: number; body?: unknown } = {};
  const res: Response = Object.create(express.response);
  res.status = (code: number) => {
    sent.status = code;
    return res;
  };
  res.json = (body: unknown) => {
    sent.body = body;
    return res;
  };
  return { res, sent };
};

const next: NextFunction = () => undefined;

describe('errorHandler', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('uses the status carried by the error', () => {
    const { res, sent } = createResponse();
    const err: CustomError = Object.assign(new Error('Unexpected token } in JSON'), { status: 400 });

    errorHandler(err, Object.create(express.request), res, next);

    expect(sent.status).toBe(400);
    expect(sent.body).toMatchObject({ success: false, error: 'Unexpected token } in JSON' });
  });

  it('falls back to 500', () => {
    const { res, sent } = createResponse();

    errorHandler(new Error('boom'), Object.create(express.request), res, next);

    expect(sent.status).toBe(500);
    expect(sent.body).toMatchObject({ success: false, error: 'boom' });
  });
});

describe('notFound', () => {
  it('names the unknown route', () => {
    const { res, sent } = createResponse();
    const req: Request = Object.create(express.request);
    req.originalUrl = '/api/nope';

    notFound(req, res);

    expect(sent).toEqual({
      status: 404,
      body: { success: false, message: 'Route not found: /api/nope' },
    });
  });
});
