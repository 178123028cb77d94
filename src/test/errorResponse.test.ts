import { describe, test, expect, vi } from 'vitest';
import { Request, Response } from 'express';
import { sendError } from '../utils/errorResponse';
import { ConflictError, NotFoundError, ValidationError } from '../types/errors.types';

const makeResponse = () => {
  const json = vi.fn();
  const status = vi.fn(() => ({ json }));
  return { res: { status } as unknown as Response, status, json };
};

const req = { originalUrl: '/cameras/abc' } as Request;

describe('sendError', () => {
  test('maps a validation error to 400 VALIDATION_ERROR', () => {
    const { res, status, json } = makeResponse();

    sendError(req, res, new ValidationError('brightness must be even'), 'updating camera');

    expect(status).toHaveBeenCalledWith(400);
    expect(json).toHaveBeenCalledWith({
      error: 'VALIDATION_ERROR',
      message: 'brightness must be even',
      path: '/cameras/abc',
    });
  });

  test('maps not-found and conflict errors to 404 and 409', () => {
    const notFound = makeResponse();
    const conflict = makeResponse();

    sendError(req, notFound.res, new NotFoundError('Camera not found.'), 'fetching camera');
    sendError(req, conflict.res, new ConflictError('Invalid IP format.'), 'listing cameras');

    expect(notFound.status).toHaveBeenCalledWith(404);
    expect(conflict.status).toHaveBeenCalledWith(409);
    expect(conflict.json).toHaveBeenCalledWith({
      error: 'CONFLICT',
      message: 'Invalid IP format.',
      path: '/cameras/abc',
    });
  });

  test('hides the details of unexpected errors behind a 500', () => {
    const { res, status, json } = makeResponse();

    sendError(req, res, new TypeError('cannot read properties of undefined'), 'handling request');

    expect(status).toHaveBeenCalledWith(500);
    expect(json).toHaveBeenCalledWith({
      error: 'INTERNAL_SERVER_ERROR',
      message: 'Something went wrong on the server.',
      path: '/cameras/abc',
    });
  });
});
