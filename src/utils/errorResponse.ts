import { Request, Response } from 'express';
import { ZodError } from 'zod';
import { ErrorCode, ErrorResponse } from '../types/api.types';
import { isRegistryError, RegistryErrorKind } from '../types/errors.types';
import { logger } from '../config/logger.config';

const registryErrors: Record<RegistryErrorKind, { status: number; code: ErrorCode }> = {
  NOT_FOUND: { status: 404, code: 'NOT_FOUND' },
  CONFLICT: { status: 409, code: 'CONFLICT' },
  VALIDATION: { status: 400, code: 'VALIDATION_ERROR' },
};

export const invalidRequest = (message: string, error?: ZodError): ErrorResponse => ({
  error: 'INVALID_REQUEST',
  message,
  details: error?.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  })),
});

/**
 * Translates anything a handler threw into a response. Schema failures are
 * 400s, registry errors keep their kind, everything else is a 500 whose
 * details stay in the log.
 */
export const sendError = (req: Request, res: Response, error: unknown, action: string): void => {
  if (error instanceof ZodError) {
    logger.warn(`Invalid request while ${action}: ${error.issues.length} issue(s)`);
    res.status(400).json(invalidRequest('Request validation failed', error));
    return;
  }

  if (isRegistryError(error)) {
    const { status, code } = registryErrors[error.kind];
    const body: ErrorResponse = { error: code, message: error.message, path: req.originalUrl };
    res.status(status).json(body);
    return;
  }

  logger.error(`❌ Error ${action}: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
  const body: ErrorResponse = {
    error: 'INTERNAL_SERVER_ERROR',
    message: 'Something went wrong on the server.',
    path: req.originalUrl,
  };
  res.status(500).json(body);
};
