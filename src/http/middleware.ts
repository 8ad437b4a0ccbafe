import { DocumentError, ValidationError } from '@/domain/errors';
import type { ErrorRequestHandler, RequestHandler } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { type ErrorBody, HttpError } from './errors';

/**
 * Log method, path, status and duration of every request.
 */
export const requestLogger: RequestHandler = (req, res, next) => {
  const startedAt = Date.now();
  res.on('finish', () => {
    console.log(
      `[HTTP] ${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms`,
    );
  });
  next();
};

export const notFound: RequestHandler = (req, _res, next) => {
  next(new HttpError(404, `Route ${req.method} ${req.path} not found`));
};

/**
 * Errors raised by body-parser carry a `type` such as "entity.parse.failed"
 */
function bodyParserErrorType(error: unknown): string | undefined {
  if (error instanceof Error && 'type' in error && typeof error.type === 'string') {
    return error.type;
  }
  return undefined;
}

function toErrorResponse(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof HttpError) {
    return { status: error.status, body: { error: error.message, details: error.details } };
  }

  if (error instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: 'Invalid request body',
        details: error.issues.map((issue) => ({
          field: issue.path.join('.'),
          message: issue.message,
        })),
      },
    };
  }

  if (error instanceof ValidationError) {
    return {
      status: 400,
      body: {
        error: error.message,
        details: error.field ? [{ field: error.field, message: error.message }] : undefined,
      },
    };
  }

  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      return { status: 413, body: { error: 'Uploaded file is too large' } };
    }
    return { status: 400, body: { error: error.message } };
  }

  if (error instanceof DocumentError) {
    return { status: 422, body: { error: error.message } };
  }

  switch (bodyParserErrorType(error)) {
    case 'entity.parse.failed':
      return { status: 400, body: { error: 'Request body is not valid JSON' } };
    case 'entity.too.large':
      return { status: 413, body: { error: 'Request body is too large' } };
  }

  return { status: 500, body: { error: 'Internal server error' } };
}

/**
 * Map thrown errors to a status code and a JSON error body.
 */
export const errorHandler: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const { status, body } = toErrorResponse(error);
  if (status >= 500) {
    console.error(`[HTTP] ${req.method} ${req.originalUrl} failed:`, error);
  } else {
    console.warn(`[HTTP] ${req.method} ${req.originalUrl} rejected (${status}): ${body.error}`);
  }
  res.status(status).json(body);
};
