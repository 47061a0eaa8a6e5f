import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { logger } from './logger';

export class AppError extends Error {
  public statusCode: number;
  public isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Malformed request shape; raised before any extraction or scoring runs. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** The text-extraction collaborator could not turn a document into text. */
export class ExtractionFailure extends AppError {
  constructor(message: string) {
    super(`Extraction failed: ${message}`, 422);
  }
}

/** A correctness bug inside the engine. Not recoverable. */
export class InvariantViolation extends AppError {
  constructor(message: string) {
    super(`Invariant violated: ${message}`, 500, false);
  }
}

export interface ErrorResponse {
  status: number;
  body: { error: string };
}

function isJsonSyntaxError(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function resolveErrorResponse(err: Error): ErrorResponse {
  if (err instanceof AppError && err.isOperational) {
    return { status: err.statusCode, body: { error: err.message } };
  }

  if (isJsonSyntaxError(err)) {
    return { status: 400, body: { error: 'Malformed JSON body' } };
  }

  if (err instanceof multer.MulterError) {
    return { status: 400, body: { error: err.message } };
  }

  return { status: 500, body: { error: 'Internal server error' } };
}

export const handleError = (err: Error, req: Request, res: Response, next: NextFunction) => {
  const { status, body } = resolveErrorResponse(err);

  if (status >= 500) {
    logger.error('Unexpected error', { path: req.originalUrl, error: err });
  } else {
    logger.warn('Request rejected', { path: req.originalUrl, status, message: body.error });
  }

  if (res.headersSent) {
    return next(err);
  }

  res.status(status).json(body);
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    error: 'Route not found'
  });
};
