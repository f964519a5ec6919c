/**
 * Error handling middleware and utilities
 */
import type { Request, Response, NextFunction, RequestHandler } from 'express';

export class ApiError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(statusCode: number, message: string, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

export type CollaboratorName = 'speech-recognition' | 'speech-synthesis' | 'sentence-generation';

/**
 * Failure of an external service the backend depends on (answered as 502)
 */
export class CollaboratorError extends Error {
  readonly service: CollaboratorName;

  constructor(service: CollaboratorName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.service = service;
  }
}

export class RecognitionError extends CollaboratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('speech-recognition', message, options);
  }
}

export class SynthesisError extends CollaboratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('speech-synthesis', message, options);
  }
}

export class GenerationError extends CollaboratorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('sentence-generation', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // Express recognizes error middleware by its four parameters
  _next: NextFunction
) => {
  if (err instanceof ApiError) {
    return res.status(err.statusCode).json({
      error: err.message,
      status: err.statusCode,
    });
  }

  if (err instanceof CollaboratorError) {
    console.error(`❌ [${err.service}] ${err.message}`);
    return res.status(502).json({
      error: err.message,
      service: err.service,
      status: 502,
    });
  }

  // Malformed JSON from body-parser
  if (err instanceof SyntaxError && 'body' in err) {
    return res.status(400).json({ error: 'Invalid JSON body', status: 400 });
  }

  // Log unexpected errors
  console.error('Unexpected error:', err);

  return res.status(500).json({
    error: 'Internal server error',
    status: 500,
    ...(process.env.NODE_ENV === 'development' ? { stack: err.stack } : {}),
  });
};

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler => {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
