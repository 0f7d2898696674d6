import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';

export class ApiError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

let errorSequence = 0;

export const createErrorId = (now: Date = new Date()): string => {
  const pad = (value: number) => String(value).padStart(2, '0');
  const stamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  errorSequence = (errorSequence + 1) % 10000;
  return `ERR_${stamp}_${errorSequence}`;
};

export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({ success: false, error: `Route not found: ${req.method} ${req.originalUrl}` });
};

// Express identifies error middleware by arity, so `_next` must stay.
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof ApiError) {
    if (err.statusCode >= 500) {
      console.error(`❌ [API] ${req.method} ${req.originalUrl}:`, err.message);
    }
    res.status(err.statusCode).json({
      success: false,
      error: err.message,
      ...(err.details !== undefined ? { details: err.details } : {}),
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      success: false,
      error: 'Invalid request payload',
      details: err.flatten().fieldErrors,
    });
    return;
  }

  const errorId = createErrorId();
  console.error(`❌ [API] ${errorId} | ${req.method} ${req.originalUrl}:`, err);
  res.status(500).json({
    success: false,
    error: 'Internal server error',
    errorId,
  });
};
