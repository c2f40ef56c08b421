import type { NextFunction, Request, Response } from 'express';
import { MulterError } from 'multer';
import { KeywordError, errorMessage } from '../errors';

export function errorHandler(error: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const clientError = error instanceof KeywordError || error instanceof MulterError;
  if (clientError) {
    console.warn('⚠️ Request rejected:', errorMessage(error));
  } else {
    console.error('❌ Request failed:', error);
  }

  res.status(clientError ? 400 : 500).json({
    success: false,
    message: errorMessage(error)
  });
}
