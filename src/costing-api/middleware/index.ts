import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';

export const requestLogger = morgan('dev');

export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({ success: false, error: `No route for ${req.method} ${req.path}` });
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  // body-parser rejects malformed JSON with a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ success: false, error: 'Request body is not valid JSON' });
    return;
  }
  console.error('[ERROR]', err.message);
  res.status(500).json({ success: false, error: err.message });
}
