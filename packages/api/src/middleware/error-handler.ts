import type { Request, Response, NextFunction } from 'express';

function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  if ('status' in err && typeof err.status === 'number') return err.status;
  return undefined;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`[ERROR] ${req.method} ${req.path}:`, err instanceof Error ? err.stack || message : message);

  if (res.headersSent) return;

  const status = statusOf(err);

  // JSON parse error from express.json() middleware
  if (err instanceof SyntaxError && status === 400) {
    res.status(400).json({ error: 'Invalid JSON in request body' });
    return;
  }

  // Use explicit status if set on the error object (body-parser sets it on 413/415)
  if (status !== undefined && status >= 400 && status < 600) {
    res.status(status).json({ error: message });
    return;
  }

  res.status(500).json({ error: message || 'Internal server error' });
}
