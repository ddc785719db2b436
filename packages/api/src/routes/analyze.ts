import express, { Router, type Request, type Response, type NextFunction } from 'express';
import { MalformedMessageError, debug, type EmailAnalyzer } from '@phishlens/core';

const ACCEPTED_CONTENT_TYPES = new Set(['message/rfc822', 'text/plain', 'application/octet-stream']);

const MB = 1024 * 1024;

function formatSize(bytes: number): string {
  return bytes % MB === 0 ? `${bytes / MB} MB` : `${bytes} bytes`;
}

function isTooLarge(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.too.large';
}

/** Optional string fields accept null as "not provided". */
function optionalString(value: unknown): value is string | null | undefined {
  return value === undefined || value === null || typeof value === 'string';
}

export function createAnalyzeRoutes(analyzer: EmailAnalyzer, maxUploadBytes: number): Router {
  const router = Router();
  const rawBody = express.raw({ type: () => true, limit: maxUploadBytes });

  router.post('/analyze/text', (req, res) => {
    const { subject, body, headers } = req.body ?? {};
    if (typeof body !== 'string' || body.length === 0) {
      res.status(400).json({ error: 'body is required and must be a non-empty string' });
      return;
    }
    if (!optionalString(subject) || !optionalString(headers)) {
      res.status(400).json({ error: 'subject and headers must be strings when provided' });
      return;
    }

    debug('analyze', `text submission (${body.length} chars)`);
    res.json(analyzer.analyzeText({ body, subject: subject ?? undefined, headers: headers ?? undefined }));
  });

  router.post(
    '/analyze/file',
    (req: Request, res: Response, next: NextFunction) => {
      const contentType = (req.headers['content-type'] ?? '').split(';')[0].trim().toLowerCase();
      if (!ACCEPTED_CONTENT_TYPES.has(contentType)) {
        res.status(415).json({ error: `Unsupported content type: ${contentType || 'none'}` });
        return;
      }
      rawBody(req, res, (err?: unknown) => {
        if (isTooLarge(err)) {
          res.status(413).json({ error: `File exceeds the maximum allowed size of ${formatSize(maxUploadBytes)}.` });
          return;
        }
        next(err);
      });
    },
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const contents: unknown = req.body;
        if (!Buffer.isBuffer(contents) || contents.length === 0) {
          res.status(400).json({ error: 'Uploaded file is empty.' });
          return;
        }

        debug('analyze', `file upload (${contents.length} bytes)`);
        const result = await analyzer.analyzeRaw(contents);
        res.status(201).json(result);
      } catch (err) {
        if (err instanceof MalformedMessageError) {
          res.status(400).json({ error: `Failed to parse email message: ${err.message}` });
          return;
        }
        next(err);
      }
    },
  );

  return router;
}
