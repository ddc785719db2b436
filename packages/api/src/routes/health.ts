import { Router } from 'express';
import type { EmailAnalyzer } from '@phishlens/core';
import { VERSION } from '../version.js';

export function createHealthRoutes(analyzer: EmailAnalyzer): Router {
  const router = Router();

  // Readiness probe for container orchestration
  router.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      model_version: analyzer.modelVersion,
      lexicon_version: analyzer.lexicon.version,
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
