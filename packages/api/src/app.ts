import express from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import {
  resolveConfig,
  createAnalyzerFromConfig,
  type EmailAnalyzer,
  type PhishLensConfig,
  type PhishLensConfigOverrides,
} from '@phishlens/core';
import { errorHandler } from './middleware/error-handler.js';
import { createHealthRoutes } from './routes/health.js';
import { createAnalyzeRoutes } from './routes/analyze.js';

export interface AppContext {
  config: PhishLensConfig;
  analyzer: EmailAnalyzer;
}

export function createApp(configOverrides?: PhishLensConfigOverrides): {
  app: express.Express;
  context: AppContext;
} {
  const config = resolveConfig(configOverrides);
  const analyzer = createAnalyzerFromConfig(config);

  const app = express();
  const origins = config.api.allowedOrigins;

  // Global middleware
  app.use(cors({ origin: origins.includes('*') ? true : origins }));
  app.use(express.json({ limit: '10mb' }));
  app.use(
    rateLimit({
      windowMs: 60 * 1000,
      limit: 100,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: 'Too many requests, please try again later' },
    }),
  );

  app.use(createHealthRoutes(analyzer));
  app.use('/api', createAnalyzeRoutes(analyzer, config.api.maxUploadBytes));

  // 404 handler for unmatched API routes
  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  return { app, context: { config, analyzer } };
}
