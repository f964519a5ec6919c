/**
 * Health check route
 */
import { Router, type Router as ExpressRouter } from 'express';
import { config } from '../config/env.js';
import type { AppServices } from '../app.js';

export function createHealthRouter(services: AppServices): ExpressRouter {
  const router = Router();

  router.get('/', (req, res) => {
    const missing = [
      services.recognizer ? null : 'DEEPGRAM_API_KEY',
      services.synthesizer ? null : 'GOOGLE_CLOUD_CREDENTIALS_JSON',
      services.generator ? null : 'OPENAI_API_KEY',
    ].filter((key): key is string => key !== null);

    res.status(missing.length === 0 ? 200 : 500).json({
      status: missing.length === 0 ? 'ok' : 'missing_env',
      missing,
      node: process.version,
      environment: config.NODE_ENV,
    });
  });

  return router;
}
