import { Router } from 'express';
import { appMetadata } from '../services/appMetadata.js';
import type { PipelineConfig } from '../types/shared.js';

export function createMetadataRouter(defaults: PipelineConfig) {
  const router = Router();

  // GET /api/metadata
  router.get('/', (_req, res) => {
    res.json(appMetadata(defaults.timeUnit, defaults.silenceGapSec));
  });

  return router;
}
