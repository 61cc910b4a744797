import express from 'express';
import cors from 'cors';
import { createAnnotateRouter, type AnnotateRouterDeps } from './http/annotate.routes.js';
import { createMetadataRouter } from './http/metadata.routes.js';
import { errorHandler } from './middleware/error.middleware.js';

export interface AppOptions extends AnnotateRouterDeps {
  responseTimeoutMs?: number;
}

export function createApp(options: AppOptions) {
  const app = express();
  app.use(cors({ origin: '*', credentials: true }));
  app.use(express.json({ limit: '50mb' }));

  // Recognition of long files is slow; the pipeline enforces its own timeout.
  const { responseTimeoutMs } = options;
  if (responseTimeoutMs) {
    app.use((req, res, next) => {
      res.setTimeout(responseTimeoutMs);
      next();
    });
  }

  app.use('/api/metadata', createMetadataRouter(options.defaults));
  app.use(
    '/api/annotate',
    createAnnotateRouter({ pipeline: options.pipeline, defaults: options.defaults, sink: options.sink })
  );
  app.use(errorHandler);
  return app;
}
