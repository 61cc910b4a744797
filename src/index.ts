import 'dotenv/config';
import { createApp } from './app.js';
import { initMongo } from './db/mongo.js';
import { env } from './config/env.js';
import { createRecognizer } from './services/recognizer.js';
import { MongoAnnotationSink } from './services/sink.js';
import { ffmpegTrimmer } from './services/trimmer.js';
import type { PipelineConfig } from './types/shared.js';

export const defaultConfig = (): PipelineConfig => ({
  useSegmentation: env.USE_SEGMENTATION,
  silenceGapSec: env.SILENCE_GAP_SEC,
  timeUnit: env.TIME_UNIT,
});

export async function startServer() {
  await initMongo();
  const app = createApp({
    pipeline: {
      recognizer: createRecognizer(env.RECOGNIZER, env),
      trimmer: ffmpegTrimmer,
      timeoutMs: env.PIPELINE_TIMEOUT_MS,
    },
    defaults: defaultConfig(),
    sink: new MongoAnnotationSink(),
    responseTimeoutMs: env.PIPELINE_TIMEOUT_MS + 60000,
  });

  app.listen(env.PORT, () => {
    console.log(`HTTP server listening on ${env.PORT} (recognizer: ${env.RECOGNIZER})`);
  });
}
