import { z } from 'zod';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  MONGO_URI: z.string().default('mongodb://127.0.0.1:27017/patchwork'),
  MONGO_DB_NAME: z.string().default('patchwork_asr'),
  TIME_UNIT: z.enum(['milliseconds', 'seconds']).default('milliseconds'),
  SILENCE_GAP_SEC: z.coerce.number().nonnegative().default(1),
  USE_SEGMENTATION: flag.default('true'),
  PIPELINE_TIMEOUT_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  FFMPEG_PATH: z.string().default('ffmpeg'),
  KALDI_ROOT: z.string().optional(),
  RECOGNIZER: z.enum(['kaldi', 'deepgram', 'transcripts']).default('kaldi'),
  DEEPGRAM_API_KEY: z.string().default(''),
  DEEPGRAM_MODEL: z.string().default('nova-3'),
  TRANSCRIPT_DIR: z.string().default('output'),
});

export type Env = z.infer<typeof envSchema>;

export const env: Env = envSchema.parse(process.env);
