import { Router } from 'express';
import { promises as fs } from 'fs';
import multer from 'multer';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { annotateRequest, sniff, type PipelineDeps } from '../services/pipeline.js';
import { parseAnnotationRequest, resolveConfig, runParamsSchema } from '../services/request.js';
import type { AnnotationSink } from '../services/sink.js';
import { validateSegments } from '../services/timeline.js';
import type { AnnotatedResult, AnnotationRequest, PipelineConfig, Segment, TimeUnit } from '../types/shared.js';

export interface AnnotateRouterDeps {
  pipeline: Omit<PipelineDeps, 'config'>;
  defaults: PipelineConfig;
  sink: AnnotationSink;
}

const upload = multer({ storage: multer.memoryStorage() });

// Segments posted alongside an uploaded file, in `timeUnit` (default seconds).
const uploadMetaSchema = z.object({
  segments: z
    .string()
    .optional()
    .transform((s, ctx) => {
      if (!s) return [];
      try {
        return z.array(z.object({ start: z.number(), end: z.number() })).parse(JSON.parse(s));
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'segments must be a JSON array of { start, end }' });
        return z.NEVER;
      }
    }),
  timeUnit: z.enum(['milliseconds', 'seconds']).default('seconds'),
});

// The upload lives in its own temp dir for the duration of the run.
async function withUploadedFile<T>(buffer: Buffer, name: string, fn: (location: string) => Promise<T>): Promise<T> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchwork-upload-'));
  try {
    const location = path.join(dir, `upload${path.extname(name) || '.bin'}`);
    await fs.writeFile(location, buffer);
    return await fn(location);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

function uploadRequest(location: string, segments: Segment[], timeUnit: TimeUnit): AnnotationRequest {
  return {
    documents: [{ id: 'd1', type: 'AudioDocument', location }],
    views: segments.length
      ? [
          {
            id: 'v_0',
            metadata: { timeUnit },
            documents: [],
            annotations: segments.map((s) => ({
              id: s.id,
              type: 'TimeFrame' as const,
              frameType: 'speech',
              start: s.start,
              end: s.end,
              document: 'd1',
            })),
          },
        ]
      : [],
  };
}

const serialize = (body: { runId: string } & AnnotatedResult, pretty: boolean) =>
  JSON.stringify(body, null, pretty ? 2 : undefined);

export function createAnnotateRouter(deps: AnnotateRouterDeps) {
  const router = Router();

  async function run(request: AnnotationRequest, config: PipelineConfig) {
    const runId = uuidv4();
    const result = await annotateRequest(request, { ...deps.pipeline, config });
    await deps.sink.save({ runId, config, recognizer: deps.pipeline.recognizer.name, result });
    return { runId, ...result };
  }

  // POST /api/annotate  (JSON annotation request)
  router.post('/', async (req, res, next) => {
    try {
      const params = runParamsSchema.parse(req.query);
      const request = parseAnnotationRequest(req.body);
      if (deps.pipeline.recognizer.needsAudio && !sniff(request)) {
        res.status(400).json({ message: 'No audio or video document with a location' });
        return;
      }
      const body = await run(request, resolveConfig(deps.defaults, params));
      res.type('application/json').send(serialize(body, params.pretty === 'true'));
    } catch (err) {
      next(err);
    }
  });

  // POST /api/annotate/upload  multipart: audio (file), segments (JSON), timeUnit
  router.post('/upload', upload.single('audio'), async (req, res, next) => {
    try {
      if (!req.file) {
        res.status(400).json({ message: 'Missing audio file (field name: audio)' });
        return;
      }
      const params = runParamsSchema.parse(req.query);
      const meta = uploadMetaSchema.parse(req.body ?? {});
      const segments = meta.segments.map((s, i) => ({ id: `tf${i + 1}`, start: s.start, end: s.end }));
      validateSegments(segments);

      const { buffer, originalname } = req.file;
      const body = await withUploadedFile(buffer, originalname, (location) =>
        run(uploadRequest(location, segments, meta.timeUnit), resolveConfig(deps.defaults, params))
      );
      res.type('application/json').send(serialize(body, params.pretty === 'true'));
    } catch (err) {
      next(err);
    }
  });

  // GET /api/annotate/:runId
  router.get('/:runId', async (req, res, next) => {
    try {
      const stored = await deps.sink.find(req.params.runId);
      if (!stored) {
        res.status(404).json({ message: 'Run not found' });
        return;
      }
      res.json(stored);
    } catch (err) {
      next(err);
    }
  });

  return router;
}
