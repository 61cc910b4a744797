import { z } from 'zod';
import type { AnnotationRequest, PipelineConfig } from '../types/shared.js';

const timeUnitSchema = z.enum(['milliseconds', 'seconds']);

// Document ids end up in file names under the work directory.
const documentSchema = z.object({
  id: z.string().regex(/^[\w.-]+$/, 'must contain only letters, digits, "_", "." or "-"'),
  type: z.enum(['AudioDocument', 'VideoDocument', 'TextDocument']),
  location: z.string().optional(),
  text: z.string().optional(),
});

const annotationSchema = z.discriminatedUnion('type', [
  z.object({
    id: z.string().min(1),
    type: z.literal('TimeFrame'),
    frameType: z.string().optional(),
    start: z.number(),
    end: z.number(),
    document: z.string().optional(),
  }),
  z.object({
    id: z.string().min(1),
    type: z.literal('Token'),
    word: z.string(),
    start: z.number(),
    end: z.number(),
    document: z.string(),
  }),
  z.object({
    id: z.string().min(1),
    type: z.literal('Alignment'),
    source: z.string(),
    target: z.string(),
  }),
]);

export const viewSchema = z.object({
  id: z.string().min(1),
  metadata: z
    .object({
      app: z.string().optional(),
      timestamp: z.string().optional(),
      timeUnit: timeUnitSchema.optional(),
      contains: z.record(z.record(z.string())).optional(),
    })
    .default({}),
  documents: z.array(documentSchema).default([]),
  annotations: z.array(annotationSchema).default([]),
});

export const annotationRequestSchema = z.object({
  documents: z.array(documentSchema),
  views: z.array(viewSchema).default([]),
});

export const annotatedResultSchema = annotationRequestSchema.extend({
  outcomes: z.array(
    z.discriminatedUnion('status', [
      z.object({ documentId: z.string(), status: z.literal('ok'), view: viewSchema }),
      z.object({ documentId: z.string(), status: z.literal('error'), message: z.string() }),
    ])
  ),
});

export function parseAnnotationRequest(body: unknown): AnnotationRequest {
  return annotationRequestSchema.parse(body);
}

// Query-string / form parameters; all optional, falling back to the configured defaults.
export const runParamsSchema = z.object({
  use_speech_segmentation: z.enum(['true', 'false']).optional(),
  silence_gap: z.coerce.number().nonnegative().optional(),
  pretty: z.enum(['true', 'false']).optional(),
});

export type RunParams = z.infer<typeof runParamsSchema>;

export function resolveConfig(defaults: PipelineConfig, params: RunParams): PipelineConfig {
  return {
    ...defaults,
    useSegmentation:
      params.use_speech_segmentation === undefined
        ? defaults.useSegmentation
        : params.use_speech_segmentation === 'true',
    silenceGapSec: params.silence_gap ?? defaults.silenceGapSec,
  };
}
