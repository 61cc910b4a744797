// src/services/sink.ts
import AnnotationRun from '../models/AnnotationRun.js';
import type { AnnotatedResult, PipelineConfig } from '../types/shared.js';
import { annotatedResultSchema } from './request.js';

export interface StoredRun {
  runId: string;
  config: PipelineConfig;
  recognizer: string;
  result: AnnotatedResult;
}

export interface AnnotationSink {
  save(run: StoredRun): Promise<string>;
  find(runId: string): Promise<StoredRun | null>;
}

const summarize = (result: AnnotatedResult) =>
  result.outcomes.map((o) =>
    o.status === 'ok'
      ? { documentId: o.documentId, status: o.status, viewId: o.view.id }
      : { documentId: o.documentId, status: o.status, message: o.message }
  );

export class MongoAnnotationSink implements AnnotationSink {
  async save(run: StoredRun): Promise<string> {
    await AnnotationRun.create({
      runId: run.runId,
      config: run.config,
      recognizer: run.recognizer,
      outcomes: summarize(run.result),
      result: run.result,
    });
    return run.runId;
  }

  async find(runId: string): Promise<StoredRun | null> {
    const doc = await AnnotationRun.findOne({ runId }).lean();
    if (!doc) return null;
    return {
      runId,
      config: {
        useSegmentation: doc.config?.useSegmentation ?? true,
        silenceGapSec: doc.config?.silenceGapSec ?? 1,
        timeUnit: doc.config?.timeUnit === 'seconds' ? 'seconds' : 'milliseconds',
      },
      recognizer: doc.recognizer ?? '',
      result: annotatedResultSchema.parse(doc.result),
    };
  }
}

/** Keeps runs in process, for tests. */
export class MemoryAnnotationSink implements AnnotationSink {
  private readonly runs = new Map<string, StoredRun>();

  async save(run: StoredRun): Promise<string> {
    this.runs.set(run.runId, run);
    return run.runId;
  }

  async find(runId: string): Promise<StoredRun | null> {
    return this.runs.get(runId) ?? null;
  }
}
