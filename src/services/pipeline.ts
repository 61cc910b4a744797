// src/services/pipeline.ts
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { fileURLToPath } from 'url';
import type {
  AnnotatedResult,
  AnnotationRequest,
  AnnotationView,
  DocumentOutcome,
  PipelineConfig,
  SourceDocument,
} from '../types/shared.js';
import { buildView } from './annotations.js';
import { APP_IRI } from './appMetadata.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { Recognizer } from './recognizer.js';
import { reattribute, reattributeUnsegmented } from './reattribute.js';
import { selectSegmentation } from './segmentation.js';
import { buildLayout, layoutIntervalsInSeconds, layoutSize, validateSegments } from './timeline.js';
import { fromSeconds } from './timeUnits.js';
import { toTokens } from './transcript.js';
import type { AudioTrimmer } from './trimmer.js';

export interface PipelineDeps {
  recognizer: Recognizer;
  trimmer: AudioTrimmer;
  config: PipelineConfig;
  timeoutMs?: number;
  appIri?: string;
  tmpRoot?: string;
}

const isMedia = (doc: SourceDocument) => doc.type === 'AudioDocument' || doc.type === 'VideoDocument';

export function localPath(location: string): string {
  return location.startsWith('file:') ? fileURLToPath(location) : location;
}

/** True when the request has something this app can transcribe. */
export function sniff(request: AnnotationRequest): boolean {
  return request.documents.some((d) => isMedia(d) && !!d.location);
}

/**
 * One document, start to finish: pick the segmentation, splice (or resample) the
 * audio, recognize, and map the words back. The work directory is removed on
 * every exit path.
 */
export async function annotateDocument(
  doc: SourceDocument,
  views: AnnotationView[],
  viewId: string,
  deps: PipelineDeps,
  signal?: AbortSignal
): Promise<AnnotationView> {
  const { config, recognizer, trimmer } = deps;
  const unit = config.timeUnit;

  const source = config.useSegmentation ? selectSegmentation(views, doc, unit) : null;
  if (source) validateSegments(source.segments);
  const layout = source ? buildLayout(source.segments, fromSeconds(config.silenceGapSec, unit)) : null;

  const workDir = await fs.mkdtemp(path.join(deps.tmpRoot ?? os.tmpdir(), 'patchwork-'));
  try {
    let audioPath = doc.location ? localPath(doc.location) : '';
    if (recognizer.needsAudio) {
      if (!audioPath) {
        throw new ConfigurationError(`Document ${doc.id} has no location`);
      }
      const prepared = path.join(workDir, `${doc.id}_16kHz.wav`);
      if (layout) {
        console.log(`[pipeline] ${doc.id}: splicing ${layoutSize(layout)} segments`);
        await trimmer.patchwork(audioPath, prepared, layoutIntervalsInSeconds(layout, unit), config.silenceGapSec, signal);
      } else {
        await trimmer.resample(audioPath, prepared, signal);
      }
      audioPath = prepared;
    }

    const words = await recognizer.recognize(audioPath, { documentId: doc.id, workDir, signal });
    const tokens = toTokens(words, unit);
    const result =
      layout ? reattribute(tokens, layout) : reattributeUnsegmented(tokens, doc.id);

    console.log(
      `[pipeline] ${doc.id}: ${result.tokens.length}/${tokens.length} tokens kept, ` +
        `${result.textUnits.length} text documents`
    );

    return buildView({
      viewId,
      appIri: deps.appIri ?? APP_IRI,
      audioDocumentId: doc.id,
      timeUnit: unit,
      result,
    });
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }
}

/**
 * Every media document of the request, in parallel. A failing document becomes an
 * error outcome; the others still complete.
 */
export async function annotateRequest(request: AnnotationRequest, deps: PipelineDeps): Promise<AnnotatedResult> {
  const targets = request.documents.filter(
    (d) => isMedia(d) && (!!d.location || !deps.recognizer.needsAudio)
  );
  const firstView = request.views.length;

  const settled = await Promise.allSettled(
    targets.map((doc, i) => {
      const signal = deps.timeoutMs ? AbortSignal.timeout(deps.timeoutMs) : undefined;
      return annotateDocument(doc, request.views, `v_${firstView + i}`, deps, signal);
    })
  );

  const outcomes: DocumentOutcome[] = settled.map((s, i) => {
    const documentId = targets[i].id;
    if (s.status === 'fulfilled') {
      return { documentId, status: 'ok', view: s.value };
    }
    console.error(`[pipeline] ${documentId} failed:`, s.reason);
    return { documentId, status: 'error', message: errorMessage(s.reason) };
  });

  const newViews = outcomes.flatMap((o) => (o.status === 'ok' ? [o.view] : []));
  return {
    documents: request.documents,
    views: [...request.views, ...newViews],
    outcomes,
  };
}
