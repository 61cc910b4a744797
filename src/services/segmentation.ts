import type {
  AnnotationView,
  Segment,
  SourceDocument,
  TimeFrameAnnotation,
  TimeUnit,
} from '../types/shared.js';
import { ConfigurationError } from './errors.js';
import { convertTime } from './timeUnits.js';

export const SPEECH_FRAME_TYPE = 'speech';

export const longId = (viewId: string, annotationId: string) =>
  annotationId.includes(':') ? annotationId : `${viewId}:${annotationId}`;

const TIME_FRAME = 'TimeFrame';

// A frame without its own `document` points where its view's `contains` entry does.
function targetsDocument(frame: TimeFrameAnnotation, view: AnnotationView, documentId: string): boolean {
  const target = frame.document ?? view.metadata.contains?.[TIME_FRAME]?.document;
  if (!target) return true;
  return target === documentId || target === longId(view.id, documentId);
}

// Views holding tokens are transcripts; their word frames are not a segmentation.
const isTranscriptView = (view: AnnotationView) => view.metadata.contains?.Token !== undefined;

function viewTimeUnit(view: AnnotationView): TimeUnit {
  const declared = view.metadata.contains?.[TIME_FRAME]?.timeUnit ?? view.metadata.timeUnit;
  return declared === 'seconds' ? 'seconds' : 'milliseconds';
}

export function speechFrames(view: AnnotationView, documentId: string): TimeFrameAnnotation[] {
  if (isTranscriptView(view)) return [];
  return view.annotations.filter(
    (a): a is TimeFrameAnnotation =>
      a.type === 'TimeFrame' && a.frameType === SPEECH_FRAME_TYPE && targetsDocument(a, view, documentId)
  );
}

export interface SegmentationSource {
  viewId: string;
  segments: Segment[];
}

/**
 * Pick the view that segments `doc` into speech. Returns null when there is none;
 * more than one candidate is ambiguous and rejected.
 */
export function selectSegmentation(
  views: AnnotationView[],
  doc: SourceDocument,
  unit: TimeUnit
): SegmentationSource | null {
  const candidates = views
    .map((view) => ({ view, frames: speechFrames(view, doc.id) }))
    .filter((c) => c.frames.length > 0);

  if (candidates.length === 0) return null;
  if (candidates.length > 1) {
    const ids = candidates.map((c) => c.view.id).join(', ');
    throw new ConfigurationError(`Multiple speech segmentations found for document ${doc.id}: ${ids}`);
  }

  const { view, frames } = candidates[0];
  const from = viewTimeUnit(view);
  return {
    viewId: view.id,
    segments: frames.map((f) => ({
      id: longId(view.id, f.id),
      start: convertTime(f.start, from, unit),
      end: convertTime(f.end, from, unit),
    })),
  };
}
