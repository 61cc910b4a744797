export type TimeUnit = 'milliseconds' | 'seconds';

export interface Segment {
  id: string;
  start: number;
  end: number;
}

// Parallel arrays, one entry per segment, sorted by patchwork start.
export interface PatchworkLayout {
  segmentIds: string[];
  originalStarts: number[];
  originalEnds: number[];
  patchworkStarts: number[];
  patchworkEnds: number[];
}

export interface Token {
  word: string;
  time: number;
  duration: number;
}

export interface ReattributedToken {
  id: string;
  frameId: string;
  word: string;
  start: number; // original timeline
  end: number;
  charStart: number;
  charEnd: number;
  segmentId: string;
  textUnitId: string;
}

export interface TextUnit {
  id: string;
  segmentId: string;
  text: string;
}

export interface AlignmentLink {
  id: string;
  source: string;
  target: string;
}

export interface ReattributionResult {
  tokens: ReattributedToken[];
  textUnits: TextUnit[];
  links: AlignmentLink[];
}

export interface IdPrefixes {
  textDocument: string;
  token: string;
  timeFrame: string;
  alignment: string;
}

export interface PipelineConfig {
  useSegmentation: boolean;
  silenceGapSec: number;
  timeUnit: TimeUnit;
}

/* ---------- request / view shapes ---------- */

export type DocumentType = 'AudioDocument' | 'VideoDocument' | 'TextDocument';

export interface SourceDocument {
  id: string;
  type: DocumentType;
  location?: string;
  text?: string;
}

export interface TimeFrameAnnotation {
  id: string;
  type: 'TimeFrame';
  frameType?: string;
  start: number;
  end: number;
  document?: string;
}

export interface TokenAnnotation {
  id: string;
  type: 'Token';
  word: string;
  start: number;
  end: number;
  document: string;
}

export interface AlignmentAnnotation {
  id: string;
  type: 'Alignment';
  source: string;
  target: string;
}

export type Annotation = TimeFrameAnnotation | TokenAnnotation | AlignmentAnnotation;

export interface ViewMetadata {
  app?: string;
  timestamp?: string;
  timeUnit?: TimeUnit;
  contains?: Record<string, Record<string, string>>;
}

export interface AnnotationView {
  id: string;
  metadata: ViewMetadata;
  documents: SourceDocument[];
  annotations: Annotation[];
}

export interface AnnotationRequest {
  documents: SourceDocument[];
  views: AnnotationView[];
}

export type DocumentOutcome =
  | { documentId: string; status: 'ok'; view: AnnotationView }
  | { documentId: string; status: 'error'; message: string };

export interface AnnotatedResult extends AnnotationRequest {
  outcomes: DocumentOutcome[];
}
