// src/services/annotations.ts
import type {
  Annotation,
  AnnotationView,
  ReattributionResult,
  SourceDocument,
  TimeUnit,
} from '../types/shared.js';
import { SPEECH_FRAME_TYPE } from './segmentation.js';

export interface BuildViewParams {
  viewId: string;
  appIri: string;
  audioDocumentId: string;
  timeUnit: TimeUnit;
  result: ReattributionResult;
  timestamp?: string;
}

/**
 * Turn a reattribution result into a view: one TextDocument per text unit, then
 * for each token its Token, TimeFrame and frame->token Alignment, with the
 * text-unit alignments placed where the walk emitted them.
 */
export function buildView(params: BuildViewParams): AnnotationView {
  const { viewId, result } = params;

  const documents: SourceDocument[] = result.textUnits.map((u) => ({
    id: u.id,
    type: 'TextDocument',
    text: u.text,
  }));

  const tokenById = new Map(result.tokens.map((t) => [t.id, t]));
  const frameTargets = new Map(result.tokens.map((t) => [t.frameId, t.id]));

  const annotations: Annotation[] = [];
  for (const link of result.links) {
    const tokenId = frameTargets.get(link.source);
    const token = tokenId === link.target ? tokenById.get(link.target) : undefined;
    if (token) {
      annotations.push(
        {
          id: token.id,
          type: 'Token',
          word: token.word,
          start: token.charStart,
          end: token.charEnd,
          document: `${viewId}:${token.textUnitId}`,
        },
        {
          id: token.frameId,
          type: 'TimeFrame',
          frameType: SPEECH_FRAME_TYPE,
          start: token.start,
          end: token.end,
        }
      );
    }
    annotations.push({ id: link.id, type: 'Alignment', source: link.source, target: link.target });
  }

  return {
    id: viewId,
    metadata: {
      app: params.appIri,
      timestamp: params.timestamp ?? new Date().toISOString(),
      timeUnit: params.timeUnit,
      contains: {
        TextDocument: {},
        Token: {},
        TimeFrame: { timeUnit: params.timeUnit, document: params.audioDocumentId },
        Alignment: {},
      },
    },
    documents,
    annotations,
  };
}
