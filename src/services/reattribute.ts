// src/services/reattribute.ts
import type {
  AlignmentLink,
  IdPrefixes,
  PatchworkLayout,
  ReattributedToken,
  ReattributionResult,
  TextUnit,
  Token,
} from '../types/shared.js';
import { locate } from './locateSegment.js';
import { toOriginalTime } from './timeline.js';

export const DEFAULT_ID_PREFIXES: IdPrefixes = {
  textDocument: 'td',
  token: 't',
  timeFrame: 'tf',
  alignment: 'a',
};

const WORD_SEPARATOR = ' ';

export interface ReattributeOptions {
  prefixes?: IdPrefixes;
}

type OpenUnit = {
  id: string;
  segmentIndex: number;
  text: string;
  count: number;
};

// Accumulator of the walk. Its arrays are owned by a single reattribute() call and
// only ever appended to; the open unit is replaced, never edited.
type WalkState = {
  open: OpenUnit | null;
  textUnits: TextUnit[];
  tokens: ReattributedToken[];
  links: AlignmentLink[];
};

export const sortTokens = (tokens: Token[]) => [...tokens].sort((a, b) => a.time - b.time);

const nextId = (prefix: string, count: number) => `${prefix}${count + 1}`;

function link(state: WalkState, prefixes: IdPrefixes, source: string, target: string): void {
  state.links.push({ id: nextId(prefixes.alignment, state.links.length), source, target });
}

function openUnit(id: string, segmentIndex: number): OpenUnit {
  return { id, segmentIndex, text: '', count: 0 };
}

// Offsets of `word` if it were appended to `unit`.
function charSpan(unit: OpenUnit, word: string): [number, number] {
  const start = unit.count === 0 ? 0 : unit.text.length + WORD_SEPARATOR.length;
  return [start, start + word.length];
}

function appendWord(unit: OpenUnit, word: string): OpenUnit {
  const text = unit.count === 0 ? word : unit.text + WORD_SEPARATOR + word;
  return { ...unit, text, count: unit.count + 1 };
}

function closeUnit(state: WalkState, layout: PatchworkLayout, prefixes: IdPrefixes): WalkState {
  const { open } = state;
  if (!open || open.count === 0) return state;
  const segmentId = layout.segmentIds[open.segmentIndex];
  const unit: TextUnit = { id: open.id, segmentId, text: open.text };
  state.textUnits.push(unit);
  link(state, prefixes, segmentId, unit.id);
  return { ...state, open: null };
}

/**
 * Walk the recognizer's tokens in patchwork-time order and attribute each one to
 * the original segment it was spoken in. Produces one text unit per segment that
 * received at least one token, tokens with original-timeline times and offsets
 * local to their text unit, and the frame->token / segment->text alignments.
 *
 * Tokens in a silence gap, or straddling a segment end, are dropped.
 */
export function reattribute(
  tokens: Token[],
  layout: PatchworkLayout,
  options: ReattributeOptions = {}
): ReattributionResult {
  const prefixes = options.prefixes ?? DEFAULT_ID_PREFIXES;
  const initial: WalkState = { open: null, textUnits: [], tokens: [], links: [] };

  const walked = sortTokens(tokens).reduce<WalkState>((state, token) => {
    const { index, inGap } = locate(layout, token.time, token.duration);
    if (inGap) return state;

    const next = state.open && index > state.open.segmentIndex ? closeUnit(state, layout, prefixes) : state;
    const unit = next.open ?? openUnit(nextId(prefixes.textDocument, next.textUnits.length), index);

    const [charStart, charEnd] = charSpan(unit, token.word);
    const start = toOriginalTime(layout, index, token.time);
    const reattributed: ReattributedToken = {
      id: nextId(prefixes.token, next.tokens.length),
      frameId: nextId(prefixes.timeFrame, next.tokens.length),
      word: token.word,
      start,
      end: start + token.duration,
      charStart,
      charEnd,
      segmentId: layout.segmentIds[index],
      textUnitId: unit.id,
    };
    next.tokens.push(reattributed);
    link(next, prefixes, reattributed.frameId, reattributed.id);

    return { ...next, open: appendWord(unit, token.word) };
  }, initial);

  const { textUnits, tokens: out, links } = closeUnit(walked, layout, prefixes);
  return { tokens: out, textUnits, links };
}

/**
 * No segmentation: the whole audio is one segment and patchwork time is original
 * time. Every token is kept; the source->text alignment comes first.
 */
export function reattributeUnsegmented(
  tokens: Token[],
  sourceId: string,
  options: ReattributeOptions = {}
): ReattributionResult {
  const prefixes = options.prefixes ?? DEFAULT_ID_PREFIXES;
  const unitId = nextId(prefixes.textDocument, 0);
  const sorted = sortTokens(tokens);

  const links: AlignmentLink[] = [{ id: nextId(prefixes.alignment, 0), source: sourceId, target: unitId }];
  const out: ReattributedToken[] = [];
  let position = 0;

  sorted.forEach((token, i) => {
    const charStart = position;
    const charEnd = charStart + token.word.length;
    position = charEnd + WORD_SEPARATOR.length;
    const reattributed: ReattributedToken = {
      id: nextId(prefixes.token, i),
      frameId: nextId(prefixes.timeFrame, i),
      word: token.word,
      start: token.time,
      end: token.time + token.duration,
      charStart,
      charEnd,
      segmentId: sourceId,
      textUnitId: unitId,
    };
    out.push(reattributed);
    links.push({ id: nextId(prefixes.alignment, links.length), source: reattributed.frameId, target: reattributed.id });
  });

  const textUnits: TextUnit[] = [
    { id: unitId, segmentId: sourceId, text: sorted.map((t) => t.word).join(WORD_SEPARATOR) },
  ];
  return { tokens: out, textUnits, links };
}
