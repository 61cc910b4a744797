import { z } from 'zod';
import type { TimeUnit, Token } from '../types/shared.js';
import { RecognizerOutputError } from './errors.js';
import { fromSeconds } from './timeUnits.js';

// Kaldi writes durations as strings ("1.0"), times as numbers.
const seconds = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

export const wordSchema = z.object({
  word: z.string(),
  time: seconds,
  duration: seconds.pipe(z.number().nonnegative()),
});

export const transcriptSchema = z.object({
  words: z.array(wordSchema),
});

export type RecognizedWord = z.infer<typeof wordSchema>;

export function parseTranscript(raw: unknown, documentId?: string): RecognizedWord[] {
  const parsed = transcriptSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid shape';
    throw new RecognizerOutputError(`Malformed recognizer output (${where})`, documentId);
  }
  return parsed.data.words;
}

export function parseTranscriptJson(text: string, documentId?: string): RecognizedWord[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new RecognizerOutputError(
      `Recognizer output is not JSON: ${err instanceof Error ? err.message : String(err)}`,
      documentId
    );
  }
  return parseTranscript(raw, documentId);
}

/** Words timed in seconds -> tokens in the pipeline's unit. */
export function toTokens(words: RecognizedWord[], unit: TimeUnit): Token[] {
  return words.map((w) => ({
    word: w.word,
    time: fromSeconds(w.time, unit),
    duration: fromSeconds(w.duration, unit),
  }));
}
