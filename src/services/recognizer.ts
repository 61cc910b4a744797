import type { Env } from '../config/env.js';
import { DeepgramRecognizer } from './deepgram.js';
import { KaldiRecognizer, kaldiRunScript } from './kaldi.js';
import type { RecognizedWord } from './transcript.js';
import { TranscriptDirRecognizer } from './transcriptDir.js';

export interface RecognizeContext {
  documentId: string;
  workDir: string;
  signal?: AbortSignal;
}

/** Maps an audio file to timed words (seconds), in no particular order. */
export interface Recognizer {
  readonly name: string;
  /** False when the recognizer never reads the audio (precomputed output). */
  readonly needsAudio: boolean;
  recognize(audioPath: string, ctx: RecognizeContext): Promise<RecognizedWord[]>;
}

export type RecognizerKind = Env['RECOGNIZER'];

export function createRecognizer(
  kind: RecognizerKind,
  config: Pick<Env, 'KALDI_ROOT' | 'DEEPGRAM_API_KEY' | 'DEEPGRAM_MODEL' | 'TRANSCRIPT_DIR'>
): Recognizer {
  switch (kind) {
    case 'deepgram':
      return new DeepgramRecognizer(config.DEEPGRAM_API_KEY, { model: config.DEEPGRAM_MODEL });
    case 'transcripts':
      return new TranscriptDirRecognizer(config.TRANSCRIPT_DIR);
    case 'kaldi':
      return new KaldiRecognizer(kaldiRunScript(config.KALDI_ROOT));
  }
}
