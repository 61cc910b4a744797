import { promises as fs } from 'fs';
import path from 'path';
import { RecognizerOutputError } from './errors.js';
import type { RecognizeContext, Recognizer } from './recognizer.js';
import { parseTranscriptJson, type RecognizedWord } from './transcript.js';

/**
 * Re-annotation without running a recognizer: reads `<dir>/<documentId>.json`
 * left behind by an earlier run.
 */
export class TranscriptDirRecognizer implements Recognizer {
  readonly name = 'transcripts';
  readonly needsAudio = false;

  constructor(private readonly dir: string) {}

  async recognize(_audioPath: string, ctx: RecognizeContext): Promise<RecognizedWord[]> {
    const file = path.join(this.dir, `${ctx.documentId}.json`);
    let text: string;
    try {
      text = await fs.readFile(file, 'utf8');
    } catch (err) {
      throw new RecognizerOutputError(
        `No transcript for ${ctx.documentId} in ${this.dir}: ${err instanceof Error ? err.message : String(err)}`,
        ctx.documentId
      );
    }
    return parseTranscriptJson(text, ctx.documentId);
  }
}
