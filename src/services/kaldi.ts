// src/services/kaldi.ts
import { execFile } from 'child_process';
import { promises as fs } from 'fs';
import path from 'path';
import { promisify } from 'util';
import { RecognizerOutputError, errorMessage, processFailure } from './errors.js';
import type { RecognizeContext, Recognizer } from './recognizer.js';
import { parseTranscriptJson, type RecognizedWord } from './transcript.js';

const execFileAsync = promisify(execFile);

export function kaldiRunScript(kaldiRoot: string | undefined): string {
  if (!kaldiRoot) return '/opt/kaldi/run.sh';
  return path.join(kaldiRoot, 'egs', 'american-archive-kaldi', 'sample_experiment', 'run.sh');
}

/**
 * Runs the Kaldi pipeline script directly: `run.sh <wav> <out.json>`.
 * The script writes `{ words: [{ word, time, duration }] }`.
 */
export class KaldiRecognizer implements Recognizer {
  readonly name = 'kaldi';
  readonly needsAudio = true;

  constructor(private readonly script: string) {}

  async recognize(audioPath: string, ctx: RecognizeContext): Promise<RecognizedWord[]> {
    const outPath = path.join(ctx.workDir, `${ctx.documentId}.json`);
    console.log(`[kaldi] ${ctx.documentId}: ${this.script} ${audioPath}`);
    try {
      await execFileAsync(this.script, [audioPath, outPath], {
        signal: ctx.signal,
        maxBuffer: 64 * 1024 * 1024,
      });
    } catch (err) {
      throw processFailure(err, `Kaldi failed for ${ctx.documentId}`, this.script);
    }
    let text: string;
    try {
      text = await fs.readFile(outPath, 'utf8');
    } catch (err) {
      throw new RecognizerOutputError(`Kaldi wrote no transcript for ${ctx.documentId}: ${errorMessage(err)}`, ctx.documentId);
    }
    return parseTranscriptJson(text, ctx.documentId);
  }
}
