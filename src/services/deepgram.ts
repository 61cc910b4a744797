// src/services/deepgram.ts
import { createClient } from '@deepgram/sdk';
import * as fs from 'fs/promises';
import { z } from 'zod';
import { RecognizerOutputError, ExternalProcessError } from './errors.js';
import type { RecognizeContext, Recognizer } from './recognizer.js';
import type { RecognizedWord } from './transcript.js';

const dgWordsSchema = z.object({
  results: z.object({
    channels: z
      .array(
        z.object({
          alternatives: z
            .array(
              z.object({
                words: z.array(
                  z.object({
                    word: z.string(),
                    punctuated_word: z.string().optional(),
                    start: z.number(),
                    end: z.number(),
                  })
                ),
              })
            )
            .min(1),
        })
      )
      .min(1),
  }),
});

/** Deepgram prerecorded words of the first channel's best alternative. */
export function wordsFromDeepgram(result: unknown, documentId: string): RecognizedWord[] {
  const parsed = dgWordsSchema.safeParse(result);
  if (!parsed.success) {
    throw new RecognizerOutputError(`Deepgram returned no word timings for ${documentId}`, documentId);
  }
  return parsed.data.results.channels[0].alternatives[0].words.map((w) => ({
    word: w.punctuated_word ?? w.word,
    time: w.start,
    duration: Math.max(0, w.end - w.start),
  }));
}

export class DeepgramRecognizer implements Recognizer {
  readonly name = 'deepgram';
  readonly needsAudio = true;
  private readonly dg: ReturnType<typeof createClient>;

  constructor(apiKey: string, private readonly options: { model: string; language?: string }) {
    if (!apiKey) {
      throw new Error('DEEPGRAM_API_KEY is not set.');
    }
    this.dg = createClient(apiKey);
  }

  async recognize(audioPath: string, ctx: RecognizeContext): Promise<RecognizedWord[]> {
    ctx.signal?.throwIfAborted();
    const buffer = await fs.readFile(audioPath);
    const { result, error } = await this.dg.listen.prerecorded.transcribeFile(buffer, {
      model: this.options.model,
      language: this.options.language ?? 'en',
      smart_format: false,
      punctuate: false,
    });

    if (error) {
      throw new ExternalProcessError(`Deepgram transcription failed: ${error.message}`, 'deepgram');
    }
    return wordsFromDeepgram(result, ctx.documentId);
  }
}
