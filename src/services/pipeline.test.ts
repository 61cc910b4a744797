import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import type { AnnotationRequest, PipelineConfig } from '../types/shared.js';
import { annotateRequest, localPath, sniff, type PipelineDeps } from './pipeline.js';
import type { RecognizeContext, Recognizer } from './recognizer.js';
import { parseTranscript, type RecognizedWord } from './transcript.js';
import type { AudioTrimmer } from './trimmer.js';

const tenWords = (): RecognizedWord[] =>
  Array.from('1234567890', (word, i) => ({ word, time: i * 2, duration: 1 }));

class FakeRecognizer implements Recognizer {
  readonly name = 'fake';
  readonly calls: Array<{ audioPath: string; ctx: RecognizeContext }> = [];

  constructor(
    private readonly output: Record<string, RecognizedWord[] | Error>,
    readonly needsAudio = true
  ) {}

  async recognize(audioPath: string, ctx: RecognizeContext): Promise<RecognizedWord[]> {
    this.calls.push({ audioPath, ctx });
    const out = this.output[ctx.documentId];
    if (out instanceof Error) throw out;
    return out ?? [];
  }
}

const fakeTrimmer = (): AudioTrimmer => ({
  patchwork: vi.fn(async () => undefined),
  resample: vi.fn(async () => undefined),
});

const config: PipelineConfig = { useSegmentation: true, silenceGapSec: 1, timeUnit: 'milliseconds' };

const segmentedRequest = (): AnnotationRequest => ({
  documents: [{ id: 'd1', type: 'AudioDocument', location: '/audio/d1.wav' }],
  views: [
    {
      id: 'v_0',
      metadata: { timeUnit: 'milliseconds' },
      documents: [],
      annotations: [
        { id: 'tf1', type: 'TimeFrame', frameType: 'speech', start: 0, end: 10000, document: 'd1' },
        { id: 'tf2', type: 'TimeFrame', frameType: 'non-speech', start: 10000, end: 20000, document: 'd1' },
        { id: 'tf3', type: 'TimeFrame', frameType: 'speech', start: 20000, end: 29000, document: 'd1' },
      ],
    },
  ],
});

describe('annotateRequest', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('splices the speech segments and maps words back per segment', async () => {
    const recognizer = new FakeRecognizer({ d1: tenWords() });
    const trimmer = fakeTrimmer();
    const deps: PipelineDeps = { recognizer, trimmer, config };

    const result = await annotateRequest(segmentedRequest(), deps);

    expect(trimmer.patchwork).toHaveBeenCalledTimes(1);
    expect(trimmer.patchwork).toHaveBeenCalledWith(
      '/audio/d1.wav',
      recognizer.calls[0].audioPath,
      [
        [0, 10],
        [20, 29],
      ],
      1,
      undefined
    );
    expect(recognizer.calls[0].audioPath.endsWith('d1_16kHz.wav')).toBe(true);
    expect(trimmer.resample).not.toHaveBeenCalled();

    expect(result.outcomes.map((o) => [o.documentId, o.status])).toEqual([['d1', 'ok']]);
    expect(result.views.map((v) => v.id)).toEqual(['v_0', 'v_1']);
    const view = result.views[1];
    expect(view.documents.map((d) => d.text)).toEqual(['1 2 3 4 5', '7 8 9 0']);
    expect(view.annotations.filter((a) => a.type === 'Alignment')).toHaveLength(11);
    expect(view.annotations).toContainEqual({ id: 'a6', type: 'Alignment', source: 'v_0:tf1', target: 'td1' });
    expect(view.annotations).toContainEqual({ id: 'tf6', type: 'TimeFrame', frameType: 'speech', start: 21000, end: 22000 });
  });

  it('falls back to the whole file when segmentation is turned off', async () => {
    const recognizer = new FakeRecognizer({ d1: tenWords() });
    const trimmer = fakeTrimmer();

    const result = await annotateRequest(segmentedRequest(), {
      recognizer,
      trimmer,
      config: { ...config, useSegmentation: false },
    });

    expect(trimmer.patchwork).not.toHaveBeenCalled();
    expect(trimmer.resample).toHaveBeenCalledTimes(1);
    const view = result.views[1];
    expect(view.documents).toEqual([{ id: 'td1', type: 'TextDocument', text: '1 2 3 4 5 6 7 8 9 0' }]);
    expect(view.annotations[0]).toEqual({ id: 'a1', type: 'Alignment', source: 'd1', target: 'td1' });
  });

  it('falls back to the whole file when no segmentation exists', async () => {
    const request = segmentedRequest();
    request.views = [];
    const recognizer = new FakeRecognizer({ d1: tenWords() });
    const trimmer = fakeTrimmer();

    const result = await annotateRequest(request, { recognizer, trimmer, config });

    expect(trimmer.resample).toHaveBeenCalledTimes(1);
    expect(result.views.map((v) => v.id)).toEqual(['v_0']);
    expect(result.views[0].documents).toHaveLength(1);
  });

  it('keeps going when one document fails', async () => {
    const request: AnnotationRequest = {
      documents: [
        { id: 'd1', type: 'AudioDocument', location: '/audio/d1.wav' },
        { id: 'd2', type: 'VideoDocument', location: '/audio/d2.mp4' },
        { id: 'd3', type: 'TextDocument', text: 'not media' },
      ],
      views: [],
    };
    const recognizer = new FakeRecognizer({ d1: new Error('run.sh exited with code 1'), d2: tenWords() });

    const result = await annotateRequest(request, { recognizer, trimmer: fakeTrimmer(), config });

    expect(result.outcomes).toHaveLength(2);
    expect(result.outcomes[0]).toEqual({ documentId: 'd1', status: 'error', message: 'run.sh exited with code 1' });
    expect(result.outcomes[1].status).toBe('ok');
    expect(result.views.map((v) => v.id)).toEqual(['v_1']);
  });

  it('reports ambiguous segmentation as an error for that document', async () => {
    const request = segmentedRequest();
    request.views.push({
      id: 'v_1',
      metadata: {},
      documents: [],
      annotations: [{ id: 'tf1', type: 'TimeFrame', frameType: 'speech', start: 0, end: 5000 }],
    });
    const recognizer = new FakeRecognizer({ d1: tenWords() });

    const result = await annotateRequest(request, { recognizer, trimmer: fakeTrimmer(), config });

    expect(result.outcomes).toEqual([
      { documentId: 'd1', status: 'error', message: 'Multiple speech segmentations found for document d1: v_0, v_1' },
    ]);
    expect(recognizer.calls).toHaveLength(0);
  });

  it('reports malformed recognizer output for that document', async () => {
    const recognizer: Recognizer = {
      name: 'broken',
      needsAudio: true,
      recognize: async (_audioPath, ctx) => parseTranscript({ words: [{ word: 'x', time: 'later' }] }, ctx.documentId),
    };

    const result = await annotateRequest(segmentedRequest(), { recognizer, trimmer: fakeTrimmer(), config });

    expect(result.outcomes).toHaveLength(1);
    const [outcome] = result.outcomes;
    expect(outcome.status).toBe('error');
    expect(outcome.status === 'error' && outcome.message).toMatch(/^Malformed recognizer output/);
  });

  it('annotates its own output again without mistaking word frames for segments', async () => {
    const request: AnnotationRequest = {
      documents: [
        { id: 'd1', type: 'AudioDocument', location: '/audio/d1.wav' },
        { id: 'd2', type: 'AudioDocument', location: '/audio/d2.wav' },
      ],
      views: [],
    };
    const recognizer = new FakeRecognizer({ d1: tenWords(), d2: tenWords() });
    const first = await annotateRequest(request, { recognizer, trimmer: fakeTrimmer(), config });

    const trimmer = fakeTrimmer();
    const again = await annotateRequest(
      { documents: first.documents, views: first.views },
      { recognizer, trimmer, config }
    );

    expect(again.outcomes.map((o) => [o.documentId, o.status])).toEqual([
      ['d1', 'ok'],
      ['d2', 'ok'],
    ]);
    expect(trimmer.patchwork).not.toHaveBeenCalled();
    expect(trimmer.resample).toHaveBeenCalledTimes(2);
    expect(again.views.map((v) => v.id)).toEqual(['v_0', 'v_1', 'v_2', 'v_3']);
  });

  it('removes the work directory after a failure', async () => {
    const recognizer = new FakeRecognizer({ d1: new Error('boom') });

    await annotateRequest(segmentedRequest(), { recognizer, trimmer: fakeTrimmer(), config });

    const { workDir } = recognizer.calls[0].ctx;
    await expect(fs.access(workDir)).rejects.toThrow();
  });

  it('skips audio preparation for precomputed transcripts', async () => {
    const request: AnnotationRequest = {
      documents: [{ id: 'd1', type: 'AudioDocument' }],
      views: [],
    };
    const recognizer = new FakeRecognizer({ d1: tenWords() }, false);
    const trimmer = fakeTrimmer();

    const result = await annotateRequest(request, { recognizer, trimmer, config });

    expect(trimmer.resample).not.toHaveBeenCalled();
    expect(recognizer.calls[0].audioPath).toBe('');
    expect(result.outcomes[0].status).toBe('ok');
  });

  it('passes a timeout signal to the collaborators', async () => {
    const recognizer = new FakeRecognizer({ d1: tenWords() });

    await annotateRequest(segmentedRequest(), { recognizer, trimmer: fakeTrimmer(), config, timeoutMs: 5000 });

    const { signal } = recognizer.calls[0].ctx;
    expect(signal).toBeInstanceOf(AbortSignal);
    expect(signal?.aborted).toBe(false);
  });
});

describe('sniff', () => {
  it('needs a media document with a location', () => {
    expect(sniff({ documents: [{ id: 'd1', type: 'AudioDocument', location: '/a.wav' }], views: [] })).toBe(true);
    expect(sniff({ documents: [{ id: 'd1', type: 'AudioDocument' }], views: [] })).toBe(false);
    expect(sniff({ documents: [{ id: 'd1', type: 'TextDocument', location: '/a.txt' }], views: [] })).toBe(false);
  });
});

describe('localPath', () => {
  it('turns file URLs into paths', () => {
    expect(localPath('file:///data/audio/a.wav')).toBe('/data/audio/a.wav');
    expect(localPath('/data/audio/a.wav')).toBe('/data/audio/a.wav');
  });
});
