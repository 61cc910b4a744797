// src/services/trimmer.ts
import { execFile } from 'child_process';
import { promisify } from 'util';
import { env } from '../config/env.js';
import { processFailure } from './errors.js';

const execFileAsync = promisify(execFile);

// The recognizer expects single-channel 16 kHz wav.
export const SAMPLE_RATE = 16000;

const fmt = (sec: number) => Number(sec.toFixed(3)).toString();

/**
 * ffmpeg arguments that splice `intervals` (seconds, original timeline) into one
 * file with `gapSec` of silence between consecutive intervals. The result's
 * timeline matches buildLayout() for the same intervals and gap.
 */
export function buildPatchworkCommand(
  input: string,
  output: string,
  intervals: Array<[number, number]>,
  gapSec: number
): string[] {
  const filters: string[] = [];
  const labels: string[] = [];
  intervals.forEach(([start, end], i) => {
    filters.push(
      `[0:a]atrim=start=${fmt(start)}:end=${fmt(end)},asetpts=PTS-STARTPTS,` +
        `aformat=sample_rates=${SAMPLE_RATE}:channel_layouts=mono[s${i}]`
    );
    labels.push(`[s${i}]`);
    if (i < intervals.length - 1 && gapSec > 0) {
      filters.push(`anullsrc=r=${SAMPLE_RATE}:cl=mono,atrim=duration=${fmt(gapSec)}[g${i}]`);
      labels.push(`[g${i}]`);
    }
  });
  filters.push(`${labels.join('')}concat=n=${labels.length}:v=0:a=1[out]`);

  return [
    '-y',
    '-i', input,
    '-filter_complex', filters.join(';'),
    '-map', '[out]',
    '-ac', '1',
    '-ar', String(SAMPLE_RATE),
    output,
  ];
}

export function buildResampleCommand(input: string, output: string): string[] {
  return ['-y', '-i', input, '-ac', '1', '-ar', String(SAMPLE_RATE), output];
}

export interface RunOptions {
  signal?: AbortSignal;
  dryRun?: boolean;
  binary?: string;
}

export async function runFfmpeg(args: string[], options: RunOptions = {}): Promise<string[]> {
  const binary = options.binary ?? env.FFMPEG_PATH;
  if (options.dryRun) {
    console.log(`[trimmer] dry run: ${binary} ${args.join(' ')}`);
    return args;
  }
  try {
    await execFileAsync(binary, args, { signal: options.signal, maxBuffer: 16 * 1024 * 1024 });
    return args;
  } catch (err) {
    throw processFailure(err, 'ffmpeg failed', binary);
  }
}

export interface AudioTrimmer {
  patchwork(input: string, output: string, intervals: Array<[number, number]>, gapSec: number, signal?: AbortSignal): Promise<void>;
  resample(input: string, output: string, signal?: AbortSignal): Promise<void>;
}

export const ffmpegTrimmer: AudioTrimmer = {
  async patchwork(input, output, intervals, gapSec, signal) {
    await runFfmpeg(buildPatchworkCommand(input, output, intervals, gapSec), { signal });
  },
  async resample(input, output, signal) {
    await runFfmpeg(buildResampleCommand(input, output), { signal });
  },
};
