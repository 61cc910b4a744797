import type { TimeUnit } from '../types/shared.js';

export const APP_VERSION = '0.1.0';
export const APP_IDENTIFIER = 'patchwork-asr';
export const APP_IRI = `https://apps.example.org/${APP_IDENTIFIER}/v${APP_VERSION}`;

export interface AppParameter {
  name: string;
  type: 'boolean' | 'number' | 'string';
  description: string;
  default: string;
}

export interface AppMetadata {
  name: string;
  description: string;
  identifier: string;
  version: string;
  iri: string;
  license: string;
  input: Array<{ oneOf: string[] }>;
  output: Array<{ type: string; properties?: Record<string, string> }>;
  parameters: AppParameter[];
}

export function appMetadata(timeUnit: TimeUnit, silenceGapSec: number): AppMetadata {
  return {
    name: 'Patchwork ASR',
    description:
      'Runs a speech recognizer on the speech segments of an audio file spliced together with silence ' +
      'gaps, then maps recognized words back onto the original timeline, one text document per segment.',
    identifier: APP_IDENTIFIER,
    version: APP_VERSION,
    iri: APP_IRI,
    license: 'Apache 2.0',
    input: [{ oneOf: ['AudioDocument', 'VideoDocument'] }],
    output: [
      { type: 'TextDocument' },
      { type: 'TimeFrame', properties: { timeUnit } },
      { type: 'Alignment' },
      { type: 'Token' },
    ],
    parameters: [
      {
        name: 'use_speech_segmentation',
        type: 'boolean',
        description:
          'When true, looks for existing TimeFrame annotations with frameType "speech" and runs ASR only on ' +
          'those frames instead of the entire audio file.',
        default: 'true',
      },
      {
        name: 'silence_gap',
        type: 'number',
        description: 'Seconds of silence inserted between spliced speech segments.',
        default: String(silenceGapSec),
      },
      {
        name: 'pretty',
        type: 'boolean',
        description: 'Indent the JSON response.',
        default: 'false',
      },
    ],
  };
}
