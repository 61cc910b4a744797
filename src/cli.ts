#!/usr/bin/env node
import 'dotenv/config';
import { promises as fs } from 'fs';
import { parseArgs } from 'util';
import { env } from './config/env.js';
import { defaultConfig, startServer } from './index.js';
import { annotateRequest } from './services/pipeline.js';
import { createRecognizer } from './services/recognizer.js';
import { parseAnnotationRequest } from './services/request.js';
import { ffmpegTrimmer } from './services/trimmer.js';

const USAGE = `Usage: patchwork-asr [--once PATH] [options]

  --once PATH          annotate the request in PATH instead of starting the HTTP server
  --no-recognizer      reuse transcripts from --transcripts DIR instead of running the recognizer
  --transcripts DIR    directory of <documentId>.json transcripts (default: ${env.TRANSCRIPT_DIR})
  --no-segmentation    ignore existing speech segmentation
  --pretty             indent the JSON output
  --out FILE           output file (default: annotated.json)
  -h, --help           show this message`;

export async function runOnce(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      once: { type: 'string' },
      'no-recognizer': { type: 'boolean', default: false },
      transcripts: { type: 'string' },
      'no-segmentation': { type: 'boolean', default: false },
      pretty: { type: 'boolean', default: false },
      out: { type: 'string', default: 'annotated.json' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }
  if (!values.once) {
    await startServer();
    return;
  }

  const request = parseAnnotationRequest(JSON.parse(await fs.readFile(values.once, 'utf8')));
  const recognizer = values['no-recognizer']
    ? createRecognizer('transcripts', { ...env, TRANSCRIPT_DIR: values.transcripts ?? env.TRANSCRIPT_DIR })
    : createRecognizer(env.RECOGNIZER, env);
  const config = { ...defaultConfig(), useSegmentation: !values['no-segmentation'] && env.USE_SEGMENTATION };

  const result = await annotateRequest(request, {
    recognizer,
    trimmer: ffmpegTrimmer,
    config,
    timeoutMs: env.PIPELINE_TIMEOUT_MS,
  });
  await fs.writeFile(values.out, JSON.stringify(result, null, values.pretty ? 2 : undefined));

  const failed = result.outcomes.filter((o) => o.status === 'error');
  console.log(`Wrote ${values.out}: ${result.outcomes.length - failed.length} annotated, ${failed.length} failed`);
  if (failed.length) process.exitCode = 1;
}

runOnce(process.argv.slice(2)).catch((err) => {
  console.error(err);
  process.exit(1);
});
