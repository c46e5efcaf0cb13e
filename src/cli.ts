/**
 * Command-line parsing for `montage-picker select <input-dir> [options]`.
 * Flags override the matching environment variables (see .env.example).
 */
import { parseArgs } from 'node:util';
import { env, type SelectionPolicy } from './config.js';
import type { RunParams } from './pipeline/index.js';

export const USAGE = `Usage: montage-picker select <input-dir> [options]

Options:
  --clip-duration <s>      length of each clip in seconds         (CLIP_DURATION)
  --total-duration <s>     target length of the sequence          (TOTAL_DURATION)
  --policy <plain|diverse> selection policy                       (SELECTION_POLICY)
  --diversity-weight <w>   0..1, diverse policy only              (DIVERSITY_WEIGHT)
  --min-scene-score <s>    0..1, diverse policy only              (MIN_SCENE_SCORE)
  --min-gap <s>            seconds between clips from one file    (MIN_GAP_SECONDS)
  --transitions            nudge cuts onto nearby scene points    (OPTIMIZE_TRANSITIONS)
  --seed <n>               integer seed for a reproducible run    (RANDOM_SEED)
  --out <dir>              output directory                       (OUTPUT_DIR)
  -h, --help               show this help
`;

export type CommandLine =
  | { kind: 'help'; ok: boolean }
  | { kind: 'select'; params: RunParams };

function numberFlag(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new Error(`--${name} must be a number, got "${raw}"`);
  }
  return value;
}

function nonNegativeFlag(name: string, raw: string | undefined, fallback: number): number {
  const value = numberFlag(name, raw, fallback);
  if (value < 0) {
    throw new Error(`--${name} must not be negative, got "${raw}"`);
  }
  return value;
}

function seedFlag(raw: string | undefined): number | undefined {
  if (raw === undefined) return env.RANDOM_SEED;
  const value = numberFlag('seed', raw, 0);
  if (!Number.isInteger(value)) {
    throw new Error(`--seed must be an integer, got "${raw}"`);
  }
  return value;
}

function policyFlag(raw: string | undefined): SelectionPolicy {
  if (raw === undefined) return env.SELECTION_POLICY;
  if (raw === 'plain' || raw === 'diverse') return raw;
  throw new Error(`--policy must be "plain" or "diverse", got "${raw}"`);
}

export function parseCommandLine(args: string[]): CommandLine {
  const { values, positionals } = parseArgs({
    args,
    allowPositionals: true,
    options: {
      'clip-duration':    { type: 'string' },
      'total-duration':   { type: 'string' },
      'policy':           { type: 'string' },
      'diversity-weight': { type: 'string' },
      'min-scene-score':  { type: 'string' },
      'min-gap':          { type: 'string' },
      'transitions':      { type: 'boolean' },
      'seed':             { type: 'string' },
      'out':              { type: 'string' },
      'help':             { type: 'boolean', short: 'h' },
    },
  });

  const [command, inputDir] = positionals;
  if (values.help) return { kind: 'help', ok: true };
  if (command !== 'select' || !inputDir) return { kind: 'help', ok: false };

  return {
    kind: 'select',
    params: {
      inputDir,
      outputDir:           values.out ?? env.OUTPUT_DIR,
      extensions:          env.VIDEO_EXTENSIONS,
      clipLength:          numberFlag('clip-duration', values['clip-duration'], env.CLIP_DURATION),
      totalDuration:       numberFlag('total-duration', values['total-duration'], env.TOTAL_DURATION),
      policy:              policyFlag(values.policy),
      diversityWeight:     numberFlag('diversity-weight', values['diversity-weight'], env.DIVERSITY_WEIGHT),
      minSceneScore:       numberFlag('min-scene-score', values['min-scene-score'], env.MIN_SCENE_SCORE),
      minGap:              nonNegativeFlag('min-gap', values['min-gap'], env.MIN_GAP_SECONDS),
      optimizeTransitions: values.transitions ?? env.OPTIMIZE_TRANSITIONS,
      seed:                seedFlag(values.seed),
    },
  };
}
