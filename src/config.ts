import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Selection tunables (CLI flags take precedence)
  CLIP_DURATION:        z.coerce.number().positive().default(5),
  TOTAL_DURATION:       z.coerce.number().positive().default(60),
  SELECTION_POLICY:     z.enum(['plain', 'diverse']).default('plain'),
  DIVERSITY_WEIGHT:     z.coerce.number().min(0).max(1).default(0.5),
  MIN_SCENE_SCORE:      z.coerce.number().min(0).max(1).default(0),
  MIN_GAP_SECONDS:      z.coerce.number().min(0).default(1.0),
  OPTIMIZE_TRANSITIONS: z.string().transform(v => v === 'true').default('false'),
  RANDOM_SEED:          z.coerce.number().int().optional(),

  // Input / output
  VIDEO_EXTENSIONS:     z.string().default('.mp4,.mov').transform(parseExtensions),
  OUTPUT_DIR:           z.string().default('./out'),
  FFPROBE_PATH:         z.string().min(1).default('ffprobe'),

  // Logging
  LOG_LEVEL:            z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:           z.enum(['text', 'json']).default('text'),
});

function parseExtensions(raw: string): string[] {
  return raw
    .split(',')
    .map((ext) => ext.trim().toLowerCase())
    .filter((ext) => ext.length > 0)
    .map((ext) => (ext.startsWith('.') ? ext : `.${ext}`));
}

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${missing}`);
}

export const env = parsed.data;

// ── Domain Types ─────────────────────────────────────────────────────────────

export type SelectionPolicy = 'plain' | 'diverse';

// ── Selection heuristics ──────────────────────────────────────────────────────

export const SELECTION = {
  topSourceFraction:       0.5,  // plain draw: keep the top half by remaining capacity
  candidateDrawsPerSource: 5,    // diverse draw: placements tried per source per slot
  profileSampleWindows:    5,    // windows averaged into a per-source feature profile
} as const;

// ── Feature scoring ───────────────────────────────────────────────────────────

export const FEATURES = {
  fallbackMin: 0.1,
  fallbackMax: 0.9,
} as const;

// ── Transition optimizer ──────────────────────────────────────────────────────

const MAX_SHIFT_RATIO = 0.2;

export const TRANSITION = {
  maxShiftRatio: MAX_SHIFT_RATIO,
  minCandidates: 1,
  maxCandidates: 3,
  // Extra reservation per clip (as a fraction of clip length) so that any
  // accepted shift stays inside the committed range: midpoint + max shift.
  headroom:      0.5 + MAX_SHIFT_RATIO,
} as const;

// ── Allocator ─────────────────────────────────────────────────────────────────

export const DEFAULT_MIN_GAP_SECONDS = 1.0;
