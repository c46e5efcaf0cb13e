/**
 * Clip selection — repeatedly draws placements from the per-file trackers
 * until the requested total duration is covered or capacity runs out.
 *
 * Two policies:
 *   plain    — capacity-biased random draw (top half by remaining capacity,
 *              then uniform).
 *   diverse  — greedy best-of-N over every eligible source, scoring each
 *              candidate window by quality and by distance from the clips
 *              already selected.
 */
import { z } from 'zod';
import { SELECTION } from '../config.js';
import { logger } from '../utils/logger.js';
import { pickOne, type Random } from '../utils/random.js';
import { NoCapacityError, type Interval, type SourceFile } from '../allocator/source-file.js';
import {
  FeatureScorer,
  ZERO_FEATURES,
  diversityScore,
  qualityScore,
  type ClipFeatures,
} from '../scoring/features.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface Clip {
  source: SourceFile;
  start: number;
  duration: number;
  timestamp: number;
  features: ClipFeatures;
  /** Interval committed in the source; contains the clip window. */
  reservation: Interval;
}

export type SelectionStatus = 'complete' | 'partial' | 'empty';

export interface SourceProfile {
  path: string;
  features: ClipFeatures;
}

export interface SelectionResult {
  policy: 'plain' | 'diverse';
  status: SelectionStatus;
  clips: Clip[];
  requestedClips: number;
  requestedDuration: number;
  selectedDuration: number;
  /** Seconds of the requested duration that could not be placed. */
  shortfall: number;
  profiles: SourceProfile[];
}

export const SelectionOptionsSchema = z.object({
  clipLength:         z.number().positive(),
  totalDuration:      z.number().positive(),
  policy:             z.enum(['plain', 'diverse']).default('plain'),
  diversityWeight:    z.number().min(0).max(1).default(0.5),
  minSceneScore:      z.number().min(0).max(1).default(0),
  /** Extra reservation per clip, as a fraction of `clipLength`. */
  transitionHeadroom: z.number().min(0).default(0),
});

export type SelectionOptions = z.input<typeof SelectionOptionsSchema>;
type ResolvedOptions = z.output<typeof SelectionOptionsSchema>;

export interface SelectionContext {
  random: Random;
  /** Defaults to a placeholder scorer on the same random source. */
  scorer?: FeatureScorer;
}

export class SelectionError extends Error {
  constructor(message: string, public readonly result?: SelectionResult) {
    super(message);
    this.name = 'SelectionError';
  }
}

interface Placement {
  source: SourceFile;
  start: number;
}

interface Candidate extends Placement {
  features: ClipFeatures;
  score: number;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function parseOptions(options: SelectionOptions): ResolvedOptions {
  const parsed = SelectionOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new SelectionError(`Invalid selection options: ${fields}`);
  }
  return parsed.data;
}

function eligibleSources(sources: readonly SourceFile[], length: number): SourceFile[] {
  return sources.filter((s) => s.canFit(length));
}

/** Ascending by timestamp, then by start offset. */
export function compareClips(a: Clip, b: Clip): number {
  return a.timestamp - b.timestamp || a.start - b.start;
}

/**
 * Capacity-biased draw: keep the sources with the most remaining capacity,
 * then pick one of them uniformly so no single file is drained first.
 */
function drawPlain(sources: readonly SourceFile[], length: number, random: Random): Placement | null {
  const eligible = eligibleSources(sources, length);
  if (eligible.length === 0) return null;

  const ranked = eligible
    .map((source) => ({ source, available: source.availableDuration() }))
    .sort((a, b) => b.available - a.available)
    .map(({ source }) => source);
  const keep = Math.max(1, Math.floor(ranked.length * SELECTION.topSourceFraction));
  const source = pickOne(random, ranked.slice(0, keep));

  try {
    return { source, start: source.proposeStart(length, random) };
  } catch (err) {
    if (err instanceof NoCapacityError) {
      logger.warn('Selection: placement failed after capacity check', { path: source.path, length });
      return null;
    }
    throw err;
  }
}

function drawDiverse(
  sources: readonly SourceFile[],
  length: number,
  options: ResolvedOptions,
  selected: readonly ClipFeatures[],
  random: Random,
  scorer: FeatureScorer,
): Candidate | null {
  const weight = options.diversityWeight;
  let best: Candidate | null = null;

  for (const source of eligibleSources(sources, length)) {
    for (let draw = 0; draw < SELECTION.candidateDrawsPerSource; draw++) {
      let start: number;
      try {
        start = source.proposeStart(length, random);
      } catch (err) {
        if (err instanceof NoCapacityError) break;
        throw err;
      }

      const features = scorer.score(source, start, options.clipLength);
      if (features.scene < options.minSceneScore) continue;

      const score = (1 - weight) * qualityScore(features) + weight * diversityScore(features, selected);
      if (!best || score > best.score) {
        best = { source, start, features, score };
      }
    }
  }

  return best;
}

function commitClip(placement: Placement, clipLength: number, reserveLength: number, features: ClipFeatures): Clip {
  const { source, start } = placement;
  source.commit(start, reserveLength);
  return {
    source,
    start,
    duration:    clipLength,
    timestamp:   source.timestamp,
    features,
    reservation: { start, end: start + reserveLength },
  };
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Select `ceil(totalDuration / clipLength)` clips, fewer when the sources run
 * out of room. Commits every chosen window into its source.
 *
 * Never throws for lack of capacity: the result's `status` and `shortfall`
 * report how much of the request was met.
 */
export function selectClips(
  sources: readonly SourceFile[],
  options: SelectionOptions,
  context: SelectionContext,
): SelectionResult {
  const opts = parseOptions(options);
  const { random } = context;
  const scorer = context.scorer ?? new FeatureScorer(random);
  const requestedClips = Math.ceil(opts.totalDuration / opts.clipLength);
  const reserveLength = opts.clipLength * (1 + opts.transitionHeadroom);

  logger.info('Selection: starting', {
    policy:        opts.policy,
    sources:       sources.length,
    requestedClips,
    clipLength:    opts.clipLength,
    reserveLength,
    seed:          random.seed,
  });

  const profiles: SourceProfile[] = opts.policy === 'diverse'
    ? sources.map((source) => ({ path: source.path, features: scorer.profile(source, opts.clipLength) }))
    : [];
  for (const profile of profiles) {
    logger.debug('Selection: source profile', { path: profile.path, ...profile.features });
  }

  const clips: Clip[] = [];
  const selectedFeatures: ClipFeatures[] = [];

  while (clips.length < requestedClips) {
    if (opts.policy === 'diverse') {
      const best = drawDiverse(sources, reserveLength, opts, selectedFeatures, random, scorer);
      if (best) {
        clips.push(commitClip(best, opts.clipLength, reserveLength, best.features));
        selectedFeatures.push(best.features);
        continue;
      }
      const fallback = drawPlain(sources, reserveLength, random);
      if (!fallback) break;
      logger.debug('Selection: no scored candidate — using plain draw', { slot: clips.length });
      const features = scorer.score(fallback.source, fallback.start, opts.clipLength);
      clips.push(commitClip(fallback, opts.clipLength, reserveLength, features));
      selectedFeatures.push(features);
    } else {
      const placement = drawPlain(sources, reserveLength, random);
      if (!placement) break;
      clips.push(commitClip(placement, opts.clipLength, reserveLength, { ...ZERO_FEATURES }));
    }
  }

  clips.sort(compareClips);

  const selectedDuration = clips.length * opts.clipLength;
  const shortfall = Math.max(0, opts.totalDuration - selectedDuration);
  const status: SelectionStatus =
    clips.length === 0 ? 'empty' : clips.length < requestedClips ? 'partial' : 'complete';

  if (status === 'complete') {
    logger.info('Selection: complete', { clips: clips.length, selectedDuration });
  } else {
    logger.warn('Selection: not enough capacity for the requested duration', {
      status,
      clips: clips.length,
      requestedClips,
      shortfall,
    });
  }

  return {
    policy:            opts.policy,
    status,
    clips,
    requestedClips,
    requestedDuration: opts.totalDuration,
    selectedDuration,
    shortfall,
    profiles,
  };
}
