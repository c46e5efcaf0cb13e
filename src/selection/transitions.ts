/**
 * Transition optimizer — nudges each clip's start onto a nearby cut point.
 *
 * Cut-point detection is a placeholder: 1–3 offsets drawn uniformly inside the
 * clip. The candidate nearest the clip midpoint wins, and the shift is kept
 * only when it is within `maxShiftRatio × duration` of the midpoint (inclusive)
 * and the shifted window still lies inside the clip's reservation. The
 * optimizer never touches the sources' committed ranges.
 */
import { TRANSITION } from '../config.js';
import { logger } from '../utils/logger.js';
import { randomInt, uniform, type Random } from '../utils/random.js';
import type { Clip } from './engine.js';

/** Offsets (seconds from clip start) that look like good cut points. */
export type CutPointDetector = (clip: Clip) => number[];

export interface TransitionOptions {
  maxShiftRatio?: number;
  detectCutPoints?: CutPointDetector;
}

const EPS = 1e-9;

export function randomCutPoints(random: Random): CutPointDetector {
  return (clip) => {
    const count = randomInt(random, TRANSITION.minCandidates, TRANSITION.maxCandidates);
    return Array.from({ length: count }, () => uniform(random, 0, clip.duration));
  };
}

function closestTo(target: number, values: readonly number[]): number | undefined {
  let best: number | undefined;
  for (const v of values) {
    if (best === undefined || Math.abs(v - target) < Math.abs(best - target)) best = v;
  }
  return best;
}

export function optimizeTransitions(clips: readonly Clip[], random: Random, options: TransitionOptions = {}): Clip[] {
  const maxShiftRatio = options.maxShiftRatio ?? TRANSITION.maxShiftRatio;
  const detect = options.detectCutPoints ?? randomCutPoints(random);
  let shifted = 0;

  const result = clips.map((clip) => {
    const midpoint = clip.duration / 2;
    const offset = closestTo(midpoint, detect(clip).filter((o) => o >= 0 && o < clip.duration));
    if (offset === undefined) return clip;

    if (Math.abs(offset - midpoint) > maxShiftRatio * clip.duration) return clip;

    const start = clip.start + offset;
    if (start + clip.duration > clip.reservation.end + EPS) {
      logger.debug('Transitions: shift would leave the reservation — skipped', {
        path: clip.source.path,
        start: clip.start,
        offset,
      });
      return clip;
    }

    shifted++;
    return { ...clip, start };
  });

  logger.info('Transitions: optimized cut points', { clips: clips.length, shifted });
  return result;
}
