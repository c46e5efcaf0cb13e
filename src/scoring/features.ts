/**
 * Window feature scoring — scene-change likelihood, motion and colour variety,
 * each in [0, 1].
 *
 * Real content analysis is pluggable through `WindowAnalyzer`. Without one (or
 * whenever it fails) each feature is drawn uniformly from the fallback range,
 * so scoring never aborts a selection run.
 */
import { FEATURES, SELECTION } from '../config.js';
import { logger } from '../utils/logger.js';
import { uniform, type Random } from '../utils/random.js';
import type { SourceFile } from '../allocator/source-file.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface ClipFeatures {
  scene: number;
  motion: number;
  color: number;
}

export type WindowAnalyzer = (source: SourceFile, start: number, duration: number) => ClipFeatures;

export const ZERO_FEATURES: Readonly<ClipFeatures> = { scene: 0, motion: 0, color: 0 };

// ── Vector helpers ────────────────────────────────────────────────────────────

export function featureValues(f: ClipFeatures): [number, number, number] {
  return [f.scene, f.motion, f.color];
}

export function meanFeatures(list: readonly ClipFeatures[]): ClipFeatures {
  if (list.length === 0) return { ...ZERO_FEATURES };
  const sum = list.reduce(
    (acc, f) => ({ scene: acc.scene + f.scene, motion: acc.motion + f.motion, color: acc.color + f.color }),
    { ...ZERO_FEATURES },
  );
  return {
    scene:  sum.scene / list.length,
    motion: sum.motion / list.length,
    color:  sum.color / list.length,
  };
}

/** Mean of a window's own three feature values. */
export function qualityScore(f: ClipFeatures): number {
  const values = featureValues(f);
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Mean absolute difference from the running mean of already-selected clips. */
export function diversityScore(candidate: ClipFeatures, selected: readonly ClipFeatures[]): number {
  if (selected.length === 0) return 0;
  const mean = featureValues(meanFeatures(selected));
  const values = featureValues(candidate);
  return values.reduce((sum, v, i) => sum + Math.abs(v - mean[i]), 0) / values.length;
}

function clamp01(n: number): number {
  return Math.max(0, Math.min(1, n));
}

// ── Scorer ────────────────────────────────────────────────────────────────────

export class FeatureScorer {
  constructor(
    private readonly random: Random,
    private readonly analyzer?: WindowAnalyzer,
  ) {}

  score(source: SourceFile, start: number, duration: number): ClipFeatures {
    if (this.analyzer) {
      try {
        const raw = this.analyzer(source, start, duration);
        if (featureValues(raw).every(Number.isFinite)) {
          return { scene: clamp01(raw.scene), motion: clamp01(raw.motion), color: clamp01(raw.color) };
        }
        logger.debug('Features: analyzer returned non-finite values — using fallback', { path: source.path, start });
      } catch (err) {
        logger.debug('Features: analyzer failed — using fallback', { path: source.path, start, err });
      }
    }
    return this.fallback();
  }

  /**
   * Average feature vector over `samples` windows spread evenly across the
   * file. Zero-length files profile as all zeros.
   */
  profile(source: SourceFile, windowLength: number, samples: number = SELECTION.profileSampleWindows): ClipFeatures {
    if (source.totalDuration <= 0 || samples <= 0) return { ...ZERO_FEATURES };
    const width = Math.min(windowLength, source.totalDuration);
    const span = source.totalDuration - width;
    const scores: ClipFeatures[] = [];
    for (let i = 0; i < samples; i++) {
      const start = samples === 1 ? 0 : (span * i) / (samples - 1);
      scores.push(this.score(source, start, width));
    }
    return meanFeatures(scores);
  }

  private fallback(): ClipFeatures {
    return {
      scene:  uniform(this.random, FEATURES.fallbackMin, FEATURES.fallbackMax),
      motion: uniform(this.random, FEATURES.fallbackMin, FEATURES.fallbackMax),
      color:  uniform(this.random, FEATURES.fallbackMin, FEATURES.fallbackMax),
    };
  }
}
