/**
 * Selection pipeline — discovery → probing → clip selection → transition
 * optimization → timeline output.
 */
import { TRANSITION, type SelectionPolicy } from '../config.js';
import { logger } from '../utils/logger.js';
import { createRandom } from '../utils/random.js';
import { discoverSources, resolveSources } from '../media/sources.js';
import { createProbe, type DurationProbe } from '../media/probe.js';
import { FeatureScorer, type WindowAnalyzer } from '../scoring/features.js';
import { SelectionError, selectClips, type Clip, type SelectionResult } from '../selection/engine.js';
import { optimizeTransitions } from '../selection/transitions.js';
import { writeTimeline, type WrittenTimeline } from './assembler.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface RunParams {
  inputDir: string;
  outputDir: string;
  extensions: string[];
  clipLength: number;
  totalDuration: number;
  policy: SelectionPolicy;
  diversityWeight: number;
  minSceneScore: number;
  minGap: number;
  optimizeTransitions: boolean;
  seed?: number;
  probe?: DurationProbe;
  analyzer?: WindowAnalyzer;
}

export interface RunSummary extends WrittenTimeline {
  seed: number;
  result: SelectionResult;
  /** Final clip list, after transition optimization. */
  clips: Clip[];
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Run one selection and write its timeline.
 *
 * A partial selection still writes output (the shortfall is in the report);
 * selecting nothing at all throws a SelectionError and writes nothing.
 */
export function runSelection(params: RunParams): RunSummary {
  const random = createRandom(params.seed);
  logger.info('Pipeline: starting selection run', {
    inputDir: params.inputDir,
    policy:   params.policy,
    seed:     random.seed,
  });

  const refs = discoverSources(params.inputDir, params.extensions);
  const sources = resolveSources(refs, params.probe ?? createProbe(), params.minGap);

  const result = selectClips(
    sources,
    {
      clipLength:         params.clipLength,
      totalDuration:      params.totalDuration,
      policy:             params.policy,
      diversityWeight:    params.diversityWeight,
      minSceneScore:      params.minSceneScore,
      transitionHeadroom: params.optimizeTransitions ? TRANSITION.headroom : 0,
    },
    { random, scorer: new FeatureScorer(random, params.analyzer) },
  );

  if (result.status === 'empty') {
    throw new SelectionError(
      `No clips could be selected from ${sources.length} source file(s) in ${params.inputDir}`,
      result,
    );
  }

  const clips = params.optimizeTransitions ? optimizeTransitions(result.clips, random) : result.clips;
  const written = writeTimeline(result, clips, params.outputDir, random.seed);

  logger.info('Pipeline: run complete', {
    status:    result.status,
    clips:     clips.length,
    shortfall: result.shortfall,
    seed:      random.seed,
  });

  return { ...written, seed: random.seed, result, clips };
}
