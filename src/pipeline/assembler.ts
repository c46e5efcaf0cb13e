/**
 * Timeline output — hands the ordered clip list to whatever assembles the
 * final video.
 *
 * Writes two files:
 *   timeline.json      — the run report plus one entry per clip.
 *   timeline.ffconcat  — an ffmpeg concat-demuxer script using inpoint /
 *                        outpoint, so `ffmpeg -f concat -i timeline.ffconcat`
 *                        can cut the sequence directly.
 * Offsets are seconds; converting to frames is the consumer's job.
 */
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../utils/logger.js';
import type { Clip, SelectionResult } from '../selection/engine.js';
import type { ClipFeatures } from '../scoring/features.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface TimelineEntry {
  file: string;
  start: number;
  duration: number;
  end: number;
  features: ClipFeatures;
}

export interface TimelineManifest {
  generatedAt: string;
  seed: number;
  policy: SelectionResult['policy'];
  status: SelectionResult['status'];
  requestedDuration: number;
  selectedDuration: number;
  shortfall: number;
  clips: TimelineEntry[];
}

export interface WrittenTimeline {
  manifestPath: string;
  concatPath: string;
}

// ── Helpers ───────────────────────────────────────────────────────────────────

function quote(filePath: string): string {
  return `'${filePath.replace(/'/g, "'\\''")}'`;
}

// ── Public API ─────────────────────────────────────────────────────────────────

export function toTimeline(clips: readonly Clip[]): TimelineEntry[] {
  return clips.map((clip) => ({
    file:     clip.source.path,
    start:    clip.start,
    duration: clip.duration,
    end:      clip.start + clip.duration,
    features: { ...clip.features },
  }));
}

export function formatConcatList(clips: readonly Clip[]): string {
  const lines = ['ffconcat version 1.0'];
  for (const clip of clips) {
    lines.push(`file ${quote(clip.source.path)}`);
    lines.push(`inpoint ${clip.start.toFixed(3)}`);
    lines.push(`outpoint ${(clip.start + clip.duration).toFixed(3)}`);
  }
  return lines.join('\n') + '\n';
}

export function buildManifest(result: SelectionResult, clips: readonly Clip[], seed: number, now = new Date()): TimelineManifest {
  return {
    generatedAt:       now.toISOString(),
    seed,
    policy:            result.policy,
    status:            result.status,
    requestedDuration: result.requestedDuration,
    selectedDuration:  result.selectedDuration,
    shortfall:         result.shortfall,
    clips:             toTimeline(clips),
  };
}

/**
 * Write the manifest and concat script into `outputDir` (created if needed).
 * `clips` is the final, optimized list; `result` supplies the run report.
 */
export function writeTimeline(
  result: SelectionResult,
  clips: readonly Clip[],
  outputDir: string,
  seed: number,
): WrittenTimeline {
  fs.mkdirSync(outputDir, { recursive: true });
  const manifestPath = path.join(outputDir, 'timeline.json');
  const concatPath = path.join(outputDir, 'timeline.ffconcat');

  fs.writeFileSync(manifestPath, JSON.stringify(buildManifest(result, clips, seed), null, 2) + '\n', 'utf-8');
  fs.writeFileSync(concatPath, formatConcatList(clips), 'utf-8');

  logger.info('Assembler: timeline written', { manifestPath, concatPath, clips: clips.length });
  return { manifestPath, concatPath };
}
