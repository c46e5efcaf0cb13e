/**
 * Source discovery — finds video files in a directory, gives each an
 * orderable timestamp, and resolves durations into allocatable SourceFiles.
 *
 * Timestamps come from the file name when it embeds a camera-style
 * `YYYYMMDD_HHMMSS` stamp (VID_, PXL_, DJI_ and bare forms; read as UTC),
 * otherwise from the file's modification time.
 */
import * as fs from 'fs';
import * as path from 'path';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';
import { SourceFile } from '../allocator/source-file.js';
import type { DurationProbe } from './probe.js';

export interface SourceRef {
  path: string;
  timestamp: number;
}

const NAME_STAMP = /(\d{4})(\d{2})(\d{2})[_-]?(\d{2})(\d{2})(\d{2})/;

export function timestampFromName(fileName: string): number | null {
  const match = NAME_STAMP.exec(fileName);
  if (!match) return null;
  const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
  const ts = Date.UTC(year, month - 1, day, hour, minute, second);
  const d = new Date(ts);
  const valid =
    d.getUTCFullYear() === year &&
    d.getUTCMonth() === month - 1 &&
    d.getUTCDate() === day &&
    d.getUTCHours() === hour &&
    d.getUTCMinutes() === minute &&
    d.getUTCSeconds() === second;
  return valid ? ts : null;
}

export function discoverSources(inputDir: string, extensions: readonly string[] = env.VIDEO_EXTENSIONS): SourceRef[] {
  if (!fs.existsSync(inputDir) || !fs.statSync(inputDir).isDirectory()) {
    throw new Error(`Input directory not found: ${inputDir}`);
  }

  const wanted = new Set(extensions.map((ext) => ext.toLowerCase()));
  const refs = fs
    .readdirSync(inputDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && wanted.has(path.extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort()
    .map((name) => {
      const filePath = path.resolve(inputDir, name);
      const timestamp = timestampFromName(name) ?? fs.statSync(filePath).mtimeMs;
      return { path: filePath, timestamp };
    });

  logger.info('Sources: discovered video files', { inputDir, count: refs.length });
  return refs;
}

/** Probe every reference; unknown durations become zero-capacity sources. */
export function resolveSources(refs: readonly SourceRef[], probe: DurationProbe, minGap: number): SourceFile[] {
  return refs.map((ref) => {
    const duration = probe(ref.path);
    if (duration === null) {
      logger.warn('Sources: duration unknown — excluding from allocation', { path: ref.path });
    } else {
      logger.debug('Sources: resolved duration', { path: ref.path, duration });
    }
    return new SourceFile({ path: ref.path, totalDuration: duration ?? 0, timestamp: ref.timestamp, minGap });
  });
}
