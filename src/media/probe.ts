/**
 * Duration probe — asks ffprobe for a file's length in seconds.
 *
 * Prefers the container (format) duration and falls back to the first video
 * stream that reports one. Any failure resolves to `null` ("unknown"); the
 * caller decides what an unknown duration means.
 */
import { execFileSync } from 'child_process';
import { z } from 'zod';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

export type CommandRunner = (command: string, args: string[]) => string;
export type DurationProbe = (filePath: string) => number | null;

const FfprobeOutputSchema = z.object({
  format: z.object({ duration: z.string().optional() }).optional(),
  streams: z
    .array(z.object({ codec_type: z.string().optional(), duration: z.string().optional() }))
    .default([]),
});

const runCommand: CommandRunner = (command, args) =>
  execFileSync(command, args, { encoding: 'utf-8', stdio: ['ignore', 'pipe', 'pipe'] });

function toSeconds(raw: string | undefined): number | null {
  if (raw === undefined) return null;
  const value = parseFloat(raw);
  return Number.isFinite(value) && value >= 0 ? value : null;
}

export function probeDuration(
  filePath: string,
  run: CommandRunner = runCommand,
  ffprobePath: string = env.FFPROBE_PATH,
): number | null {
  let stdout: string;
  try {
    stdout = run(ffprobePath, ['-v', 'error', '-print_format', 'json', '-show_format', '-show_streams', filePath]);
  } catch (err) {
    const e = err as { stderr?: Buffer | string };
    logger.warn('Probe: ffprobe failed', { filePath, stderr: e.stderr ? String(e.stderr).trim() : String(err) });
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    logger.warn('Probe: ffprobe output is not JSON', { filePath });
    return null;
  }

  const parsed = FfprobeOutputSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn('Probe: unexpected ffprobe output shape', { filePath });
    return null;
  }

  const fromFormat = toSeconds(parsed.data.format?.duration);
  if (fromFormat !== null) return fromFormat;

  for (const stream of parsed.data.streams) {
    if (stream.codec_type !== 'video') continue;
    const fromStream = toSeconds(stream.duration);
    if (fromStream !== null) return fromStream;
  }

  logger.warn('Probe: no duration reported', { filePath });
  return null;
}

/** A probe bound to the given runner, for injection into the pipeline. */
export function createProbe(run: CommandRunner = runCommand, ffprobePath: string = env.FFPROBE_PATH): DurationProbe {
  return (filePath) => probeDuration(filePath, run, ffprobePath);
}
