#!/usr/bin/env node
/**
 * montage-picker — CLI entry point.
 */
import { logger } from './utils/logger.js';
import { USAGE, parseCommandLine } from './cli.js';
import { runSelection } from './pipeline/index.js';
import { SelectionError } from './selection/engine.js';

// ── CLI entrypoint ────────────────────────────────────────────────────────────

function main(): void {
  const command = parseCommandLine(process.argv.slice(2));
  if (command.kind === 'help') {
    process.stdout.write(USAGE);
    if (!command.ok) process.exitCode = 1;
    return;
  }

  const summary = runSelection(command.params);
  process.stdout.write(
    `${summary.clips.length} clip(s), ${summary.result.selectedDuration}s of ${summary.result.requestedDuration}s` +
    ` (seed ${summary.seed})\n${summary.manifestPath}\n${summary.concatPath}\n`,
  );
}

try {
  main();
} catch (err) {
  if (err instanceof SelectionError) {
    logger.error('Selection failed', { reason: err.message });
  } else {
    logger.error('Fatal error', { err });
  }
  process.exit(1);
}
