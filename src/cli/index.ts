#!/usr/bin/env node
/**
 * txdl CLI Entry Point
 *
 * Wires process signals and streams into `run()` and exits with the
 * code it returns.
 *
 * @module cli
 */

import { ExitCode } from '../shared/constants.js';
import { run } from './run.js';

const controller = new AbortController();

/**
 * First signal aborts the download (progress is saved); a second one
 * exits immediately.
 */
function handleSignal(): void {
  if (controller.signal.aborted) {
    process.exit(ExitCode.INTERRUPTED);
  }
  controller.abort();
}

process.on('SIGINT', handleSignal);
process.on('SIGTERM', handleSignal);

run(process.argv.slice(2), {
  signal: controller.signal,
  progressStream: process.stdout.isTTY ? process.stdout : undefined,
})
  .then((code) => {
    process.exit(code);
  })
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(`[ERROR] ${message}\n`);
    process.exit(ExitCode.GENERAL);
  });
