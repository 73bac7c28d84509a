#!/usr/bin/env node
/**
 * Stillwater entry point.
 *
 *   stillwater assemble <manifest...>    render, compose and verify each manifest
 *   stillwater plan <manifest>           probe assets and print the timeline
 *   stillwater verify <video> <manifest> run the integrity gates on an existing file
 *
 * Exit codes: 0 all outputs publishable, 1 a run failed, 2 an output failed
 * verification.
 */
import { logger } from './utils/logger.js';
import { AssemblyError } from './utils/errors.js';
import { previewTimeline, runAssembly } from './pipeline/index.js';
import { loadManifest } from './pipeline/manifest.js';
import { verifyAssembly } from './gates/index.js';
import type { AssemblyResult } from './types.js';

const EXIT_OK = 0;
const EXIT_FAILED = 1;
const EXIT_UNPUBLISHABLE = 2;

const USAGE = [
  'Usage:',
  '  stillwater assemble <manifest.json...>',
  '  stillwater plan <manifest.json>',
  '  stillwater verify <video.mp4> <manifest.json>',
].join('\n');

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function logFailure(source: string, err: unknown): void {
  if (err instanceof AssemblyError) {
    logger.error('Run failed', { source, stage: err.stage, error: err.message, ...err.details });
  } else {
    logger.error('Run failed', { source, err });
  }
}

// ── Commands ──────────────────────────────────────────────────────────────────

async function assemble(manifestPaths: string[]): Promise<number> {
  const settled = await Promise.allSettled(
    manifestPaths.map(async (p): Promise<AssemblyResult> => runAssembly(await loadManifest(p))),
  );

  let exitCode = EXIT_OK;
  settled.forEach((outcome, i) => {
    const source = manifestPaths[i] ?? `#${i}`;
    if (outcome.status === 'rejected') {
      logFailure(source, outcome.reason);
      exitCode = EXIT_FAILED;
      return;
    }
    printJson(outcome.value);
    if (outcome.value.verification.status === 'fail' && exitCode === EXIT_OK) {
      exitCode = EXIT_UNPUBLISHABLE;
    }
  });
  return exitCode;
}

async function plan(manifestPath: string): Promise<number> {
  const timeline = await previewTimeline(await loadManifest(manifestPath));
  printJson(timeline);
  return EXIT_OK;
}

async function verify(videoPath: string, manifestPath: string): Promise<number> {
  const request = await loadManifest(manifestPath);
  const timeline = await previewTimeline(request);
  const report = await verifyAssembly(videoPath, timeline, request.sampling);
  printJson({
    videoPath,
    pass: report.pass,
    duration: report.duration,
    failedGate: report.failedGate,
    code: report.code,
    reason: report.reason,
  });
  return report.pass ? EXIT_OK : EXIT_UNPUBLISHABLE;
}

// ── CLI entrypoint ────────────────────────────────────────────────────────────

const [,, command, ...args] = process.argv;

async function main(): Promise<number> {
  logger.debug('Stillwater: starting', { command, args });

  switch (command) {
    case 'assemble':
      if (args.length === 0) break;
      return assemble(args);

    case 'plan': {
      const [manifestPath] = args;
      if (!manifestPath) break;
      return plan(manifestPath);
    }

    case 'verify': {
      const [videoPath, manifestPath] = args;
      if (!videoPath || !manifestPath) break;
      return verify(videoPath, manifestPath);
    }

    default:
      break;
  }

  console.error(USAGE);
  return EXIT_FAILED;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    logFailure(command ?? 'cli', err);
    process.exit(EXIT_FAILED);
  });
