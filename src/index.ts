#!/usr/bin/env node
import fs from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import { loadConfig } from './utils/config';
import { initErrorReporting, logger } from './utils/logger';
import { CookiesManager } from './utils/CookiesManager';
import { createOrchestrator, OrchestratorDependencies } from './download/createOrchestrator';
import { DownloadOrchestrator } from './download/core/DownloadOrchestrator';
import { ErrorKind, MediaRouteError, toMediaRouteError } from './download/core/errors';
import { createMediaRequest, RouteEvent } from './download/core/types';
import { AppConfig } from './types';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID_URL = 2;

const USAGE = 'Usage: media-router <url> [outputDir]';

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const consoleIo: CliIo = {
  stdout: (line) => process.stdout.write(`${line}\n`),
  stderr: (line) => process.stderr.write(`${line}\n`),
};

/**
 * Route one URL and write the artifact to outputDir. Resolves to the exit code.
 */
export async function run(
  args: string[],
  orchestrator: DownloadOrchestrator,
  options: { signal?: AbortSignal; io?: CliIo } = {},
): Promise<number> {
  const io = options.io || consoleIo;
  const [url, outputDir = '.'] = args;

  if (!url) {
    io.stderr(USAGE);
    return EXIT_INVALID_URL;
  }

  const request = createMediaRequest(url);
  const signal = options.signal;
  let target: string | undefined;

  orchestrator.on('provider:switched', (event: RouteEvent) => {
    io.stderr(`Trying ${event.providerId} (attempt ${event.attempt})`);
  });

  try {
    const estimate = await orchestrator.probe(request, { signal });
    if (estimate.sizeBytes !== undefined) {
      logger.info('Estimated size', { sizeBytes: estimate.sizeBytes, name: estimate.suggestedName });
    }

    const media = await orchestrator.open(request, { signal });
    await fs.promises.mkdir(outputDir, { recursive: true });
    target = path.join(outputDir, media.filename);

    await pipeline(media.body, fs.createWriteStream(target), { signal });

    io.stdout(target);
    logger.info('Saved artifact', { path: target, mimeType: media.mimeType });
    return EXIT_OK;
  } catch (error) {
    const failure = signal?.aborted
      ? new MediaRouteError(ErrorKind.Cancelled, 'Download cancelled', { cause: error })
      : toMediaRouteError(error);
    if (target) {
      await fs.promises.rm(target, { force: true }).catch((cleanupError: unknown) => {
        logger.warn('Failed to remove partial file', { path: target, error: String(cleanupError) });
      });
    }
    io.stderr(failure.report.humanMessage);
    return failure.kind === ErrorKind.InvalidURL ? EXIT_INVALID_URL : EXIT_FAILURE;
  }
}

function bootstrap(config: AppConfig): OrchestratorDependencies {
  const cookies = new CookiesManager({
    cookiesFile: config.cookiesFile,
    cookiesContent: config.cookiesContent,
    tempDirectory: config.tempDirectory,
  });
  return { credential: cookies.load() };
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error: unknown) {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exitCode = EXIT_FAILURE;
    return;
  }

  logger.level = config.logLevel;
  initErrorReporting(config.sentryDsn);

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.info('SIGINT received, cancelling download');
    controller.abort();
  });

  const orchestrator = createOrchestrator(config, bootstrap(config));
  process.exitCode = await run(process.argv.slice(2), orchestrator, { signal: controller.signal });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Fatal error', {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    process.exitCode = EXIT_FAILURE;
  });
}
