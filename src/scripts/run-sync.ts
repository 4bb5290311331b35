import 'reflect-metadata';
import 'dotenv/config';
import path from 'path';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import type { INestApplicationContext } from '@nestjs/common';
import { AppModule } from '../app.module.js';
import { SYNC_CONFIG, loadSyncTargets } from '../config/sync.config.js';
import type { SyncConfig } from '../config/sync.config.js';
import { PipelineService, exitCodeFor } from '../pipeline/pipeline.service.js';
import type { RunSummary } from '../pipeline/pipeline.service.js';
import { SyncRunRepo } from '../pipeline/sync-run.repo.js';
import { parsePlatform, selectTargets } from '../pipeline/targets.js';
import { ConfigurationError, describeError } from '../raw/errors.js';

const EXIT_FATAL = 2;

type Args = {
  platform?: string;
  targetsFile?: string;
  concurrency?: number;
};

function parseArgs(): Args {
  const kv = Object.fromEntries(
    process.argv.slice(2).map((a): [string, string] => {
      const i = a.indexOf('=');
      return i === -1 ? [a.replace(/^--/, ''), ''] : [a.slice(2, i), a.slice(i + 1)];
    }),
  );
  return {
    platform: kv.platform,
    targetsFile: kv['targets-file'],
    concurrency: positiveInt('concurrency', kv.concurrency),
  };
}

function positiveInt(flag: string, value?: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || parsed < 1) {
    throw new ConfigurationError(`--${flag} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

async function main(): Promise<number> {
  const logger = new Logger('RunSync');
  let args: Args;
  try {
    args = parseArgs();
  } catch (error: unknown) {
    logger.error(`💥 ${describeError(error).message}`);
    return EXIT_FATAL;
  }

  let app: INestApplicationContext;
  try {
    app = await NestFactory.createApplicationContext(AppModule, {
      logger: ['error', 'warn', 'log'],
      abortOnError: false,
    });
  } catch (error: unknown) {
    logger.error(`💥 Startup failed: ${describeError(error).message}`);
    return EXIT_FATAL;
  }

  const controller = new AbortController();
  const abort = (reason: string) => () => {
    if (controller.signal.aborted) return;
    logger.warn(`⏹️ ${reason}, finishing the current target and skipping the rest`);
    controller.abort();
  };
  process.once('SIGINT', abort('Interrupted'));
  process.once('SIGTERM', abort('Terminated'));
  let timer: NodeJS.Timeout | undefined;

  try {
    const config = app.get<SyncConfig>(SYNC_CONFIG);
    const configured = args.targetsFile ? loadSyncTargets(path.resolve(args.targetsFile)) : config.targets;
    const targets = selectTargets(configured, parsePlatform(args.platform));

    if (config.runTimeoutMs) {
      timer = setTimeout(abort(`Run timeout of ${config.runTimeoutMs}ms reached`), config.runTimeoutMs);
    }

    let summary: RunSummary;
    try {
      summary = await app.get(PipelineService).run({
        targets,
        signal: controller.signal,
        concurrency: args.concurrency,
      });
    } catch (error: unknown) {
      logger.error(`💥 ${describeError(error).message}`);
      return EXIT_FATAL;
    }

    console.log(JSON.stringify(summary, null, 2));
    try {
      await app.get(SyncRunRepo).record('cli', summary);
    } catch (error: unknown) {
      logger.error(`Could not record the run: ${describeError(error).message}`);
    }
    return exitCodeFor(summary);
  } catch (error: unknown) {
    logger.error(`💥 ${describeError(error).message}`);
    return EXIT_FATAL;
  } finally {
    clearTimeout(timer);
    await app.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((err: unknown) => {
    console.error('Sync failed:', err);
    process.exit(EXIT_FATAL);
  });
