// src/cli.ts

import { Command, CommanderError } from 'commander';
import { setTimeout as delay } from 'timers/promises';
import type { RunResult } from './pipeline/types';
import { Logger } from './observability/Logger';
import { loadSettings, type Settings } from './config/ConfigValidator';
import { RepoWatcher } from './watcher';
import { errorMessage } from './utils/errors';

interface CliOptions {
  dryRun?: boolean;
  statePath?: string;
  watch?: boolean;
  releaseTag?: string;
  sendReleaseToDiscord?: boolean;
}

export interface CliDeps {
  /** Environment to read settings from; `process.env` plus `.env` when omitted */
  env?: Record<string, string | undefined>;
  createWatcher?: (settings: Settings) => RepoWatcher;
  stdout?: (text: string) => void;
  /** Stops `--watch`; SIGINT and SIGTERM are wired in when omitted */
  signal?: AbortSignal;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export function buildProgram(): Command {
  return new Command()
    .name('merge-herald')
    .description('Notify Discord about merged pull requests and published releases')
    .option('--dry-run', 'run without calling GitHub, OpenAI or Discord')
    .option('--no-dry-run', 'disable dry-run mode')
    .option('--state-path <path>', 'checkpoint file location')
    .option('--watch', 'keep polling, pausing HERALD_POLL_INTERVAL_MINUTES between runs')
    .option('--release-tag <tag>', 'fetch and summarize a specific release tag')
    .option(
      '--send-release-to-discord',
      'send the release summary to Discord (requires --release-tag)'
    )
    .exitOverride();
}

/**
 * CLI entry point.
 *
 * @returns process exit code
 */
export async function main(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const program = buildProgram();

  let options: CliOptions;
  try {
    program.parse(argv, { from: 'user' });
    options = program.opts<CliOptions>();
    if (options.sendReleaseToDiscord && !options.releaseTag) {
      program.error('error: --send-release-to-discord requires --release-tag');
    }
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.code === 'commander.helpDisplayed' || error.code === 'commander.version'
        ? 0
        : 1;
    }
    throw error;
  }

  let settings: Settings;
  try {
    settings = loadSettings(deps.env, { dryRun: options.dryRun, statePath: options.statePath });
  } catch (error) {
    new Logger().error('Invalid configuration', { error: errorMessage(error) });
    return 1;
  }

  const watcher = (deps.createWatcher ?? ((value: Settings) => RepoWatcher.create(value)))(settings);
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));

  if (options.releaseTag) {
    return runReleaseSummary(
      watcher,
      options.releaseTag,
      options.sendReleaseToDiscord ?? false,
      stdout
    );
  }

  if (!options.watch) {
    return exitCode(await watcher.runOnce(), watcher.logger);
  }

  return watch(watcher, deps);
}

async function runReleaseSummary(
  watcher: RepoWatcher,
  tag: string,
  sendToDiscord: boolean,
  stdout: (text: string) => void
): Promise<number> {
  const { logger, settings } = watcher;

  try {
    const { release, message } = await watcher.renderRelease(tag);
    stdout(message);

    if (!sendToDiscord) return 0;

    if (settings.dryRun) {
      logger.info('Dry run enabled, skipping Discord send', { tag: release.tagName });
      return 0;
    }

    // settings validation already requires a webhook outside dry run
    await watcher.notifier.send(message);
    logger.info('Release summary sent to Discord', { tag: release.tagName });
    return 0;
  } catch (error) {
    logger.error('Release summary mode failed', { tag, error: errorMessage(error) });
    return 1;
  }
}

async function watch(watcher: RepoWatcher, deps: CliDeps): Promise<number> {
  const controller = new AbortController();
  const stop = (): void => controller.abort();
  const sleep = deps.sleep ?? sleepUntilAborted;

  if (deps.signal) {
    deps.signal.addEventListener('abort', stop, { once: true });
  } else {
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  }

  const intervalMs = watcher.settings.pollIntervalMinutes * 60_000;
  let code = 0;
  try {
    while (!controller.signal.aborted) {
      code = exitCode(await watcher.runOnce(), watcher.logger);
      if (controller.signal.aborted) break;

      watcher.logger.debug('Sleeping until next run', { intervalMs });
      await sleep(intervalMs, controller.signal);
    }
  } finally {
    deps.signal?.removeEventListener('abort', stop);
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }

  watcher.logger.info('Watch stopped');
  return code;
}

async function sleepUntilAborted(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (!signal.aborted) throw error;
  }
}

function exitCode(result: RunResult, logger: Logger): number {
  if (!result.success) {
    logger.error('Pipeline failed', { message: result.message, outcome: result.outcome });
    return 1;
  }
  logger.info('Pipeline completed', {
    deliveredCount: result.deliveredCount,
    message: result.message,
  });
  return 0;
}
