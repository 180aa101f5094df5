#!/usr/bin/env node
/**
 * Command line entry point for Playlist Bridge
 */

import { APP_ENV } from './config.js';
import { EXIT_FAILED, EXIT_OK, exitCodeFor, parseCliArgs, usage } from './cli-options.js';
import { loadMigrationConfig, type MigrationConfig } from './config/migration-config.js';
import { createApp, type App } from './index.js';
import { getMigrationConfigPath, initializeDirectories, resolveLayout } from './init.js';
import { enableFileLogging, logger } from './logger.js';
import { applyRetentionPolicy } from './logging/retention.js';
import { formatJobSummary, formatRunTotals } from './migration/report.js';
import { formatDuration } from './utils/format-duration.js';
import { formatUserError } from './utils/error-formatter.js';
import { formatETA, type ProgressUpdate } from './utils/progress-tracker.js';

async function prepare(configPathArg: string | undefined): Promise<MigrationConfig | null> {
  const layout = resolveLayout();
  const configPath = configPathArg ?? getMigrationConfigPath(layout);

  const createdTemplate = await initializeDirectories(layout, configPath);

  const logFile = enableFileLogging(layout.logDir);
  const retention = await applyRetentionPolicy({
    directory: layout.logDir,
    maxDays: APP_ENV.LOG_RETENTION_DAYS,
    maxSizeBytes: APP_ENV.LOG_RETENTION_MAX_SIZE_MB * 1024 * 1024
  });
  logger.debug({ logFile, removed: retention.removed.length }, 'logging ready');

  if (createdTemplate) {
    console.log(`Created ${configPath}. Add your NetEase playlist ids and Spotify credentials, then run again.`);
    return null;
  }

  try {
    return await loadMigrationConfig(configPath);
  } catch (error) {
    logger.error({ err: error }, 'failed to load migration config');
    console.error(formatUserError(error, 'loading the migration config'));
    return null;
  }
}

function attachProgressLine(app: App): void {
  if (!process.stdout.isTTY) {
    return;
  }

  app.progress.on('progress', (update: ProgressUpdate) => {
    const { matched, unmatched, skipped } = update.tally;
    process.stdout.write(
      `\r${update.message}: ${update.current}/${update.total} (${update.percent}%) ` +
        `matched=${matched} unmatched=${unmatched} skipped=${skipped} eta ${formatETA(update.eta)}\x1b[K`
    );
  });
  app.progress.on('stopped', () => {
    process.stdout.write('\r\x1b[K');
  });
}

/**
 * First signal stops after the current job; a second exits immediately
 */
function installStopHandlers(controller: AbortController): void {
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      logger.warn({ signal }, 'second stop signal, exiting immediately');
      process.exit(130);
    }
    logger.warn({ signal }, 'stop requested, finishing the current playlist');
    console.log('\nStopping after the current playlist (press Ctrl+C again to exit now)...');
    controller.abort();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

async function runMigrate(configPath: string | undefined, dryRun: boolean): Promise<number> {
  const config = await prepare(configPath);
  if (!config) {
    return EXIT_FAILED;
  }

  const app = createApp({
    config,
    interactive: Boolean(process.stdin.isTTY),
    onAuthorizeUrl: url => console.log(`Authorize Playlist Bridge in your browser:\n  ${url}`)
  });
  attachProgressLine(app);

  const controller = new AbortController();
  installStopHandlers(controller);

  const summary = await app.migrate({ dryRun, signal: controller.signal });

  for (const result of summary.results) {
    console.log(formatJobSummary(result));
    if (result.state.status === 'failed' && result.error !== undefined) {
      console.log(`  ${formatUserError(result.error, `migrating playlist ${result.report.job.sourcePlaylistId}`)}`);
    }
  }

  if (summary.halted) {
    console.error(formatUserError(summary.halted.error, 'checking Spotify authorization'));
  }

  console.log(formatRunTotals(summary));
  return exitCodeFor(summary);
}

async function runAuth(configPath: string | undefined): Promise<number> {
  const config = await prepare(configPath);
  if (!config) {
    return EXIT_FAILED;
  }

  const app = createApp({
    config,
    interactive: true,
    onAuthorizeUrl: url => console.log(`Authorize Playlist Bridge in your browser:\n  ${url}`)
  });

  try {
    const state = await app.authorize();
    if (state.status === 'authorized') {
      const validFor = formatDuration(state.expiresAt - Date.now());
      console.log(`Authorized with scopes: ${state.scopes.join(' ')} (access token valid for ${validFor})`);
    }
    return EXIT_OK;
  } catch (error) {
    logger.error({ err: error }, 'authorization failed');
    console.error(formatUserError(error, 'authorizing with Spotify'));
    return EXIT_FAILED;
  }
}

async function main(): Promise<number> {
  const command = parseCliArgs(process.argv.slice(2));

  switch (command.kind) {
    case 'help':
      console.log(usage);
      return EXIT_OK;
    case 'invalid':
      console.error(`Error: ${command.message}`);
      console.log('\n' + usage);
      return EXIT_FAILED;
    case 'auth':
      return runAuth(command.configPath);
    case 'migrate':
      return runMigrate(command.configPath, command.dryRun);
  }
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    logger.error({ err: error }, 'CLI execution failed');
    console.error(formatUserError(error, 'running the CLI'));
    process.exitCode = EXIT_FAILED;
  });
