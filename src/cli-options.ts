import type { RunSummary } from './migration/types.js';

export type CliCommand =
  | { kind: 'migrate'; configPath?: string; dryRun: boolean }
  | { kind: 'auth'; configPath?: string }
  | { kind: 'help' }
  | { kind: 'invalid'; message: string };

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_HALTED = 2;

export const usage = `Playlist Bridge - migrate NetEase Cloud Music playlists to Spotify

Usage:
  playlist-bridge [migrate] [--config <path>] [--dry-run]
                              Migrate every playlist in migration.config.json (default)
  playlist-bridge auth [--config <path>]
                              Authorize with Spotify and store the token
  playlist-bridge --help      Show this help

Options:
  --config <path>   Migration config file (default: ./config/migration.config.json)
  --dry-run         Resolve tracks and report matches without creating playlists

Exit codes:
  0  every playlist migrated
  1  at least one playlist failed, the run was stopped, or the config is invalid
  2  the run halted because Spotify authorization is missing or expired`;

export function parseCliArgs(args: readonly string[]): CliCommand {
  if (args.some(arg => arg === '--help' || arg === '-h' || arg === 'help')) {
    return { kind: 'help' };
  }

  let command: 'migrate' | 'auth' = 'migrate';
  let configPath: string | undefined;
  let dryRun = false;

  for (let index = 0; index < args.length; index++) {
    const arg = args[index];

    if (index === 0 && (arg === 'migrate' || arg === 'auth')) {
      command = arg;
    } else if (arg === '--config' || arg === '-c') {
      const value = args[index + 1];
      if (!value || value.startsWith('-')) {
        return { kind: 'invalid', message: `${arg} requires a path` };
      }
      configPath = value;
      index++;
    } else if (arg.startsWith('--config=')) {
      configPath = arg.slice('--config='.length);
    } else if (arg === '--dry-run' && command === 'migrate') {
      dryRun = true;
    } else {
      return { kind: 'invalid', message: `unknown argument '${arg}'` };
    }
  }

  return command === 'auth' ? { kind: 'auth', configPath } : { kind: 'migrate', configPath, dryRun };
}

export function exitCodeFor(summary: RunSummary): number {
  if (summary.halted) {
    return EXIT_HALTED;
  }
  if (summary.stopped || summary.results.some(result => result.state.status === 'failed')) {
    return EXIT_FAILED;
  }
  return EXIT_OK;
}
