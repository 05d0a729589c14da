/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as os from 'os';
import { parseArgs } from 'util';

import type { LogLevel } from './common/logger';
import { recentlyUsedManifest } from './common/data-dir';

export const USAGE = `Usage: clean-recently-used [options] [--] <path-prefix>...

Removes entries below the given path prefixes from recently-used.xbel.

Options:
  -f, --file <path>  manifest to rewrite (default: <user data dir>/recently-used.xbel)
  -n, --dry-run      filter and report without replacing the manifest
  -v, --verbose      log every removed entry
  -q, --quiet        log errors only
  -h, --help         show this help
`;

export interface CleanerConfig {
  file: string;
  prefixes: string[];
  dryRun: boolean;
  logLevel: LogLevel;
  help: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function parseArgv(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        file: { type: 'string', short: 'f' },
        'dry-run': { type: 'boolean', short: 'n', default: false },
        verbose: { type: 'boolean', short: 'v', default: false },
        quiet: { type: 'boolean', short: 'q', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Build the run configuration from command-line arguments and environment.
 */
export function resolveConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = os.homedir()
): CleanerConfig {
  const { values, positionals } = parseArgv(argv);
  if (values.verbose && values.quiet) throw new ConfigError('--verbose and --quiet are mutually exclusive');

  let logLevel: LogLevel = 'info';
  if (values.verbose) logLevel = 'debug';
  else if (values.quiet) logLevel = 'error';

  const help = values.help ?? false;
  let file = values.file;
  if (file === undefined) file = help ? '' : recentlyUsedManifest(platform, env, home);

  return {
    file,
    prefixes: positionals,
    dryRun: values['dry-run'] ?? false,
    logLevel,
    help,
  };
}
