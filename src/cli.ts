/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { ConsoleLogger } from './common/console-logger';
import { ConfigError, USAGE, resolveConfig } from './config';
import type { CleanerConfig } from './config';
import { isFilterError } from './filter/errors';
import { rewriteManifest } from './manifest/rewrite';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Run the cleaner once. Resolves to the process exit code.
 */
export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
  let config: CleanerConfig;
  try {
    config = resolveConfig(argv);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    process.stderr.write(`${err.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  if (config.help) {
    process.stdout.write(USAGE);
    return EXIT_OK;
  }

  const logger = new ConsoleLogger(config.logLevel);
  logger.setContext('clean-recently-used');
  if (config.prefixes.length === 0) logger.warn('no path prefixes given, nothing will be removed');

  try {
    const { summary, replaced } = await rewriteManifest(config.file, config.prefixes, {
      logger,
      dryRun: config.dryRun,
    });
    if (!replaced) logger.info(`dry run: would keep ${summary.kept}, remove ${summary.removed} in ${config.file}`);
    return EXIT_OK;
  } catch (err) {
    if (isFilterError(err)) logger.error(`${err.code}: ${err.message}`);
    else logger.error(`failed to rewrite ${config.file}:`, err instanceof Error ? err.message : err);
    return EXIT_FAILURE;
  }
}
