/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Replace the manifest on disk with its filtered version. The filtered
  document is written next to the original and only renamed over it once
  the pass succeeded and the result is well-formed.
*/

import * as fs from 'fs';
import { XMLValidator } from 'fast-xml-parser';

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { filterBookmarks, filterBuffer } from '../filter/bookmark-filter';
import { InvalidOutputError } from '../filter/errors';
import type { FilterSummary } from '../filter/types';

export interface RewriteOptions {
  logger?: Logger;
  /** Filter and check only; leave the manifest untouched. */
  dryRun?: boolean;
  /** Timestamp used for the temporary file name. */
  now?: Date;
}

export interface RewriteResult {
  summary: FilterSummary;
  replaced: boolean;
}

/** `<file>-<ISO timestamp>` with the colons dropped. */
export function timestampedPath(file: string, now: Date): string {
  return `${file}-${now.toISOString().replace(/:/g, '')}`;
}

export function checkWellFormed(document: string): void {
  const result = XMLValidator.validate(document);
  if (result !== true) throw new InvalidOutputError(`${result.err.code}, ${result.err.msg}`, result.err.line, result.err.col);
}

export async function rewriteManifest(
  file: string,
  prefixes: readonly string[],
  options: RewriteOptions = {}
): Promise<RewriteResult> {
  let logger: Logger;
  if (options.logger) logger = options.logger.clone();
  else logger = new ConsoleLogger('warn');
  logger.setContext('manifest');

  if (options.dryRun) {
    logger.debug(`dry run on ${file}`);
    const { output, summary } = filterBuffer(await fs.promises.readFile(file), prefixes, { logger: options.logger });
    checkWellFormed(output.toString('utf8'));
    return { summary, replaced: false };
  }

  const tempFile = timestampedPath(file, options.now ?? new Date());
  logger.debug(`writing filtered manifest to ${tempFile}`);

  // exclusive create: an existing file of that name is never ours to remove
  const handle = await fs.promises.open(tempFile, 'wx');
  let summary: FilterSummary;
  try {
    summary = await filterBookmarks(fs.createReadStream(file), handle.createWriteStream(), prefixes, {
      logger: options.logger,
    });
    checkWellFormed(await fs.promises.readFile(tempFile, 'utf8'));
  } catch (err) {
    // the write stream closes the handle when the pipeline settles
    await fs.promises.rm(tempFile, { force: true });
    throw err;
  }

  await fs.promises.rename(tempFile, file);
  logger.info(`rewrote ${file}: kept ${summary.kept}, removed ${summary.removed}`);
  return { summary, replaced: true };
}
