/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { Transform } from 'stream';
import type { Readable, TransformCallback, Writable } from 'stream';
import { pipeline } from 'stream/promises';

import type { Logger } from '../common/logger';
import { ConsoleLogger } from '../common/console-logger';
import { EventRouter } from './event-router';
import { PathPrefixSet } from './path-prefix-set';
import type { FilterSummary, ParseEvent } from './types';
import { XmlLexer } from './xml-lexer';

export interface FilterOptions {
  logger?: Logger;
}

/**
 * Synchronous single-pass filter: raw manifest bytes in, retained bytes out.
 */
export class BookmarkFilter {
  private readonly lexer = new XmlLexer();
  private readonly router: EventRouter;
  private readonly logger: Logger;

  constructor(prefixes: Iterable<string>, options: FilterOptions = {}) {
    if (options.logger) this.logger = options.logger.clone();
    else this.logger = new ConsoleLogger('warn');
    this.logger.setContext('bookmark-filter');

    const prefixSet = new PathPrefixSet(prefixes);
    this.router = new EventRouter(prefixSet, this.logger);
    this.logger.debug(`filtering with ${prefixSet.size} prefix(es)`, prefixSet.values());
  }

  get summary(): FilterSummary {
    return this.router.summary;
  }

  write(chunk: Buffer): Buffer[] {
    return this.route(this.lexer.feed(chunk));
  }

  end(): Buffer[] {
    const out = this.route(this.lexer.end());
    this.logger.debug(`kept ${this.summary.kept} bookmark(s), removed ${this.summary.removed}`);
    return out;
  }

  private route(events: ParseEvent[]): Buffer[] {
    const out: Buffer[] = [];
    for (const event of events) {
      const bytes = this.router.route(event);
      if (bytes) out.push(bytes);
    }
    return out;
  }
}

/**
 * Transform stream wrapper around BookmarkFilter.
 */
export class BookmarkFilterStream extends Transform {
  readonly core: BookmarkFilter;

  constructor(prefixes: Iterable<string>, options: FilterOptions = {}) {
    super();
    this.core = new BookmarkFilter(prefixes, options);
  }

  _transform(chunk: Buffer | string, encoding: BufferEncoding, callback: TransformCallback): void {
    const bytes = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk, encoding);
    this.run(() => this.core.write(bytes), callback);
  }

  _flush(callback: TransformCallback): void {
    this.run(() => this.core.end(), callback);
  }

  private run(step: () => Buffer[], callback: TransformCallback): void {
    let out: Buffer[];
    try {
      out = step();
    } catch (err) {
      callback(err instanceof Error ? err : new Error(String(err)));
      return;
    }
    if (out.length > 0) this.push(Buffer.concat(out));
    callback();
  }
}

/**
 * Stream the manifest from `input` to `output`, dropping every bookmark whose
 * local path starts with one of `prefixes`. `output` is ended when the pass
 * completes. Rejects with a FilterError on the first fatal condition.
 */
export async function filterBookmarks(
  input: Readable,
  output: Writable,
  prefixes: Iterable<string>,
  options: FilterOptions = {}
): Promise<FilterSummary> {
  const transform = new BookmarkFilterStream(prefixes, options);
  await pipeline(input, transform, output);
  return transform.core.summary;
}

/**
 * In-memory variant of filterBookmarks.
 */
export function filterBuffer(
  input: Buffer | string,
  prefixes: Iterable<string>,
  options: FilterOptions = {}
): { output: Buffer; summary: FilterSummary } {
  const filter = new BookmarkFilter(prefixes, options);
  const bytes = typeof input === 'string' ? Buffer.from(input, 'utf8') : input;
  const out = [...filter.write(bytes), ...filter.end()];
  return { output: Buffer.concat(out), summary: filter.summary };
}
