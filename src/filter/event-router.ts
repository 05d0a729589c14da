/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as he from 'he';
import type { Logger } from '../common/logger';
import { StructuralAssumptionViolatedError } from './errors';
import type { PathPrefixSet } from './path-prefix-set';
import type { Attribute, FilterState, FilterSummary, ParseEvent } from './types';
import { classifyHref, decodeHref, hrefAttribute } from './uri-classifier';

export const BOOKMARK = 'bookmark';

/**
 * True when the text is whitespace only once entities are resolved.
 */
export function isWhitespaceText(raw: Buffer): boolean {
  return /^\s*$/u.test(he.decode(raw.toString('utf8')));
}

/**
 * State machine deciding per ParseEvent whether its bytes are forwarded.
 *
 * Only `<bookmark>` start tags are classified; empty tags pass unchanged.
 * While skipping, everything up to the next `</bookmark>` is dropped; bookmarks
 * are assumed not to nest. After a removal the next text event is swallowed and
 * must be whitespace.
 */
export class EventRouter {
  private state: FilterState = { skipping: false, pendingWhitespaceSwallow: false };
  private kept = 0;
  private removed = 0;

  constructor(
    private readonly prefixes: PathPrefixSet,
    private readonly logger: Logger
  ) {}

  get summary(): FilterSummary {
    return { kept: this.kept, removed: this.removed };
  }

  /**
   * Route one event. Returns the bytes to forward, or undefined when the
   * event is suppressed.
   */
  route(event: ParseEvent): Buffer | undefined {
    if (this.state.skipping) {
      if (event.kind === 'end' && event.name === BOOKMARK) {
        this.state = { skipping: false, pendingWhitespaceSwallow: true };
      }
      return undefined;
    }

    switch (event.kind) {
      case 'start':
        if (event.name === BOOKMARK && this.shouldRemove(event.attributes)) {
          this.state = { ...this.state, skipping: true };
          return undefined;
        }
        if (event.name === BOOKMARK) this.kept++;
        return event.raw;

      case 'text':
        if (this.state.pendingWhitespaceSwallow) {
          this.state = { ...this.state, pendingWhitespaceSwallow: false };
          if (!isWhitespaceText(event.raw)) {
            throw new StructuralAssumptionViolatedError(event.raw.toString('utf8'));
          }
          return undefined;
        }
        return event.raw;

      case 'empty':
      case 'end':
      case 'declaration':
      case 'markup':
      case 'bom':
        return event.raw;

      case 'eof':
        return undefined;
    }
  }

  private shouldRemove(attributes: readonly Attribute[]): boolean {
    const { href, lossy } = decodeHref(hrefAttribute(attributes));
    if (lossy) this.logger.warn('href contains invalid UTF-8, decoded lossily:', href);

    const uri = classifyHref(href);
    if (uri.kind !== 'local') return false;

    const prefix = this.prefixes.match(uri.path);
    if (prefix === undefined) return false;

    this.removed++;
    this.logger.debug(`removing bookmark ${uri.path} (prefix ${prefix})`);
    return true;
  }
}
