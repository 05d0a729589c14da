/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Lexical units produced by the xml lexer and consumed by the event router.
  All payloads are raw input bytes; nothing is re-serialized.
*/

/** Attribute as written in the start tag, value still entity-escaped. */
export interface Attribute {
  key: string;
  value: Buffer;
}

export type ParseEvent =
  | { kind: 'start'; name: string; attributes: Attribute[]; raw: Buffer }
  | { kind: 'end'; name: string; raw: Buffer }
  | { kind: 'empty'; name: string; attributes: Attribute[]; raw: Buffer }
  | { kind: 'text'; raw: Buffer }
  | { kind: 'declaration'; raw: Buffer }
  /** Comments, CDATA sections, processing instructions, doctype. */
  | { kind: 'markup'; raw: Buffer }
  /** Leading UTF-8 byte order mark. */
  | { kind: 'bom'; raw: Buffer }
  | { kind: 'eof' };

export interface FilterState {
  skipping: boolean;
  pendingWhitespaceSwallow: boolean;
}

/**
 * Result of classifying a bookmark href.
 */
export type UriClass =
  | { kind: 'local'; path: string }
  | { kind: 'non-local'; scheme: string };

export interface FilterSummary {
  /** Bookmarks forwarded to the output. */
  kept: number;
  /** Bookmarks removed together with their subtree. */
  removed: number;
}
