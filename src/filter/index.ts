/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { BookmarkFilter, BookmarkFilterStream, filterBookmarks, filterBuffer } from './bookmark-filter';
export { EventRouter, isWhitespaceText, BOOKMARK } from './event-router';
export { PathPrefixSet } from './path-prefix-set';
export { XmlLexer, readAttributes } from './xml-lexer';
export {
  NON_LOCAL_SCHEMES,
  classifyHref,
  decodeHref,
  hrefAttribute,
  percentDecode,
} from './uri-classifier';
export {
  FilterError,
  MissingOrAmbiguousHrefError,
  UnrecognizedSchemeError,
  MalformedXmlError,
  StructuralAssumptionViolatedError,
  InvalidOutputError,
  isFilterError,
} from './errors';
export type { FilterOptions } from './bookmark-filter';
export type { DecodedHref } from './uri-classifier';
export type { FilterErrorCode } from './errors';
export type { Attribute, FilterState, FilterSummary, ParseEvent, UriClass } from './types';
export type { Logger, LogLevel } from '../common/logger';
export { ConsoleLogger } from '../common/console-logger';
