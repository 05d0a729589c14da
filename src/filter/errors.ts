/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export type FilterErrorCode =
  | 'MissingOrAmbiguousHref'
  | 'UnrecognizedScheme'
  | 'MalformedXml'
  | 'StructuralAssumptionViolated'
  | 'InvalidOutput';

/**
 * Base class of every failure that aborts a filter run.
 */
export class FilterError extends Error {
  readonly code: FilterErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: FilterErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = 'FilterError';
    this.code = code;
    this.context = context;
  }
}

export class MissingOrAmbiguousHrefError extends FilterError {
  readonly count: number;

  constructor(count: number) {
    super(`bookmark must carry exactly one href attribute, found ${count}`, 'MissingOrAmbiguousHref', { count });
    this.name = 'MissingOrAmbiguousHrefError';
    this.count = count;
  }
}

export class UnrecognizedSchemeError extends FilterError {
  readonly href: string;

  constructor(href: string) {
    super(`href not recognized: ${href}`, 'UnrecognizedScheme', { href });
    this.name = 'UnrecognizedSchemeError';
    this.href = href;
  }
}

export class MalformedXmlError extends FilterError {
  readonly line: number;
  readonly column: number;

  constructor(message: string, line: number, column: number) {
    super(`${message} (line ${line}, column ${column})`, 'MalformedXml', { line, column });
    this.name = 'MalformedXmlError';
    this.line = line;
    this.column = column;
  }
}

export class StructuralAssumptionViolatedError extends FilterError {
  readonly text: string;

  constructor(text: string) {
    super(`expected whitespace after removed bookmark, found ${JSON.stringify(text)}`, 'StructuralAssumptionViolated', {
      text,
    });
    this.name = 'StructuralAssumptionViolatedError';
    this.text = text;
  }
}

/** Raised when the rewritten manifest does not pass the well-formedness check. */
export class InvalidOutputError extends FilterError {
  constructor(detail: string, line: number, column: number) {
    super(`filtered output is not well-formed: ${detail} (line ${line}, column ${column})`, 'InvalidOutput', {
      line,
      column,
    });
    this.name = 'InvalidOutputError';
  }
}

export function isFilterError(value: unknown): value is FilterError {
  return value instanceof FilterError;
}
