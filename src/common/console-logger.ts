/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import type { Logger, LogLevel } from './logger';

const SEVERITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

type Sink = (...data: unknown[]) => void;

export class ConsoleLogger implements Logger {
  private context: string | undefined;
  readonly level: LogLevel;

  /**
   * @param level messages below this severity are dropped
   */
  constructor(level: LogLevel = 'info') {
    this.context = undefined;
    this.level = level;
  }

  clone(): ConsoleLogger {
    return new ConsoleLogger(this.level);
  }

  setContext(context: string | undefined): void {
    this.context = context;
  }

  trace(message: string, ...attributes: unknown[]): void {
    this.log('trace', console.trace, message, attributes);
  }

  debug(message: string, ...attributes: unknown[]): void {
    this.log('debug', console.debug, message, attributes);
  }

  info(message: string, ...attributes: unknown[]): void {
    this.log('info', console.info, message, attributes);
  }

  warn(message: string, ...attributes: unknown[]): void {
    this.log('warn', console.warn, message, attributes);
  }

  error(message: string, ...attributes: unknown[]): void {
    this.log('error', console.error, message, attributes);
  }

  private log(level: LogLevel, sink: Sink, message: string, attributes: unknown[]): void {
    if (SEVERITY[level] < SEVERITY[this.level]) return;
    if (this.context) sink(`[${this.context}]`, message, ...attributes);
    else sink(message, ...attributes);
  }
}
