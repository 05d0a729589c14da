/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

/**
 * Ordered, immutable set of path prefixes.
 * Matching is plain string prefixing, not path-segment aware:
 * '/home/a' matches '/home/abc/file.txt' as well.
 */
export class PathPrefixSet {
  private readonly prefixes: readonly string[];

  constructor(prefixes: Iterable<string>) {
    this.prefixes = Object.freeze([...prefixes]);
  }

  get size(): number {
    return this.prefixes.length;
  }

  values(): readonly string[] {
    return this.prefixes;
  }

  /** First prefix the path starts with, or undefined. */
  match(path: string): string | undefined {
    return this.prefixes.find((prefix) => path.startsWith(prefix));
  }
}
