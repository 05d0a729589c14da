/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { MissingOrAmbiguousHrefError, UnrecognizedSchemeError } from './errors';
import type { Attribute, UriClass } from './types';

const LOCAL_SCHEME = 'file://';

/** Schemes that never address a local path; bookmarks using them are always kept. */
export const NON_LOCAL_SCHEMES: readonly string[] = ['trash://', 'mtp://', 'ftp://', 'sftp://'];

export interface DecodedHref {
  href: string;
  /** Invalid UTF-8 was replaced by U+FFFD while decoding. */
  lossy: boolean;
}

/**
 * Value of the single `href` attribute.
 * Throws MissingOrAmbiguousHrefError when there is none or more than one.
 */
export function hrefAttribute(attributes: readonly Attribute[]): Buffer {
  const values = attributes.filter((a) => a.key === 'href').map((a) => a.value);
  if (values.length !== 1) throw new MissingOrAmbiguousHrefError(values.length);
  return values[0];
}

function hexValue(byte: number): number {
  if (byte >= 0x30 && byte <= 0x39) return byte - 0x30;
  if (byte >= 0x41 && byte <= 0x46) return byte - 0x41 + 10;
  if (byte >= 0x61 && byte <= 0x66) return byte - 0x61 + 10;
  return -1;
}

/**
 * Replace `%XY` triplets by the byte they encode.
 * A `%` not followed by two hex digits is kept literally.
 */
export function percentDecode(bytes: Buffer): Buffer {
  const out = Buffer.alloc(bytes.length);
  let n = 0;
  for (let i = 0; i < bytes.length; i++) {
    const byte = bytes[i];
    if (byte === 0x25 && i + 2 < bytes.length) {
      const hi = hexValue(bytes[i + 1]);
      const lo = hexValue(bytes[i + 2]);
      if (hi >= 0 && lo >= 0) {
        out[n++] = hi * 16 + lo;
        i += 2;
        continue;
      }
    }
    out[n++] = byte;
  }
  return out.subarray(0, n);
}

/**
 * Turn raw href bytes into text: percent-decode, then decode as UTF-8
 * substituting U+FFFD for invalid sequences. Character references are left
 * as written.
 */
export function decodeHref(raw: Buffer): DecodedHref {
  const bytes = percentDecode(raw);
  const href = bytes.toString('utf8');
  return { href, lossy: !Buffer.from(href, 'utf8').equals(bytes) };
}

export function classifyHref(href: string): UriClass {
  if (href.startsWith(LOCAL_SCHEME)) return { kind: 'local', path: href.slice(LOCAL_SCHEME.length) };
  const scheme = NON_LOCAL_SCHEMES.find((s) => href.startsWith(s));
  if (scheme) return { kind: 'non-local', scheme };
  throw new UnrecognizedSchemeError(href);
}
