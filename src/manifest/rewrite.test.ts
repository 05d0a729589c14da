/*
  @author Sven Wisotzky
  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConsoleLogger } from '../common/console-logger';
import { InvalidOutputError, UnrecognizedSchemeError } from '../filter/errors';
import { checkWellFormed, rewriteManifest, timestampedPath } from './rewrite';

const doc = (...hrefs: string[]) =>
  '<?xml version="1.0" encoding="UTF-8"?>\n<xbel version="1.0">\n' +
  hrefs.map((href) => `  <bookmark href="${href}">\n    <info/>\n  </bookmark>\n`).join('') +
  '</xbel>\n';

const logger = new ConsoleLogger('silent');
const NOW = new Date('2026-10-19T09:48:00.000Z');

describe('timestampedPath', () => {
  it('appends the timestamp without colons', () => {
    expect(timestampedPath('/data/recently-used.xbel', NOW)).toBe('/data/recently-used.xbel-2026-10-19T094800.000Z');
  });
});

describe('checkWellFormed', () => {
  it('accepts a well-formed document', () => {
    expect(() => checkWellFormed(doc('file:///a'))).not.toThrow();
  });
  it('rejects a broken one', () => {
    expect(() => checkWellFormed('<xbel><bookmark></xbel>')).toThrow(InvalidOutputError);
  });
});

describe('rewriteManifest', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'recently-used-'));
    file = path.join(dir, 'recently-used.xbel');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('replaces the manifest with the filtered document', async () => {
    fs.writeFileSync(file, doc('file:///home/a/x', 'file:///home/me/y'));
    const result = await rewriteManifest(file, ['/home/a'], { logger, now: NOW });
    expect(result).toEqual({ summary: { kept: 1, removed: 1 }, replaced: true });
    expect(fs.readFileSync(file, 'utf8')).toBe(doc('file:///home/me/y'));
    expect(fs.readdirSync(dir)).toEqual(['recently-used.xbel']);
  });

  it('leaves the manifest untouched when filtering fails', async () => {
    const original = doc('file:///home/a/x', 'http://example.com/');
    fs.writeFileSync(file, original);
    await expect(rewriteManifest(file, ['/home/a'], { logger, now: NOW })).rejects.toBeInstanceOf(
      UnrecognizedSchemeError
    );
    expect(fs.readFileSync(file, 'utf8')).toBe(original);
    expect(fs.readdirSync(dir)).toEqual(['recently-used.xbel']);
  });

  it('only reports on a dry run', async () => {
    const original = doc('file:///home/a/x', 'file:///home/me/y');
    fs.writeFileSync(file, original);
    const result = await rewriteManifest(file, ['/home/a'], { logger, dryRun: true });
    expect(result).toEqual({ summary: { kept: 1, removed: 1 }, replaced: false });
    expect(fs.readFileSync(file, 'utf8')).toBe(original);
    expect(fs.readdirSync(dir)).toEqual(['recently-used.xbel']);
  });

  it('never overwrites an existing file with the temporary name', async () => {
    const original = doc('file:///home/a/x');
    fs.writeFileSync(file, original);
    const temp = timestampedPath(file, NOW);
    fs.writeFileSync(temp, 'keep me');
    await expect(rewriteManifest(file, ['/home/a'], { logger, now: NOW })).rejects.toMatchObject({ code: 'EEXIST' });
    expect(fs.readFileSync(temp, 'utf8')).toBe('keep me');
    expect(fs.readFileSync(file, 'utf8')).toBe(original);
  });

  it('fails when the manifest does not exist', async () => {
    await expect(rewriteManifest(file, ['/home/a'], { logger, now: NOW })).rejects.toMatchObject({ code: 'ENOENT' });
    expect(fs.readdirSync(dir)).toEqual([]);
  });
});
