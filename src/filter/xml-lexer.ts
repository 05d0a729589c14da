/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Incremental lexer turning raw manifest bytes into ParseEvents.
  sax does the tokenizing; input is fed as latin1 so that sax positions are
  byte offsets and every event can carry the exact bytes it was parsed from.
*/

import * as sax from 'sax';
import { MalformedXmlError } from './errors';
import type { Attribute, ParseEvent } from './types';

const UTF8_BOM = Buffer.from([0xef, 0xbb, 0xbf]);

const EMPTY_COMMENT = '<!---->';

const TAG_NAME = /^<\s*[^\s/>]+/;
const ATTRIBUTE = /([^\s=/>]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

interface Token {
  kind: 'start' | 'end' | 'empty' | 'declaration' | 'markup';
  name: string;
  /** Absolute byte offsets, end exclusive. */
  start: number;
  end: number;
}

/**
 * Read the attributes of a raw start tag in source order, duplicates included.
 * sax has validated the tag already, so quoting is known to be balanced.
 */
export function readAttributes(rawTag: string): Attribute[] {
  const nameMatch = TAG_NAME.exec(rawTag);
  const body = nameMatch ? rawTag.slice(nameMatch[0].length) : rawTag;
  const attributes: Attribute[] = [];
  for (const m of body.matchAll(ATTRIBUTE)) {
    attributes.push({ key: m[1], value: Buffer.from(m[2] ?? m[3] ?? '', 'latin1') });
  }
  return attributes;
}

export class XmlLexer {
  private readonly parser: sax.SAXParser;
  private readonly tokens: Token[] = [];
  private failure: MalformedXmlError | undefined;

  /** Unconsumed input (latin1 view) starting at absolute offset `pendingStart`. */
  private pending = '';
  private pendingStart = 0;
  /** Absolute offset up to which events have been released. */
  private cursor = 0;
  private received = 0;
  /** Bytes consumed before sax saw anything (byte order mark). */
  private offset = 0;

  private head: Buffer | undefined = Buffer.alloc(0);
  private selfClosing = false;
  private ended = false;

  constructor() {
    this.parser = sax.parser(true, { position: true });

    this.parser.onerror = (err: Error) => {
      if (this.failure) return;
      const message = err.message.split('\n')[0] ?? err.message;
      this.failure = new MalformedXmlError(message, this.parser.line + 1, this.parser.column);
    };

    this.parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => {
      this.selfClosing = tag.isSelfClosing;
      this.pushToken(tag.isSelfClosing ? 'empty' : 'start', tag.name, this.parser.position);
    };

    this.parser.onclosetag = (name: string) => {
      if (this.selfClosing) {
        this.selfClosing = false;
        return;
      }
      this.pushToken('end', name, this.parser.position);
    };

    this.parser.onprocessinginstruction = (node: { name: string; body: string }) => {
      this.pushToken(node.name === 'xml' ? 'declaration' : 'markup', node.name, this.parser.position);
    };

    // sax reports a comment on the second dash of '-->', strict mode guarantees the '>' follows
    this.parser.oncomment = () => {
      this.pushToken('markup', '', this.parser.position + 1);
    };

    this.parser.onclosecdata = () => {
      this.pushToken('markup', '', this.parser.position);
    };

    this.parser.ondoctype = () => {
      this.pushToken('markup', '', this.parser.position);
    };
  }

  /**
   * Feed the next chunk of input. Returns the events that are complete so far.
   */
  feed(chunk: Buffer): ParseEvent[] {
    if (this.ended) throw new Error('XmlLexer.feed() called after end()');
    const events: ParseEvent[] = [];

    if (this.head) {
      this.head = Buffer.concat([this.head, chunk]);
      if (this.head.length < UTF8_BOM.length) return events;
      chunk = this.sniff(events);
    }

    this.write(chunk);
    this.release(events);
    return events;
  }

  /**
   * Signal end of input. Returns the remaining events, terminated by `eof`.
   */
  end(): ParseEvent[] {
    if (this.ended) throw new Error('XmlLexer.end() called twice');
    this.ended = true;
    const events: ParseEvent[] = [];

    if (this.head) this.write(this.sniff(events));

    this.parser.close();
    this.raiseFailure();

    this.release(events);
    if (this.received > this.cursor) {
      this.pushGap(events, this.cursor, this.received);
      this.cursor = this.received;
    }
    events.push({ kind: 'eof' });
    return events;
  }

  private sniff(events: ParseEvent[]): Buffer {
    const head = this.head ?? Buffer.alloc(0);
    this.head = undefined;
    if (head.subarray(0, UTF8_BOM.length).equals(UTF8_BOM)) {
      events.push({ kind: 'bom', raw: Buffer.from(UTF8_BOM) });
      this.offset = UTF8_BOM.length;
      this.pendingStart = this.cursor = this.received = UTF8_BOM.length;
      return head.subarray(UTF8_BOM.length);
    }
    return head;
  }

  private write(chunk: Buffer): void {
    if (chunk.length === 0) return;
    const text = chunk.toString('latin1');
    this.pending += text;
    this.received += chunk.length;
    this.parser.write(text);
    this.raiseFailure();
  }

  private raiseFailure(): void {
    if (this.failure) throw this.failure;
  }

  private pushToken(kind: Token['kind'], name: string, position: number): void {
    this.tokens.push({
      kind,
      name,
      start: this.offset + this.parser.startTagPosition - 1,
      end: this.offset + position,
    });
  }

  /** Turn every fully received token into events, with the text gap before it. */
  private release(events: ParseEvent[]): void {
    for (;;) {
      const token = this.tokens[0];
      if (!token || token.end > this.received) break;
      this.tokens.shift();

      if (token.start > this.cursor) this.pushGap(events, this.cursor, token.start);
      events.push(this.toEvent(token));
      this.cursor = token.end;
    }

    this.pending = this.pending.slice(this.cursor - this.pendingStart);
    this.pendingStart = this.cursor;
  }

  /** Text between tokens. sax reports no comment without a body, so those are split out here. */
  private pushGap(events: ParseEvent[], start: number, end: number): void {
    const gap = this.pending.slice(start - this.pendingStart, end - this.pendingStart);
    let last = 0;
    for (let at = gap.indexOf(EMPTY_COMMENT); at >= 0; at = gap.indexOf(EMPTY_COMMENT, last)) {
      if (at > last) events.push({ kind: 'text', raw: this.slice(start + last, start + at) });
      last = at + EMPTY_COMMENT.length;
      events.push({ kind: 'markup', raw: this.slice(start + at, start + last) });
    }
    if (start + last < end) events.push({ kind: 'text', raw: this.slice(start + last, end) });
  }

  private toEvent(token: Token): ParseEvent {
    const raw = this.slice(token.start, token.end);
    switch (token.kind) {
      case 'start':
      case 'empty':
        return { kind: token.kind, name: token.name, attributes: readAttributes(raw.toString('latin1')), raw };
      case 'end':
        return { kind: 'end', name: token.name, raw };
      case 'declaration':
        return { kind: 'declaration', raw };
      case 'markup':
        return { kind: 'markup', raw };
    }
  }

  private slice(start: number, end: number): Buffer {
    return Buffer.from(this.pending.slice(start - this.pendingStart, end - this.pendingStart), 'latin1');
  }
}
