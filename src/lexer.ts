/**
 * GedcomLexer - turns one decoded line into a token
 *
 * Grammar: `level DELIM [xref DELIM] tag [DELIM value]`
 */

import { ParseErrorCode } from './errors';
import { XrefInterner } from './interner';
import { SourceFragment } from './source';
import { GedcomToken, LineValueKind, TokenizerFlags } from './types';

export type LexResult =
  | { kind: 'token'; token: GedcomToken }
  | { kind: 'skip' }
  | { kind: 'error'; code: ParseErrorCode; offset: number };

const SPACE = 0x20;
const TAB = 0x09;
const LINE_TAB = 0x0b;
const INFORMATION_SEPARATOR_ONE = 0x1f;

export class GedcomLexer {
  static readonly MAX_LEVEL_DIGITS = 2;
  static readonly MAX_XREF_LENGTH = 22;
  private static readonly POINTER_REGEX = /^@[^@#\s][^@\s]*@$/;

  /** Misspellings written by known producers. */
  static readonly TAG_MAP: Readonly<Record<string, string>> = {
    _AKA: 'AKA',
    _DEG: 'GRAD',
    _EMAIL: 'EMAIL',
    EMAL: 'EMAIL',
    _URL: 'WWW',
    URL: 'WWW',
  };

  private readonly flags: TokenizerFlags;
  private readonly interner: XrefInterner;
  private previous?: GedcomToken | undefined;

  constructor(flags: TokenizerFlags, interner: XrefInterner) {
    this.flags = flags;
    this.interner = interner;
  }

  tokenize(fragment: SourceFragment): LexResult {
    const text = fragment.text;
    let pos = 0;
    while (pos < text.length && isWhitespace(text.charCodeAt(pos))) {
      pos += 1;
    }
    if (pos === text.length) {
      return { kind: 'skip' };
    }

    if (!isDigit(text.charCodeAt(pos))) {
      return this.continuation(fragment, pos);
    }

    const levelStart = pos;
    while (pos < text.length && isDigit(text.charCodeAt(pos))) {
      pos += 1;
    }
    const digits = pos - levelStart;
    if (digits > GedcomLexer.MAX_LEVEL_DIGITS || (digits > 1 && text[levelStart] === '0')) {
      return fail('level_invalid', levelStart);
    }
    const level = Number(text.slice(levelStart, pos));
    if (!this.isDelimiter(text.charCodeAt(pos))) {
      return fail('level_missing_delim', pos);
    }
    pos = this.skipDelimiters(text, pos);

    let xrefId: string | undefined;
    if (text[pos] === '@') {
      const close = text.indexOf('@', pos + 1);
      if (close < 0) {
        return fail('xref_missing_delim', pos);
      }
      const end = close + 1;
      if (end - pos > GedcomLexer.MAX_XREF_LENGTH && !this.flags.allowLongXrefs) {
        return fail('xref_too_long', pos);
      }
      if (!this.isDelimiter(text.charCodeAt(end))) {
        return fail('xref_missing_delim', end);
      }
      xrefId = this.interner.intern(text, pos, end);
      pos = this.skipDelimiters(text, end);
    }

    const tagStart = pos;
    if (text[pos] === '_') {
      pos += 1;
    }
    while (pos < text.length && this.isTagChar(text.charCodeAt(pos))) {
      pos += 1;
    }
    if (pos === tagStart || text.slice(tagStart, pos) === '_') {
      return fail('tag_expected', tagStart);
    }
    const rawTag = text.slice(tagStart, pos);
    const tag = GedcomLexer.TAG_MAP[rawTag] ?? rawTag;

    if (pos === text.length) {
      if (!fragment.terminated && !this.flags.ignoreMissingTerms) {
        return fail('tag_missing_delim_or_term', pos);
      }
      return this.emit({ level, xrefId, tag, value: '', valueKind: 'none', fragment });
    }
    if (!this.isDelimiter(text.charCodeAt(pos))) {
      return fail('tag_missing_delim_or_term', pos);
    }
    // Leading blanks are content for continuation lines.
    if (this.flags.ignoreInvalidDelim && tag !== 'CONC' && tag !== 'CONT') {
      pos = this.skipDelimiters(text, pos);
    } else {
      pos += 1;
    }

    if (pos === text.length) {
      if (!this.flags.ignoreInvalidDelim) {
        return fail('value_expected', pos);
      }
      return this.emit({ level, xrefId, tag, value: '', valueKind: 'none', fragment });
    }

    const rawValue = text.slice(pos);
    let value = rawValue;
    let valueKind: LineValueKind = 'data';
    if (GedcomLexer.POINTER_REGEX.test(rawValue)) {
      value = this.interner.intern(text, pos, text.length);
      valueKind = 'pointer';
    } else {
      const invalid = this.findInvalidValueChar(rawValue);
      if (invalid >= 0) {
        return fail('value_invalid', pos + invalid);
      }
    }
    if (!fragment.terminated && !this.flags.ignoreMissingTerms) {
      return fail('value_missing_term', text.length);
    }
    return this.emit({ level, xrefId, tag, value, valueKind, fragment });
  }

  /** Raw text without a level continues the value of the line before it. */
  private continuation(fragment: SourceFragment, offset: number): LexResult {
    const previous = this.previous;
    if (!this.flags.applyConcContOnNewLineHack || !previous) {
      return fail('level_expected', offset);
    }
    const sameLevel = previous.tag === 'CONT' || previous.tag === 'CONC';
    const invalid = this.findInvalidValueChar(fragment.text);
    if (invalid >= 0) {
      return fail('value_invalid', invalid);
    }
    return this.emit({
      level: sameLevel ? previous.level : previous.level + 1,
      tag: 'CONT',
      value: fragment.text,
      valueKind: 'data',
      fragment,
    });
  }

  private emit(token: GedcomToken): LexResult {
    this.previous = token;
    return { kind: 'token', token };
  }

  private isDelimiter(code: number): boolean {
    return code === SPACE || (code === INFORMATION_SEPARATOR_ONE && this.flags.allowInformationSeparatorOne);
  }

  /** Position after the delimiter at `pos`, and after any repeats when lenient. */
  private skipDelimiters(text: string, pos: number): number {
    let next = pos + 1;
    if (this.flags.ignoreInvalidDelim) {
      while (next < text.length && this.isDelimiter(text.charCodeAt(next))) {
        next += 1;
      }
    }
    return next;
  }

  private isTagChar(code: number): boolean {
    if (isDigit(code) || (code >= 0x41 && code <= 0x5a) || (code >= 0x61 && code <= 0x7a)) {
      return true;
    }
    return this.flags.allowHyphenOrUnderscoreInTag && (code === 0x5f || code === 0x2d);
  }

  private findInvalidValueChar(value: string): number {
    for (let i = 0; i < value.length; i += 1) {
      const code = value.charCodeAt(i);
      if (code >= SPACE && code !== 0x7f) {
        continue;
      }
      if (code === TAB && this.flags.allowTabs) {
        continue;
      }
      if (code === LINE_TAB && this.flags.allowLineTabs) {
        continue;
      }
      if (code === INFORMATION_SEPARATOR_ONE && this.flags.allowInformationSeparatorOne) {
        continue;
      }
      return i;
    }
    return -1;
  }
}

function fail(code: ParseErrorCode, offset: number): LexResult {
  return { kind: 'error', code, offset };
}

function isDigit(code: number): boolean {
  return code >= 0x30 && code <= 0x39;
}

function isWhitespace(code: number): boolean {
  return code === SPACE || code === TAB;
}
