/**
 * Pull-based tokenizer for the query language.
 *
 * Most of a statement is ordinary tokens. Series names are not: `cpu.*`,
 * `.*` and `:series_name.percentiles.95` are read raw through readName(),
 * which the parser calls wherever a series reference is expected.
 */

import { QuerySyntaxError } from '../core/errors.ts';

export type Token =
  | { type: 'number'; value: number; pos: number }
  | { type: 'duration'; ms: number; pos: number }
  | { type: 'string'; value: string; pos: number }
  | { type: 'ident'; value: string; pos: number }
  | { type: 'op'; value: string; pos: number }
  | { type: 'eof'; pos: number };

const DURATION_MS: Record<string, number> = {
  u: 0.001,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
};

const DURATION_RE = /^(\d+(?:\.\d+)?)(ms|u|s|m|h|d|w)(?![A-Za-z0-9_])/;
const NUMBER_RE = /^\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/;
const IDENT_RE = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z0-9_]+)*/;
const OPERATORS = ['=~', '!~', '!=', '<>', '<=', '>=', '=', '<', '>', '+', '-', '*', '/', '(', ')', ','];
const NAME_STOP = /[\s,()]/;

export class Scanner {
  private pos = 0;
  private lookahead: { token: Token; end: number } | undefined;

  constructor(readonly text: string) {}

  save(): number {
    return this.pos;
  }

  restore(pos: number): void {
    this.pos = pos;
    this.lookahead = undefined;
  }

  peek(): Token {
    return this.lookaheadEntry().token;
  }

  next(): Token {
    const { token, end } = this.lookaheadEntry();
    this.lookahead = undefined;
    this.pos = end;
    return token;
  }

  private lookaheadEntry(): { token: Token; end: number } {
    if (!this.lookahead) {
      const start = this.pos;
      const token = this.scan();
      this.lookahead = { token, end: this.pos };
      this.pos = start;
    }
    return this.lookahead;
  }

  /** Consume `ch` if it is the next non-space character (never the start of `=~`). */
  acceptChar(ch: string): boolean {
    this.lookahead = undefined;
    this.skipSpace();
    if (this.text[this.pos] !== ch) return false;
    if (ch === '=' && this.text[this.pos + 1] === '~') return false;
    this.pos++;
    return true;
  }

  /** Read a raw series reference: `/regex/flags` or a run of non-separator characters. */
  readName(): { text: string; pos: number } {
    this.lookahead = undefined;
    this.skipSpace();
    const start = this.pos;
    if (this.text[this.pos] === '/') {
      this.readRegexSource();
      return { text: this.text.slice(start, this.pos), pos: start };
    }
    while (this.pos < this.text.length && !NAME_STOP.test(this.text[this.pos]!)) this.pos++;
    if (this.pos === start) throw new QuerySyntaxError('Expected a series name', start);
    return { text: this.text.slice(start, this.pos), pos: start };
  }

  /** Read a `/regex/flags` literal. */
  readRegex(): RegExp {
    this.lookahead = undefined;
    this.skipSpace();
    const start = this.pos;
    if (this.text[this.pos] !== '/') throw new QuerySyntaxError('Expected a /regex/', start);
    const { source, flags } = this.readRegexSource();
    try {
      return new RegExp(source, flags.replace('g', ''));
    } catch {
      throw new QuerySyntaxError(`Invalid regex /${source}/`, start);
    }
  }

  private readRegexSource(): { source: string; flags: string } {
    const start = this.pos;
    this.pos++; // opening slash
    let source = '';
    while (this.pos < this.text.length && this.text[this.pos] !== '/') {
      if (this.text[this.pos] === '\\' && this.pos + 1 < this.text.length) {
        source += this.text.slice(this.pos, this.pos + 2);
        this.pos += 2;
        continue;
      }
      source += this.text[this.pos];
      this.pos++;
    }
    if (this.pos >= this.text.length) throw new QuerySyntaxError('Unterminated regex', start);
    this.pos++; // closing slash
    const flags = /^[gimsuy]*/.exec(this.text.slice(this.pos))?.[0] ?? '';
    this.pos += flags.length;
    return { source, flags };
  }

  private skipSpace(): void {
    while (this.pos < this.text.length && /\s/.test(this.text[this.pos]!)) this.pos++;
  }

  private scan(): Token {
    this.skipSpace();
    const pos = this.pos;
    if (pos >= this.text.length) return { type: 'eof', pos };

    const rest = this.text.slice(pos);
    const ch = rest[0]!;

    const duration = DURATION_RE.exec(rest);
    if (duration) {
      this.pos += duration[0].length;
      const unit = DURATION_MS[duration[2] ?? ''] ?? 1;
      return { type: 'duration', ms: Number(duration[1]) * unit, pos };
    }

    const number = NUMBER_RE.exec(rest);
    if (number) {
      this.pos += number[0].length;
      return { type: 'number', value: Number(number[0]), pos };
    }

    const ident = IDENT_RE.exec(rest);
    if (ident) {
      this.pos += ident[0].length;
      return { type: 'ident', value: ident[0], pos };
    }

    if (ch === '\'' || ch === '"') return this.scanString(ch, pos);

    for (const op of OPERATORS) {
      if (rest.startsWith(op)) {
        this.pos += op.length;
        return { type: 'op', value: op === '<>' ? '!=' : op, pos };
      }
    }

    throw new QuerySyntaxError(`Unexpected character '${ch}'`, pos);
  }

  private scanString(quote: string, pos: number): Token {
    let i = pos + 1;
    let value = '';
    while (i < this.text.length && this.text[i] !== quote) {
      if (this.text[i] === '\\' && i + 1 < this.text.length) {
        value += this.text[i + 1];
        i += 2;
        continue;
      }
      value += this.text[i];
      i++;
    }
    if (i >= this.text.length) throw new QuerySyntaxError('Unterminated string', pos);
    this.pos = i + 1;
    return { type: 'string', value, pos };
  }
}
