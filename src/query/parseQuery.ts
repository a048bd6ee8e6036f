/**
 * Recursive-descent parser: query text → Statement.
 *
 *   select <field>[, ...] from[=]<source> <clause>*
 *   delete from <source> [where <condition>]
 *   list series [<pattern>]
 *
 * Clauses (any order): where, group_by / group by, limit[=], order, into[=].
 */

import type {
  ArithOp,
  CompareOp,
  Condition,
  Expr,
  GroupBy,
  JoinSide,
  Order,
  SelectField,
  SelectQuery,
  Source,
  Statement,
} from '../types/query.ts';
import type { NamePattern } from '../types/matcher.ts';
import { QuerySyntaxError } from '../core/errors.ts';
import { parseNamePattern } from '../transform/SeriesMatcher.ts';
import { Scanner } from './Scanner.ts';
import type { Token } from './Scanner.ts';

const COMPARE_OPS: readonly CompareOp[] = ['=', '!=', '<', '<=', '>', '>=', '=~', '!~'];
const CLAUSE_KEYWORDS = new Set(['where', 'group_by', 'group', 'limit', 'order', 'into']);

export function parseQuery(text: string): Statement {
  const parser = new Parser(text);
  const stmt = parser.statement();
  parser.expectEof();
  return stmt;
}

/** Parse a select statement, rejecting other statement kinds. */
export function parseSelect(text: string): SelectQuery {
  const stmt = parseQuery(text);
  if (stmt.type !== 'select') throw new QuerySyntaxError('Expected a select statement', 0);
  return stmt;
}

class Parser {
  private readonly scanner: Scanner;

  constructor(private readonly text: string) {
    this.scanner = new Scanner(text);
  }

  // ─── Statements ───────────────────────────────────────────────────────────

  statement(): Statement {
    const tok = this.scanner.next();
    const keyword = tok.type === 'ident' ? tok.value.toLowerCase() : '';
    switch (keyword) {
      case 'select': return this.select();
      case 'delete': return this.delete();
      case 'list': return this.list();
      default: throw this.unexpected(tok, 'select, delete or list');
    }
  }

  expectEof(): void {
    const tok = this.scanner.peek();
    if (tok.type !== 'eof') throw this.unexpected(tok, 'end of query');
  }

  private select(): SelectQuery {
    const fields = this.fields();
    this.expectKeyword('from');
    this.scanner.acceptChar('=');
    const source = this.source();

    const query: SelectQuery = {
      type: 'select',
      text: this.text.trim(),
      fields,
      source,
      where: undefined,
      groupBy: { interval: undefined, dimensions: [] },
      limit: undefined,
      order: 'desc',
      into: undefined,
    };

    for (;;) {
      const tok = this.scanner.peek();
      if (tok.type !== 'ident' || !CLAUSE_KEYWORDS.has(tok.value.toLowerCase())) break;
      this.scanner.next();
      switch (tok.value.toLowerCase()) {
        case 'where':
          if (query.where) throw new QuerySyntaxError('Duplicate where clause', tok.pos);
          query.where = this.condition();
          break;
        case 'group':
          this.expectKeyword('by');
          query.groupBy = this.groupBy();
          break;
        case 'group_by':
          query.groupBy = this.groupBy();
          break;
        case 'limit':
          query.limit = this.limit();
          break;
        case 'order':
          query.order = this.order();
          break;
        case 'into':
          this.scanner.acceptChar('=');
          query.into = this.scanner.readName().text;
          break;
      }
    }
    return query;
  }

  private delete(): Statement {
    this.expectKeyword('from');
    const name = this.scanner.readName();
    let where: Condition | undefined;
    if (this.peekKeyword('where')) {
      this.scanner.next();
      where = this.condition();
    }
    return { type: 'delete', text: this.text.trim(), pattern: this.namePattern(name.text, name.pos), where };
  }

  private list(): Statement {
    this.expectKeyword('series');
    let pattern: NamePattern | undefined;
    if (this.scanner.peek().type !== 'eof') {
      const name = this.scanner.readName();
      pattern = this.namePattern(name.text, name.pos);
    }
    return { type: 'list', text: this.text.trim(), pattern };
  }

  // ─── Clauses ──────────────────────────────────────────────────────────────

  private fields(): SelectField[] {
    const fields: SelectField[] = [];
    do {
      const expr = this.expr();
      let alias: string | undefined;
      if (this.peekKeyword('as')) {
        this.scanner.next();
        alias = this.identifier();
      }
      fields.push({ expr, alias });
    } while (this.acceptOp(','));
    return fields;
  }

  private source(): Source {
    const name = this.scanner.readName();
    const fn = name.text.toLowerCase();
    if ((fn === 'merge' || fn === 'inner_join') && this.acceptOp('(')) {
      const args: string[] = [];
      do {
        args.push(this.scanner.readName().text);
      } while (this.acceptOp(','));
      this.expectOp(')');
      return fn === 'merge' ? this.mergeSource(args, name.pos) : this.joinSource(args, name.pos);
    }
    return { kind: 'series', pattern: this.namePattern(name.text, name.pos) };
  }

  private mergeSource(names: string[], pos: number): Source {
    if (names.length < 2) throw new QuerySyntaxError('merge() needs at least two series', pos);
    return { kind: 'merge', names };
  }

  private joinSource(args: string[], pos: number): Source {
    const [leftName, leftAlias, rightName, rightAlias] = args;
    if (args.length !== 4 || !leftName || !leftAlias || !rightName || !rightAlias) {
      throw new QuerySyntaxError('inner_join() takes (series, alias, series, alias)', pos);
    }
    if (leftAlias === rightAlias) throw new QuerySyntaxError('inner_join() aliases must differ', pos);
    const left: JoinSide = { name: leftName, alias: leftAlias };
    const right: JoinSide = { name: rightName, alias: rightAlias };
    return { kind: 'join', left, right };
  }

  private groupBy(): GroupBy {
    const groupBy: GroupBy = { interval: undefined, dimensions: [] };
    do {
      const tok = this.scanner.next();
      if (tok.type !== 'ident') throw this.unexpected(tok, 'a group_by dimension');
      if (tok.value.toLowerCase() === 'time' && this.acceptOp('(')) {
        const dur = this.scanner.next();
        if (dur.type !== 'duration' || dur.ms <= 0) throw this.unexpected(dur, 'a duration such as 1h');
        this.expectOp(')');
        if (groupBy.interval !== undefined) throw new QuerySyntaxError('Duplicate time() grouping', tok.pos);
        groupBy.interval = dur.ms;
      } else {
        groupBy.dimensions.push(tok.value);
      }
    } while (this.acceptOp(','));
    return groupBy;
  }

  private limit(): number {
    this.scanner.acceptChar('=');
    const tok = this.scanner.next();
    if (tok.type !== 'number' || !Number.isInteger(tok.value) || tok.value < 0) {
      throw this.unexpected(tok, 'a non-negative integer limit');
    }
    return tok.value;
  }

  private order(): Order {
    if (this.peekKeyword('by')) {
      this.scanner.next();
      this.expectKeyword('time');
    }
    const tok = this.scanner.next();
    const dir = tok.type === 'ident' ? tok.value.toLowerCase() : '';
    if (dir === 'asc' || dir === 'desc') return dir;
    throw this.unexpected(tok, 'asc or desc');
  }

  // ─── Conditions ───────────────────────────────────────────────────────────

  private condition(): Condition {
    let left = this.conjunction();
    while (this.peekKeyword('or')) {
      this.scanner.next();
      left = { kind: 'or', left, right: this.conjunction() };
    }
    return left;
  }

  private conjunction(): Condition {
    let left = this.conditionAtom();
    while (this.peekKeyword('and')) {
      this.scanner.next();
      left = { kind: 'and', left, right: this.conditionAtom() };
    }
    return left;
  }

  private conditionAtom(): Condition {
    const tok = this.scanner.peek();
    if (tok.type === 'op' && tok.value === '(') {
      // `(a = 1 or b = 2)` and `(value + 1) > 3` both open with a parenthesis
      const parsed = this.attempt(() => {
        this.scanner.next();
        const inner = this.condition();
        this.expectOp(')');
        return inner;
      });
      if (parsed) return parsed;
    }
    return this.comparison();
  }

  private comparison(): Condition {
    const left = this.expr();
    const tok = this.scanner.next();
    const op = tok.type === 'op' ? toCompareOp(tok.value) : undefined;
    if (!op) throw this.unexpected(tok, 'a comparison operator');
    if (op === '=~' || op === '!~') {
      return { kind: 'compare', op, left, right: { kind: 'regex', re: this.scanner.readRegex() } };
    }
    return { kind: 'compare', op, left, right: this.expr() };
  }

  // ─── Expressions ──────────────────────────────────────────────────────────

  private expr(): Expr {
    let left = this.term();
    for (;;) {
      const op = this.acceptArith('+', '-');
      if (!op) return left;
      left = { kind: 'binary', op, left, right: this.term() };
    }
  }

  private term(): Expr {
    let left = this.unary();
    for (;;) {
      const op = this.acceptArith('*', '/');
      if (!op) return left;
      left = { kind: 'binary', op, left, right: this.unary() };
    }
  }

  private unary(): Expr {
    if (this.acceptOp('-')) return { kind: 'negate', operand: this.unary() };
    return this.primary();
  }

  private primary(): Expr {
    const tok = this.scanner.next();
    switch (tok.type) {
      case 'number':
        return { kind: 'number', value: tok.value };
      case 'duration':
        return { kind: 'duration', ms: tok.ms };
      case 'string':
        return { kind: 'string', value: tok.value };
      case 'op':
        if (tok.value === '*') return { kind: 'wildcard' };
        if (tok.value === '(') {
          const inner = this.expr();
          this.expectOp(')');
          return inner;
        }
        throw this.unexpected(tok, 'an expression');
      case 'ident':
        return this.identifierExpr(tok.value);
      case 'eof':
        throw this.unexpected(tok, 'an expression');
    }
  }

  private identifierExpr(name: string): Expr {
    const lower = name.toLowerCase();
    if (this.acceptOp('(')) {
      const args: Expr[] = [];
      if (!this.acceptOp(')')) {
        do {
          args.push(this.expr());
        } while (this.acceptOp(','));
        this.expectOp(')');
      }
      if (lower === 'now') return { kind: 'now' };
      return { kind: 'call', name: lower, args };
    }
    switch (lower) {
      case 'true': return { kind: 'bool', value: true };
      case 'false': return { kind: 'bool', value: false };
      case 'null': return { kind: 'null' };
      case 'forever': return { kind: 'forever' };
      default: return { kind: 'column', name };
    }
  }

  // ─── Helpers ──────────────────────────────────────────────────────────────

  private namePattern(text: string, pos: number): NamePattern {
    try {
      return parseNamePattern(text);
    } catch {
      throw new QuerySyntaxError(`Invalid series pattern '${text}'`, pos);
    }
  }

  private identifier(): string {
    const tok = this.scanner.next();
    if (tok.type === 'ident') return tok.value;
    if (tok.type === 'string') return tok.value;
    throw this.unexpected(tok, 'a name');
  }

  private peekKeyword(word: string): boolean {
    const tok = this.scanner.peek();
    return tok.type === 'ident' && tok.value.toLowerCase() === word;
  }

  private expectKeyword(word: string): void {
    const tok = this.scanner.next();
    if (tok.type !== 'ident' || tok.value.toLowerCase() !== word) throw this.unexpected(tok, `'${word}'`);
  }

  private acceptOp(op: string): boolean {
    const tok = this.scanner.peek();
    if (tok.type !== 'op' || tok.value !== op) return false;
    this.scanner.next();
    return true;
  }

  private acceptArith<A extends ArithOp, B extends ArithOp>(a: A, b: B): A | B | undefined {
    const tok = this.scanner.peek();
    if (tok.type !== 'op') return undefined;
    const op = tok.value === a ? a : tok.value === b ? b : undefined;
    if (op) this.scanner.next();
    return op;
  }

  private expectOp(op: string): void {
    const tok = this.scanner.next();
    if (tok.type !== 'op' || tok.value !== op) throw this.unexpected(tok, `'${op}'`);
  }

  /** Run `fn`; on a syntax error rewind to where it started and return undefined. */
  private attempt<T>(fn: () => T): T | undefined {
    const saved = this.scanner.save();
    try {
      return fn();
    } catch (err) {
      if (!(err instanceof QuerySyntaxError)) throw err;
      this.scanner.restore(saved);
      return undefined;
    }
  }

  private unexpected(tok: Token, expected: string): QuerySyntaxError {
    const found = tok.type === 'eof' ? 'end of query' : `'${describe(tok)}'`;
    return new QuerySyntaxError(`Expected ${expected} but found ${found}`, tok.pos);
  }
}

function toCompareOp(value: string): CompareOp | undefined {
  return COMPARE_OPS.find((op) => op === value);
}

function describe(tok: Token): string {
  switch (tok.type) {
    case 'number': return String(tok.value);
    case 'duration': return `${tok.ms}ms`;
    case 'string':
    case 'ident':
    case 'op': return tok.value;
    case 'eof': return 'end of query';
  }
}
