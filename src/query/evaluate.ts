/**
 * Row-level evaluation of expressions and where conditions.
 */

import type { Condition, Expr } from '../types/query.ts';
import type { Value } from '../types/series.ts';
import { BadRequestError } from '../core/errors.ts';

export type ColumnLookup = (column: string) => Value;

export function evalScalar(expr: Expr, lookup: ColumnLookup): Value {
  switch (expr.kind) {
    case 'number':
    case 'string':
    case 'bool':
      return expr.value;
    case 'null':
      return null;
    case 'duration':
      return expr.ms;
    case 'column':
      return lookup(expr.name);
    case 'negate': {
      const v = evalScalar(expr.operand, lookup);
      return typeof v === 'number' ? -v : null;
    }
    case 'binary':
      return arithmetic(expr.op, evalScalar(expr.left, lookup), evalScalar(expr.right, lookup));
    case 'call':
      if (expr.name === 'diff' && expr.args.length === 2) {
        const [a, b] = expr.args;
        if (a && b) return arithmetic('-', evalScalar(a, lookup), evalScalar(b, lookup));
      }
      throw new BadRequestError(`${expr.name}() is not allowed here`);
    case 'regex':
    case 'now':
    case 'forever':
    case 'wildcard':
      throw new BadRequestError(`Unexpected ${expr.kind} in expression`);
  }
}

export function arithmetic(op: '+' | '-' | '*' | '/', a: Value, b: Value): Value {
  if (typeof a !== 'number' || typeof b !== 'number') return null;
  switch (op) {
    case '+': return a + b;
    case '-': return a - b;
    case '*': return a * b;
    case '/': return b === 0 ? null : a / b;
  }
}

export function evalCondition(cond: Condition, lookup: ColumnLookup): boolean {
  switch (cond.kind) {
    case 'and':
      return evalCondition(cond.left, lookup) && evalCondition(cond.right, lookup);
    case 'or':
      return evalCondition(cond.left, lookup) || evalCondition(cond.right, lookup);
    case 'compare': {
      const left = evalScalar(cond.left, lookup);
      if (cond.op === '=~' || cond.op === '!~') {
        if (cond.right.kind !== 'regex') throw new BadRequestError(`${cond.op} needs a /regex/`);
        const matched = left !== null && cond.right.re.test(String(left));
        return cond.op === '=~' ? matched : !matched;
      }
      const right = evalScalar(cond.right, lookup);
      return compareWith(cond.op, left, right);
    }
  }
}

function compareWith(op: '=' | '!=' | '<' | '<=' | '>' | '>=', a: Value, b: Value): boolean {
  if (op === '=') return a === b;
  if (op === '!=') return a !== b;
  if (a === null || b === null || typeof a !== typeof b) return false;
  const c = compareValues(a, b);
  switch (op) {
    case '<': return c < 0;
    case '<=': return c <= 0;
    case '>': return c > 0;
    case '>=': return c >= 0;
  }
}

/**
 * Total order over values: null < boolean < number < string.
 * Used for sorting group keys and distinct values.
 */
export function compareValues(a: Value, b: Value): number {
  const ra = rank(a);
  const rb = rank(b);
  if (ra !== rb) return ra - rb;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return 0;
}

function rank(v: Value): number {
  if (v === null) return 0;
  switch (typeof v) {
    case 'boolean': return 1;
    case 'number': return 2;
    default: return 3;
  }
}

/** Column names an expression reads, in order of appearance. */
export function referencedColumns(expr: Expr, out: string[] = []): string[] {
  switch (expr.kind) {
    case 'column':
      out.push(expr.name);
      break;
    case 'negate':
      referencedColumns(expr.operand, out);
      break;
    case 'binary':
      referencedColumns(expr.left, out);
      referencedColumns(expr.right, out);
      break;
    case 'call':
      for (const arg of expr.args) referencedColumns(arg, out);
      break;
    default:
      break;
  }
  return out;
}
