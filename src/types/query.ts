/**
 * Query language AST.
 */

import type { NamePattern } from './matcher.ts';

export type ArithOp = '+' | '-' | '*' | '/';
export type CompareOp = '=' | '!=' | '<' | '<=' | '>' | '>=' | '=~' | '!~';

export type Expr =
  | { kind: 'number'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'null' }
  | { kind: 'regex'; re: RegExp }
  | { kind: 'duration'; ms: number }
  | { kind: 'now' }
  | { kind: 'forever' }
  | { kind: 'wildcard' }
  | { kind: 'column'; name: string } // may be qualified: `t1.value`
  | { kind: 'call'; name: string; args: Expr[] }
  | { kind: 'negate'; operand: Expr }
  | { kind: 'binary'; op: ArithOp; left: Expr; right: Expr };

export type Condition =
  | { kind: 'compare'; op: CompareOp; left: Expr; right: Expr }
  | { kind: 'and'; left: Condition; right: Condition }
  | { kind: 'or'; left: Condition; right: Condition };

export interface SelectField {
  expr: Expr;
  alias?: string;
}

export interface JoinSide {
  name: string;
  alias: string;
}

export type Source =
  | { kind: 'series'; pattern: NamePattern }
  | { kind: 'merge'; names: string[] }
  | { kind: 'join'; left: JoinSide; right: JoinSide };

export interface GroupBy {
  interval: number | undefined; // bucket width in ms
  dimensions: string[];
}

export type Order = 'asc' | 'desc';

export interface SelectQuery {
  type: 'select';
  text: string;
  fields: SelectField[];
  source: Source;
  where: Condition | undefined;
  groupBy: GroupBy;
  limit: number | undefined;
  order: Order;
  into: string | undefined;
}

export interface DeleteQuery {
  type: 'delete';
  text: string;
  pattern: NamePattern;
  where: Condition | undefined;
}

export interface ListSeriesQuery {
  type: 'list';
  text: string;
  pattern: NamePattern | undefined;
}

export type Statement = SelectQuery | DeleteQuery | ListSeriesQuery;

/** Inclusive time window in ms; `end` is +Infinity for `time < forever`. */
export interface TimeRange {
  start: number;
  end: number;
}
