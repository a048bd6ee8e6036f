/**
 * Series name matching for query sources, deletes and `list series`.
 *
 * Compilation (once per query):
 *  - `/regex/flags`            → RegExp as written
 *  - name with a metacharacter → full-match anchored RegExp (`cpu.*`, `.*`)
 *  - anything else             → exact name (`cpu.idle`, dots are literal)
 *  - RegExp → FastMatcher (any / exact / regex)
 */

import type { NamePattern, FastMatcher } from '../types/matcher.ts';
import { BadRequestError } from '../core/errors.ts';

const REGEX_LITERAL = /^\/(.*)\/([gimsuy]*)$/s;
const METACHARS = /[*+?[\](){}|^$\\]/;

// ─── Compilation ────────────────────────────────────────────────────────────

/** Interpret the text of a series reference as an exact name or a pattern. */
export function parseNamePattern(text: string): NamePattern {
  const literal = REGEX_LITERAL.exec(text);
  if (literal) {
    // the global flag would make RegExp.test stateful
    return compileRegExp(text, literal[1] ?? '', (literal[2] ?? '').replace('g', ''));
  }
  if (METACHARS.test(text)) return compileRegExp(text, `^(?:${text})$`, '');
  return text;
}

function compileRegExp(text: string, source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new BadRequestError(`Invalid series pattern '${text}': ${reason}`);
  }
}

export function compileMatcher(p: NamePattern): FastMatcher {
  if (typeof p === 'string') {
    return { type: 'exact', value: p };
  }
  const src = p.source;
  // /.*/ with any flags → always matches
  if (src === '.*' || src === '^.*$' || src === '^(?:.*)$') return { type: 'any' };
  // /^exact$/ where inner part has no regex special chars → equality
  const exactInner = src.match(/^\^([^.*+?[\](){}\\|^$]+)\$$/)?.[1];
  if (exactInner !== undefined && !p.ignoreCase) return { type: 'exact', value: exactInner };
  return { type: 'regex', re: p };
}

// ─── Matching ───────────────────────────────────────────────────────────────

export function testMatcher(m: FastMatcher, name: string): boolean {
  switch (m.type) {
    case 'any':   return true;
    case 'exact': return name === m.value;
    case 'regex': return m.re.test(name);
  }
}

/** Names from `names` that match `pattern`, sorted. */
export function matchSeriesNames(names: Iterable<string>, pattern: NamePattern): string[] {
  const matcher = compileMatcher(pattern);
  const out: string[] = [];
  for (const name of names) {
    if (testMatcher(matcher, name)) out.push(name);
  }
  return out.sort();
}
