/**
 * Series name matchers used by query sources and delete requests.
 */

/** A name pattern: RegExp for pattern match, string for exact match. */
export type NamePattern = RegExp | string;

/**
 * Fast matcher that avoids regex overhead for common patterns.
 * Compiled once per query.
 */
export type FastMatcher =
  | { type: 'any' }                  // /.*/: always true
  | { type: 'exact'; value: string } // /^foo$/ or string: equality check
  | { type: 'regex'; re: RegExp }    // general fallback
