/**
 * Rule patterns are written in JavaScript regular expression syntax. Flags are
 * fixed per use site so that a config file cannot change matching semantics.
 */

/** Single search: case-insensitive, `.` spans line breaks. */
export const SEARCH_FLAGS = 'is';

/** Candidate collection: every non-overlapping match, case-insensitive. */
export const COLLECT_FLAGS = 'gi';

/** Preference ranking only needs a case-insensitive test. */
export const PREFER_FLAGS = 'i';

export const GENERIC_PHONE_PATTERN = String.raw`(?:\+?\d[\s-]?){7,15}\d`;

export function compilePattern(source: string, flags: string): RegExp {
  return new RegExp(source, flags);
}

export function describePatternError(source: string): string | undefined {
  try {
    new RegExp(source);
    return undefined;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * Number of capture groups declared by `source`. An empty alternative makes
 * the expression match the empty string, which reports every group.
 */
export function countCaptureGroups(source: string): number {
  const probe = new RegExp(`(?:${source})|`).exec('');
  return probe ? probe.length - 1 : 0;
}
