import type { PhoneCandidateSource, PhoneRule } from './organization.js';
import {
  COLLECT_FLAGS,
  GENERIC_PHONE_PATTERN,
  PREFER_FLAGS,
  compilePattern
} from './patterns.js';

export const PHONE_SEPARATOR = ', ';

const MIN_RESULT_SIZE = 3;

const candidatePatterns = (source: PhoneCandidateSource): readonly string[] => {
  switch (source.kind) {
    case 'patterns':
      return source.patterns;
    case 'generic':
      return [GENERIC_PHONE_PATTERN];
    default: {
      const exhaustiveCheck: never = source;
      return exhaustiveCheck;
    }
  }
};

/** Every match of every pattern, pattern-then-position order. */
export function collectPhoneCandidates(text: string, source: PhoneCandidateSource): string[] {
  const candidates: string[] = [];
  for (const pattern of candidatePatterns(source)) {
    for (const match of text.matchAll(compilePattern(pattern, COLLECT_FLAGS))) {
      candidates.push(match[0]);
    }
  }
  return candidates;
}

/**
 * Moves candidates matching any preference pattern ahead of the rest while
 * keeping the relative order inside both groups.
 */
export function rankPhoneCandidates(
  candidates: readonly string[],
  preferPatterns: readonly string[]
): string[] {
  if (preferPatterns.length === 0) {
    return [...candidates];
  }

  const matchers = preferPatterns.map((pattern) => compilePattern(pattern, PREFER_FLAGS));
  const preferred: string[] = [];
  const others: string[] = [];
  for (const candidate of candidates) {
    if (matchers.some((matcher) => matcher.test(candidate))) {
      preferred.push(candidate);
    } else {
      others.push(candidate);
    }
  }
  return [...preferred, ...others];
}

/**
 * Collects, deduplicates and ranks phone numbers. Fails (returns `null`) when
 * fewer than `max(1, requiredMin)` distinct candidates exist; otherwise
 * returns at least three numbers when that many were found.
 */
export function extractPhones(text: string, rule: PhoneRule): string | null {
  const distinct = [...new Set(collectPhoneCandidates(text, rule.source))];
  const required = Math.max(1, rule.requiredMin);

  if (distinct.length < required) {
    return null;
  }

  const ranked = rankPhoneCandidates(distinct, rule.preferPatterns);
  return ranked.slice(0, Math.max(required, MIN_RESULT_SIZE)).join(PHONE_SEPARATOR);
}
