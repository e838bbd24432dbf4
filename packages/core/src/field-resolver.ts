import type { FieldRule } from './organization.js';
import { SEARCH_FLAGS, compilePattern } from './patterns.js';

export const STATIC_LIST_SEPARATOR = '; ';

/**
 * Resolves a single field. A static value wins outright; otherwise patterns
 * are tried in declared order and the first one that matches anywhere in
 * `text` supplies the (trimmed) value. `null` means nothing matched.
 */
export function applyRule(text: string, rule: FieldRule): string | null {
  switch (rule.kind) {
    case 'static':
      return typeof rule.value === 'string' ? rule.value : rule.value.join(STATIC_LIST_SEPARATOR);
    case 'regexAny': {
      for (const source of rule.patterns) {
        const match = compilePattern(source, SEARCH_FLAGS).exec(text);
        if (match) {
          return match[0].trim();
        }
      }
      return null;
    }
    default: {
      const exhaustiveCheck: never = rule;
      return exhaustiveCheck;
    }
  }
}
