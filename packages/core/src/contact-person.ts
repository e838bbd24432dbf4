import type { ContactPersonRule } from './organization.js';
import type { PageSource } from './page.js';
import { SEARCH_FLAGS, compilePattern } from './patterns.js';
import { renderTemplate } from './template.js';

export interface ContactPersonInput {
  readonly rule: ContactPersonRule;
  /** Combined text of the organization's contact pages. */
  readonly text: string;
  readonly contactPages: readonly string[];
  readonly pages: PageSource;
}

/** Formats a contact person from a two-group match: name, then optional phone. */
export function formatContactPerson(text: string, pattern: string, format: string): string | null {
  const match = compilePattern(pattern, SEARCH_FLAGS).exec(text);
  if (!match) {
    return null;
  }

  const name = (match[1] ?? '').trim();
  const phone = match[2] === undefined ? '' : match[2].trim();
  return renderTemplate(format, { name, phone }).trim();
}

export async function resolveContactPerson(input: ContactPersonInput): Promise<string | null> {
  const { rule } = input;
  if (rule.static) {
    return rule.static;
  }

  // A named page is loaded even without a pattern, so an unreachable page fails the fetch.
  let text = input.text;
  if (rule.page && !input.contactPages.includes(rule.page)) {
    const page = await input.pages.load(rule.page);
    text = page.getVisibleText();
  }

  if (!rule.pattern) {
    return null;
  }

  return formatContactPerson(text, rule.pattern, rule.format);
}
