import type { PageDocument } from './page.js';

export const SITE_NAME_META_KEY = 'og:site_name';

const present = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

/**
 * Site name from Open Graph metadata, falling back to the page title and then
 * the first top-level heading. Blank candidates fall through.
 */
export function resolveOrganizationName(page: PageDocument): string | null {
  return (
    present(page.getMetaContent('property', SITE_NAME_META_KEY)) ??
    present(page.getMetaContent('name', SITE_NAME_META_KEY)) ??
    present(page.getTitleText()) ??
    present(page.getFirstHeadingText()) ??
    null
  );
}
