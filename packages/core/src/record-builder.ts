import { resolveContactPerson } from './contact-person.js';
import { ConfigError, MissingFieldError } from './errors.js';
import { applyRule } from './field-resolver.js';
import type { OrganizationConfig } from './organization.js';
import { resolveOrganizationName } from './organization-name.js';
import { createPageCache, type PageDocument, type PageSource } from './page.js';
import { extractPhones } from './phones.js';
import type { ContactRecord, ContactRecordField } from './record.js';

export const SOURCE_PAGE_SEPARATOR = '; ';

export interface BuildContactRecordOptions {
  readonly pages: PageSource;
}

const requireField = (
  organization: string,
  field: ContactRecordField,
  value: string | null
): string => {
  if (value === null || value.trim().length === 0) {
    throw new MissingFieldError(organization, field);
  }
  return value;
};

const loadContactPages = async (
  urls: readonly string[],
  pages: PageSource
): Promise<PageDocument[]> => {
  const documents: PageDocument[] = [];
  for (const url of urls) {
    documents.push(await pages.load(url));
  }
  return documents;
};

/**
 * Builds the contact record for one organization. Pages are loaded once each
 * through a cache scoped to this call; fields are resolved and validated in a
 * fixed order and the first empty one aborts the organization.
 */
export async function buildContactRecord(
  config: OrganizationConfig,
  options: BuildContactRecordOptions
): Promise<ContactRecord> {
  const organization = config.id;
  const pages = createPageCache(options.pages);
  const { selectors } = config;
  const [firstPage] = config.contactPages;
  if (firstPage === undefined) {
    throw new ConfigError(organization, ['contact_pages: At least one contact page is required']);
  }

  const documents = await loadContactPages(config.contactPages, pages);
  const text = documents.map((document) => document.getVisibleText()).join(' ');

  const namePage = await pages.load(selectors.ogName?.url ?? firstPage);
  const ngoName = requireField(organization, 'NGO Name', resolveOrganizationName(namePage));

  const address = requireField(organization, 'Address', applyRule(text, selectors.address));
  const phones = requireField(organization, 'Contact Number', extractPhones(text, selectors.phones));

  const servicesText = selectors.services.textSource === 'pages' ? text : '';
  const services = requireField(
    organization,
    'Services Offered',
    applyRule(servicesText, selectors.services.rule)
  );

  const contactPerson = requireField(
    organization,
    'Contact Person',
    await resolveContactPerson({
      rule: selectors.contactPerson,
      text,
      contactPages: config.contactPages,
      pages
    })
  );

  return Object.freeze({
    'NGO Name': ngoName,
    Website: `https://${organization}/`,
    Address: address,
    'Services Offered': services,
    'Contact Person': contactPerson,
    'Contact Number': phones,
    'Source Pages': config.contactPages.join(SOURCE_PAGE_SEPARATOR)
  });
}
