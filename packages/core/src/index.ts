export { ConfigError, FetchError, MissingFieldError } from './errors.js';
export {
  CONTACT_RECORD_COLUMNS,
  ContactRecordSchema,
  toRow,
  type ContactRecord,
  type ContactRecordField
} from './record.js';
export {
  ConfigDocumentSchema,
  OrganizationInputSchema,
  compileConfigDocument,
  compileContactPersonRule,
  compileFieldRule,
  compileOrganizationConfig,
  compilePhoneRule,
  formatIssues,
  type ConfigDocument,
  type ContactPersonRule,
  type FieldRule,
  type OrganizationConfig,
  type OrganizationInput,
  type OrganizationSelectors,
  type PhoneCandidateSource,
  type PhoneRule,
  type ServicesRule,
  type ServicesTextSource
} from './organization.js';
export {
  createPageCache,
  type MetaAttribute,
  type PageCache,
  type PageDocument,
  type PageSource
} from './page.js';
export { GENERIC_PHONE_PATTERN } from './patterns.js';
export { DEFAULT_CONTACT_FORMAT, renderTemplate } from './template.js';
export { STATIC_LIST_SEPARATOR, applyRule } from './field-resolver.js';
export {
  PHONE_SEPARATOR,
  collectPhoneCandidates,
  extractPhones,
  rankPhoneCandidates
} from './phones.js';
export { formatContactPerson, resolveContactPerson, type ContactPersonInput } from './contact-person.js';
export { SITE_NAME_META_KEY, resolveOrganizationName } from './organization-name.js';
export {
  SOURCE_PAGE_SEPARATOR,
  buildContactRecord,
  type BuildContactRecordOptions
} from './record-builder.js';
