import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { ContactRecordSchema, type ContactRecord } from '@ngo-contacts/core';

export const HARBOR_AID_FIXTURE_ID = 'harbor-aid' as const;

export type HarborAidFixtureId = typeof HARBOR_AID_FIXTURE_ID;

export const HARBOR_AID_ORGANIZATION = 'harbor-aid.org';

export const HARBOR_AID_PAGES = {
  contact: 'https://harbor-aid.org/contact',
  about: 'https://harbor-aid.org/about',
  team: 'https://harbor-aid.org/team'
} as const;

export type HarborAidPage = keyof typeof HARBOR_AID_PAGES;

export interface HarborAidFixture {
  readonly id: HarborAidFixtureId;
  readonly organization: string;
  readonly paths: {
    readonly config: string;
    readonly pages: Readonly<Record<HarborAidPage, string>>;
  };
  /** Page markup keyed by the URL it is served under. */
  readonly html: ReadonlyMap<string, string>;
  readonly expected: {
    readonly record: ContactRecord;
    readonly visibleText: Readonly<Record<HarborAidPage, string>>;
  };
}

const __dirname = dirname(fileURLToPath(import.meta.url));
const FIXTURE_ROOT = resolve(__dirname, '../../../fixtures');
const HARBOR_AID_ROOT = join(FIXTURE_ROOT, HARBOR_AID_FIXTURE_ID);

const PAGE_NAMES: readonly HarborAidPage[] = ['contact', 'about', 'team'];

const pagePath = (page: HarborAidPage): string => join(HARBOR_AID_ROOT, `${page}.html`);

const EXPECTED_VISIBLE_TEXT: Record<HarborAidPage, string> = {
  contact:
    'Contact | Harbor Aid Get in touch Visit us 12 Wharf Road, Port Elin Front desk: 555-0100 Outreach van: 555-0199 Free hotline: 800-555-0000',
  about:
    'About | Harbor Aid About Harbor Aid Founded in 1998, we run an overnight shelter and a weekly food bank for the harbor district. Call 555-0100 for volunteering.',
  team:
    'Our team | Harbor Aid Our team Director: Amina Okafor - 555-0142 Coordinator: Omar Haddad - 555-0177 Enable scripts to see 555-0155'
};

const HARBOR_AID_EXPECTED_RECORD: ContactRecord = ContactRecordSchema.parse({
  'NGO Name': 'Harbor Aid Society',
  Website: 'https://harbor-aid.org/',
  Address: '12 Wharf Road, Port Elin',
  'Services Offered': 'Overnight shelter; Food bank',
  'Contact Person': 'Amina Okafor (555-0142)',
  'Contact Number': '800-555-0000, 555-0100, 555-0199',
  'Source Pages': 'https://harbor-aid.org/contact; https://harbor-aid.org/about'
});

let cachedFixture: HarborAidFixture | undefined;

const memoizeFixture = (): HarborAidFixture => {
  if (cachedFixture) {
    return cachedFixture;
  }

  const pagePaths: Record<HarborAidPage, string> = {
    contact: pagePath('contact'),
    about: pagePath('about'),
    team: pagePath('team')
  };

  const html = new Map<string, string>(
    PAGE_NAMES.map((page): [string, string] => [HARBOR_AID_PAGES[page], readFileSync(pagePaths[page], 'utf-8')])
  );

  cachedFixture = Object.freeze({
    id: HARBOR_AID_FIXTURE_ID,
    organization: HARBOR_AID_ORGANIZATION,
    paths: {
      config: join(HARBOR_AID_ROOT, 'ngos.yaml'),
      pages: pagePaths
    },
    html,
    expected: {
      record: HARBOR_AID_EXPECTED_RECORD,
      visibleText: EXPECTED_VISIBLE_TEXT
    }
  });

  return cachedFixture;
};

export const loadHarborAidFixture = (): HarborAidFixture => memoizeFixture();

export const getHarborAidConfigPath = (): string => memoizeFixture().paths.config;

export const getHarborAidHtml = (page: HarborAidPage): string => {
  const html = memoizeFixture().html.get(HARBOR_AID_PAGES[page]);
  if (html === undefined) {
    throw new Error(`No fixture markup for page "${page}"`);
  }
  return html;
};

export const getHarborAidExpectedRecord = (): ContactRecord => {
  return ContactRecordSchema.parse(HARBOR_AID_EXPECTED_RECORD);
};
