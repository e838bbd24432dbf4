import { describe, expect, it } from 'vitest';

import { createStubPageSource, type StubPageInit } from './__fixtures__/pages.js';
import { ConfigError, FetchError, MissingFieldError } from './errors.js';
import {
  compileOrganizationConfig,
  type OrganizationConfig,
  type OrganizationInput
} from './organization.js';
import { buildContactRecord } from './record-builder.js';

const CONTACT_URL = 'https://harbor-aid.org/contact';
const ABOUT_URL = 'https://harbor-aid.org/about';
const TEAM_URL = 'https://harbor-aid.org/team';

const PAGES: Record<string, StubPageInit> = {
  [CONTACT_URL]: {
    text: 'Harbor Aid Society 12 Wharf Road, Port Elin Call 555-0100 or 555-0199 Director: Amina Okafor - 555-0142',
    title: 'Contact | Harbor Aid',
    meta: { property: { 'og:site_name': 'Harbor Aid Society' } }
  },
  [ABOUT_URL]: {
    text: 'Founded 1998. Hotline 800-555-0000',
    title: 'About'
  },
  [TEAM_URL]: {
    text: 'Coordinator: Omar Haddad - 555-0177'
  }
};

const createConfig = (selectors: Partial<OrganizationInput['selectors']> = {}): OrganizationConfig =>
  compileOrganizationConfig('harbor-aid.org', {
    contact_pages: [CONTACT_URL, ABOUT_URL],
    selectors: {
      address: { regex_any: ['\\d+ Wharf Road, Port \\w+'] },
      phones: { regex_any: ['\\d{3}-\\d{4}', '800-\\d{3}-\\d{4}'], prefer: ['^800'], required_min: 1 },
      services: { static: ['Shelter', 'Food bank'], text_source: 'none' },
      contact_person: {
        regex: 'Director:\\s*([A-Za-z ]+?)\\s*-\\s*(\\d{3}-\\d{4})',
        format: '{name} {phone}'
      },
      ...selectors
    }
  });

const build = (config: OrganizationConfig, pages = createStubPageSource(PAGES)) =>
  buildContactRecord(config, { pages });

describe('buildContactRecord', () => {
  it('assembles a complete record from the combined page text', async () => {
    const pages = createStubPageSource(PAGES);
    const record = await build(createConfig(), pages);

    expect(record).toEqual({
      'NGO Name': 'Harbor Aid Society',
      Website: 'https://harbor-aid.org/',
      Address: '12 Wharf Road, Port Elin',
      'Services Offered': 'Shelter; Food bank',
      'Contact Person': 'Amina Okafor 555-0142',
      'Contact Number': '800-555-0000, 555-0100, 555-0199',
      'Source Pages': `${CONTACT_URL}; ${ABOUT_URL}`
    });
    expect(Object.isFrozen(record)).toBe(true);
    expect(pages.requests).toEqual([CONTACT_URL, ABOUT_URL]);
  });

  it('produces identical records for identical inputs', async () => {
    const first = await build(createConfig());
    const second = await build(createConfig());

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('fails with the Address field when the address rule never matches', async () => {
    const result = build(createConfig({ address: { regex_any: ['PO Box \\d+'] } }));

    await expect(result).rejects.toBeInstanceOf(MissingFieldError);
    await expect(result).rejects.toMatchObject({
      organization: 'harbor-aid.org',
      field: 'Address',
      message: 'harbor-aid.org: missing required field -> Address'
    });
  });

  it('validates the name before any other field', async () => {
    const pages = createStubPageSource({ ...PAGES, [CONTACT_URL]: { text: 'no metadata' } });
    const config = createConfig({ address: { regex_any: ['PO Box \\d+'] } });

    await expect(build(config, pages)).rejects.toMatchObject({ field: 'NGO Name' });
  });

  it('stops at the first failing field in validation order', async () => {
    const pages = createStubPageSource(PAGES);
    const config = createConfig({
      phones: { regex_any: ['\\d{3}-\\d{4}'], required_min: 9 },
      contact_person: { page: 'https://harbor-aid.org/missing', regex: '(\\w+)' }
    });

    await expect(build(config, pages)).rejects.toMatchObject({ field: 'Contact Number' });
    expect(pages.requests).toEqual([CONTACT_URL, ABOUT_URL]);
  });

  it('applies services patterns to empty text unless pages are selected', async () => {
    const services = { regex_any: ['Founded \\d{4}'] };

    await expect(build(createConfig({ services }))).rejects.toMatchObject({ field: 'Services Offered' });

    const record = await build(createConfig({ services: { ...services, text_source: 'pages' } }));
    expect(record['Services Offered']).toBe('Founded 1998');
  });

  it('reads the name from the configured page, reusing already loaded pages', async () => {
    const pages = createStubPageSource(PAGES);
    const record = await build(createConfig({ og_name: { url: ABOUT_URL } }), pages);

    expect(record['NGO Name']).toBe('About');
    expect(pages.requests).toEqual([CONTACT_URL, ABOUT_URL]);
  });

  it('loads an extra page once for the contact person', async () => {
    const pages = createStubPageSource(PAGES);
    const config = createConfig({
      og_name: { url: TEAM_URL },
      contact_person: {
        page: TEAM_URL,
        regex: 'Coordinator:\\s*([A-Za-z ]+?)\\s*-\\s*(\\d{3}-\\d{4})',
        format: '{name} ({phone})'
      }
    });

    await expect(build(config, pages)).rejects.toMatchObject({ field: 'NGO Name' });

    const withTitle = createStubPageSource({ ...PAGES, [TEAM_URL]: { ...PAGES[TEAM_URL], title: 'Team' } });
    const record = await build(config, withTitle);
    expect(record['Contact Person']).toBe('Omar Haddad (555-0177)');
    expect(withTitle.requests).toEqual([CONTACT_URL, ABOUT_URL, TEAM_URL]);
  });

  it('propagates fetch failures unchanged', async () => {
    const pages = createStubPageSource({ [CONTACT_URL]: PAGES[CONTACT_URL] });

    await expect(build(createConfig(), pages)).rejects.toBeInstanceOf(FetchError);
    expect(pages.requests).toEqual([CONTACT_URL, ABOUT_URL]);
  });

  it('rejects configurations without contact pages', async () => {
    const config: OrganizationConfig = { ...createConfig(), contactPages: [] };

    await expect(build(config)).rejects.toBeInstanceOf(ConfigError);
  });
});
