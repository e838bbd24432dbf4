import { describe, expect, it } from 'vitest';

import { ConfigError } from './errors.js';
import { compileConfigDocument, type OrganizationInput } from './organization.js';
import { countCaptureGroups } from './patterns.js';

const createInput = (selectors: Partial<OrganizationInput['selectors']> = {}): OrganizationInput => ({
  contact_pages: ['https://harbor-aid.org/contact'],
  selectors: {
    address: { regex_any: ['\\d+ Wharf Road'] },
    phones: {},
    services: { static: ['Shelter'] },
    contact_person: { regex: '(\\w+) - (\\d{3}-\\d{4})' },
    ...selectors
  }
});

const captureIssues = (document: unknown): readonly string[] => {
  try {
    compileConfigDocument(document, 'test');
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('Expected the configuration to be rejected');
};

describe('compileConfigDocument', () => {
  it('compiles organizations in declaration order with defaults applied', () => {
    const organizations = compileConfigDocument({
      'harbor-aid.org': createInput(),
      'acme.example': createInput({ phones: { regex_any: [], prefer: ['^800'], required_min: 2 } })
    });

    expect([...organizations.keys()]).toEqual(['harbor-aid.org', 'acme.example']);

    const harbor = organizations.get('harbor-aid.org');
    expect(harbor?.selectors.address).toEqual({ kind: 'regexAny', patterns: ['\\d+ Wharf Road'] });
    expect(harbor?.selectors.phones).toEqual({ source: { kind: 'generic' }, preferPatterns: [], requiredMin: 1 });
    expect(harbor?.selectors.services).toEqual({
      rule: { kind: 'static', value: ['Shelter'] },
      textSource: 'none'
    });
    expect(harbor?.selectors.contactPerson).toEqual({
      static: undefined,
      page: undefined,
      pattern: '(\\w+) - (\\d{3}-\\d{4})',
      format: '{name} {phone}'
    });

    const acme = organizations.get('acme.example');
    expect(acme?.selectors.phones).toEqual({
      source: { kind: 'patterns', patterns: [] },
      preferPatterns: ['^800'],
      requiredMin: 2
    });
  });

  it('accepts an explicit services text source', () => {
    const organizations = compileConfigDocument({
      'harbor-aid.org': createInput({ services: { regex_any: ['shelter'], text_source: 'pages' } })
    });

    expect(organizations.get('harbor-aid.org')?.selectors.services.textSource).toBe('pages');
  });

  it('treats an empty document as no organizations', () => {
    expect(compileConfigDocument(null).size).toBe(0);
  });

  it('rejects organizations without contact pages', () => {
    expect(captureIssues({ 'harbor-aid.org': { ...createInput(), contact_pages: [] } })).toEqual([
      'harbor-aid.org.contact_pages: At least one contact page is required'
    ]);
  });

  it('rejects patterns that are not valid regular expressions', () => {
    const issues = captureIssues({ 'harbor-aid.org': createInput({ address: { regex_any: ['(unclosed'] } }) });

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^harbor-aid\.org\.selectors\.address\.regex_any\.0: Invalid pattern: /);
  });

  it('requires a name group in contact person patterns', () => {
    expect(
      captureIssues({ 'harbor-aid.org': createInput({ contact_person: { regex: 'Director: \\w+' } }) })
    ).toEqual(['harbor-aid.org.selectors.contact_person.regex: Contact person pattern must capture the name in group 1']);
  });

  it('rejects unknown placeholders in contact person formats', () => {
    expect(
      captureIssues({
        'harbor-aid.org': createInput({ contact_person: { regex: '(\\w+)', format: '{name} ({role})' } })
      })
    ).toEqual(['harbor-aid.org.selectors.contact_person.format: Unknown placeholder(s): {role}']);
  });

  it('rejects unknown keys and missing required selectors', () => {
    const { services: _services, ...selectors } = createInput().selectors;
    const issues = captureIssues({
      'harbor-aid.org': { contact_pages: ['https://harbor-aid.org/contact'], selectors, extra: true }
    });

    expect(issues).toContain('harbor-aid.org.selectors.services: Required');
    expect(issues.some((issue) => issue.startsWith('harbor-aid.org: Unrecognized key(s)'))).toBe(true);
  });
});

describe('countCaptureGroups', () => {
  it('counts numbered and named groups but not non-capturing ones', () => {
    expect(countCaptureGroups('(a)(b)?')).toBe(2);
    expect(countCaptureGroups('(?:x)+')).toBe(0);
    expect(countCaptureGroups('(?<name>\\w+)')).toBe(1);
  });
});
