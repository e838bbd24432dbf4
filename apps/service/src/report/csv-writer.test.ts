import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getHarborAidExpectedRecord } from '@ngo-contacts/fixtures';

import { formatReportTimestamp, renderContactReport, resolveReportPath, writeContactReport } from './csv-writer.js';

const HEADER = 'NGO Name,Website,Address,Services Offered,Contact Person,Contact Number,Source Pages\n';
const HARBOR_AID_ROW =
  'Harbor Aid Society,https://harbor-aid.org/,"12 Wharf Road, Port Elin",Overnight shelter; Food bank,' +
  'Amina Okafor (555-0142),"800-555-0000, 555-0100, 555-0199",https://harbor-aid.org/contact; https://harbor-aid.org/about\n';

describe('report naming', () => {
  it('formats the local timestamp with zero padding', () => {
    expect(formatReportTimestamp(new Date(2024, 4, 6, 7, 8, 9))).toBe('20240506_070809');
    expect(formatReportTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe('20231231_235958');
  });

  it('places the timestamped file in the output directory', () => {
    expect(resolveReportPath(join('reports', 'daily'), new Date(2024, 0, 2, 3, 4, 5))).toBe(
      join('reports', 'daily', 'ngo_contacts_20240102_030405.csv')
    );
  });
});

describe('renderContactReport', () => {
  it('writes only the header for an empty batch', () => {
    expect(renderContactReport([])).toBe(HEADER);
  });

  it('quotes cells that contain the delimiter', () => {
    expect(renderContactReport([getHarborAidExpectedRecord()])).toBe(HEADER + HARBOR_AID_ROW);
  });
});

describe('writeContactReport', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'ngo-contacts-report-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('creates missing directories and writes the report', async () => {
    const path = join(directory, 'nested', 'out', 'report.csv');

    await writeContactReport(path, [getHarborAidExpectedRecord()]);

    await expect(readFile(path, 'utf-8')).resolves.toBe(HEADER + HARBOR_AID_ROW);
  });
});
