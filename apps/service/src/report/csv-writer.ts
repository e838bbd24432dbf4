import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import { stringify } from 'csv-stringify/sync';

import { CONTACT_RECORD_COLUMNS, toRow, type ContactRecord } from '@ngo-contacts/core';

export const REPORT_FILE_PREFIX = 'ngo_contacts_';

const pad = (value: number): string => String(value).padStart(2, '0');

/** Local-time `YYYYMMDD_HHMMSS`. */
export const formatReportTimestamp = (date: Date): string => {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
};

export const resolveReportPath = (directory: string, now: Date): string => {
  return join(directory, `${REPORT_FILE_PREFIX}${formatReportTimestamp(now)}.csv`);
};

export const renderContactReport = (records: readonly ContactRecord[]): string => {
  return stringify([[...CONTACT_RECORD_COLUMNS], ...records.map((record) => [...toRow(record)])]);
};

/** Writes the header row and one row per record, creating parent directories. */
export const writeContactReport = async (path: string, records: readonly ContactRecord[]): Promise<void> => {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, renderContactReport(records), 'utf-8');
};
