import { resolve } from 'node:path';

import { LocalFileSystemConfigStore } from '@ngo-contacts/config-store';
import {
  MissingFieldError,
  buildContactRecord,
  type ContactRecord,
  type OrganizationConfig,
  type PageSource
} from '@ngo-contacts/core';

import type { Logger } from '../logger.js';
import { resolveReportPath, writeContactReport } from '../report/csv-writer.js';

export interface ContactExtractionServiceOptions {
  readonly pages: PageSource;
  readonly logger: Logger;
  readonly outputDirectory: string;
  readonly now?: () => Date;
}

export interface ExtractionFailure {
  readonly organization: string;
  readonly kind: string;
  readonly message: string;
  readonly field?: string;
}

export interface ExtractRecordsOptions {
  /** Record a failing organization and move on instead of halting the batch. */
  readonly continueOnError?: boolean;
}

export interface ExtractRecordsResult {
  readonly records: readonly ContactRecord[];
  readonly failures: readonly ExtractionFailure[];
}

export interface RunExtractionOptions extends ExtractRecordsOptions {
  readonly configPath: string;
  readonly outputDirectory?: string;
}

export interface RunExtractionResult extends ExtractRecordsResult {
  readonly organizations: number;
  readonly outputPath: string;
}

const toFailure = (organization: string, error: Error): ExtractionFailure => ({
  organization,
  kind: error.name,
  message: error.message,
  field: error instanceof MissingFieldError ? error.field : undefined
});

export class ContactExtractionService {
  private readonly pages: PageSource;
  private readonly logger: Logger;
  private readonly outputDirectory: string;
  private readonly now: () => Date;

  constructor(options: ContactExtractionServiceOptions) {
    this.pages = options.pages;
    this.logger = options.logger;
    this.outputDirectory = options.outputDirectory;
    this.now = options.now ?? (() => new Date());
  }

  async loadConfig(configPath: string): Promise<ReadonlyMap<string, OrganizationConfig>> {
    return new LocalFileSystemConfigStore({ path: configPath }).list();
  }

  /**
   * Builds one record per organization, in order. By default the first
   * failure aborts the batch; with `continueOnError` it is logged and
   * returned alongside the records that succeeded.
   */
  async extractRecords(
    organizations: ReadonlyMap<string, OrganizationConfig>,
    options: ExtractRecordsOptions = {}
  ): Promise<ExtractRecordsResult> {
    const records: ContactRecord[] = [];
    const failures: ExtractionFailure[] = [];
    const total = organizations.size;
    let index = 0;

    for (const [organization, config] of organizations) {
      index += 1;
      this.logger.info({ step: '2/5', organization, index, total }, `Scraping ${organization} (${index}/${total})`);

      try {
        records.push(await buildContactRecord(config, { pages: this.pages }));
      } catch (error) {
        if (!options.continueOnError || !(error instanceof Error)) {
          throw error;
        }
        const failure = toFailure(organization, error);
        this.logger.error({ organization, kind: failure.kind, field: failure.field }, failure.message);
        failures.push(failure);
      }
    }

    return { records, failures };
  }

  async run(options: RunExtractionOptions): Promise<RunExtractionResult> {
    const configPath = resolve(options.configPath);
    this.logger.info({ step: '1/5', configPath }, 'Loading config');
    const organizations = await this.loadConfig(configPath);

    const { records, failures } = await this.extractRecords(organizations, options);
    this.logger.info(
      { step: '3/5', records: records.length, failures: failures.length },
      `Validation passed for ${records.length} organization(s); preparing report`
    );

    const outputPath = resolveReportPath(resolve(options.outputDirectory ?? this.outputDirectory), this.now());
    this.logger.info({ step: '4/5', outputPath }, 'Writing report');
    await writeContactReport(outputPath, records);

    this.logger.info({ step: '5/5', rows: records.length, outputPath }, `Saved ${records.length} row(s)`);
    return { organizations: organizations.size, records, failures, outputPath };
  }
}
