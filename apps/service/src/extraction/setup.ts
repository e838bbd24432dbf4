import type { PageSource } from '@ngo-contacts/core';

import { loadServiceSettings, type ServiceSettings } from '../config.js';
import { createLogger, type Logger } from '../logger.js';
import { createHttpPageSource } from '../pages/fetcher.js';
import { ContactExtractionService } from './service.js';

export interface CreateExtractionServiceOptions {
  readonly settings?: ServiceSettings;
  readonly logger?: Logger;
  readonly pages?: PageSource;
  readonly now?: () => Date;
}

export const createExtractionService = (
  options: CreateExtractionServiceOptions = {}
): ContactExtractionService => {
  const settings = options.settings ?? loadServiceSettings();
  return new ContactExtractionService({
    pages: options.pages ?? createHttpPageSource(settings.fetch),
    logger: options.logger ?? createLogger({ level: settings.logLevel }),
    outputDirectory: settings.outputDirectory,
    now: options.now
  });
};
