import type { ContactRecordField } from './record.js';

/**
 * Raised by page sources when a document cannot be retrieved: a non-2xx
 * response, a timeout or a network failure. Never retried by the engine.
 */
export class FetchError extends Error {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.url = url;
    this.status = options.status;
  }
}

export class MissingFieldError extends Error {
  readonly organization: string;
  readonly field: ContactRecordField;

  constructor(organization: string, field: ContactRecordField) {
    super(`${organization}: missing required field -> ${field}`);
    this.name = 'MissingFieldError';
    this.organization = organization;
    this.field = field;
  }
}

/**
 * Configuration could not be read, parsed or compiled. `issues` holds one
 * `path: message` line per problem.
 */
export class ConfigError extends Error {
  readonly source: string;
  readonly issues: readonly string[];

  constructor(source: string, issues: readonly string[]) {
    super(`Invalid configuration (${source}): ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.source = source;
    this.issues = issues;
  }
}
