import { readFile } from 'node:fs/promises';
import { extname, resolve } from 'node:path';

import { parse as parseYaml, YAMLParseError } from 'yaml';

import { ConfigError, compileConfigDocument, type OrganizationConfig } from '@ngo-contacts/core';

import type { ConfigFormat, OrganizationConfigStore } from './types.js';

const FORMAT_BY_EXTENSION: Readonly<Record<string, ConfigFormat>> = {
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.json': 'json'
};

const isNotFound = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
};

export const detectConfigFormat = (path: string): ConfigFormat => {
  const format = FORMAT_BY_EXTENSION[extname(path).toLowerCase()];
  if (!format) {
    throw new ConfigError(path, [`Unsupported configuration format "${extname(path) || path}"; use .yaml, .yml or .json`]);
  }
  return format;
};

const parseDocument = (raw: string, format: ConfigFormat, source: string): unknown => {
  try {
    return format === 'yaml' ? parseYaml(raw) : JSON.parse(raw);
  } catch (error) {
    if (error instanceof YAMLParseError || error instanceof SyntaxError) {
      throw new ConfigError(source, [error.message]);
    }
    throw error;
  }
};

export interface LocalFileSystemConfigStoreOptions {
  readonly path: string;
  /** Base directory for relative paths. Defaults to the process working directory. */
  readonly cwd?: string;
}

/**
 * Reads the organization mapping from a single YAML or JSON document. The
 * file is read once and the compiled mapping reused on later calls.
 */
export class LocalFileSystemConfigStore implements OrganizationConfigStore {
  readonly source: string;
  private readonly format: ConfigFormat;
  private loaded: Promise<ReadonlyMap<string, OrganizationConfig>> | undefined;

  constructor(options: LocalFileSystemConfigStoreOptions) {
    this.source = resolve(options.cwd ?? process.cwd(), options.path);
    this.format = detectConfigFormat(this.source);
  }

  list(): Promise<ReadonlyMap<string, OrganizationConfig>> {
    if (!this.loaded) {
      this.loaded = this.read().catch((error: unknown) => {
        this.loaded = undefined;
        throw error;
      });
    }
    return this.loaded;
  }

  async getById(id: string): Promise<OrganizationConfig | undefined> {
    const organizations = await this.list();
    return organizations.get(id);
  }

  private async read(): Promise<ReadonlyMap<string, OrganizationConfig>> {
    let raw: string;
    try {
      raw = await readFile(this.source, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        throw new ConfigError(this.source, ['Configuration file not found']);
      }
      throw error;
    }

    return compileConfigDocument(parseDocument(raw, this.format, this.source), this.source);
  }
}

export const loadOrganizationConfigs = (
  path: string,
  options: Omit<LocalFileSystemConfigStoreOptions, 'path'> = {}
): Promise<ReadonlyMap<string, OrganizationConfig>> => {
  return new LocalFileSystemConfigStore({ ...options, path }).list();
};
