import type { OrganizationConfig } from '@ngo-contacts/core';

export type ConfigFormat = 'yaml' | 'json';

export interface OrganizationConfigStore {
  /** Absolute path of the backing document. */
  readonly source: string;
  list(): Promise<ReadonlyMap<string, OrganizationConfig>>;
  getById(id: string): Promise<OrganizationConfig | undefined>;
}
