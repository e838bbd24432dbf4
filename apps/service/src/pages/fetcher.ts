import { FetchError, type PageSource } from '@ngo-contacts/core';

import { parsePage } from './cheerio-page.js';

export interface FetchSettings {
  readonly userAgent: string;
  readonly timeoutMs: number;
}

export interface FetchedPage {
  readonly url: string;
  readonly status: number;
  readonly html: string;
}

const errorName = (error: unknown): string | undefined => {
  return typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string'
    ? error.name
    : undefined;
};

const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const toFetchError = (url: string, error: unknown, settings: FetchSettings): FetchError => {
  const name = errorName(error);
  if (name === 'TimeoutError' || name === 'AbortError') {
    return new FetchError(url, `Timed out after ${settings.timeoutMs}ms fetching ${url}`, { cause: error });
  }
  return new FetchError(url, `Failed to fetch ${url}: ${describeError(error)}`, { cause: error });
};

/**
 * Fetches a page once. Non-2xx responses, timeouts and network failures
 * become a `FetchError`; nothing is retried.
 */
export const fetchPage = async (url: string, settings: FetchSettings): Promise<FetchedPage> => {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new FetchError(url, `Invalid page URL ${url}: ${describeError(error)}`, { cause: error });
  }

  let response: Response;
  try {
    response = await fetch(parsed.toString(), {
      headers: {
        'user-agent': settings.userAgent,
        accept: 'text/html,application/xhtml+xml;q=0.9,*/*;q=0.1'
      },
      signal: AbortSignal.timeout(settings.timeoutMs)
    });
  } catch (error) {
    throw toFetchError(url, error, settings);
  }

  if (!response.ok) {
    throw new FetchError(url, `Failed to fetch ${url}: ${response.status} ${response.statusText}`.trim(), {
      status: response.status
    });
  }

  // The timeout signal also covers reading the body.
  let html: string;
  try {
    html = await response.text();
  } catch (error) {
    throw toFetchError(url, error, settings);
  }

  return {
    url,
    status: response.status,
    html
  };
};

export const createHttpPageSource = (settings: FetchSettings): PageSource => ({
  async load(url) {
    const page = await fetchPage(url, settings);
    return parsePage(url, page.html);
  }
});
