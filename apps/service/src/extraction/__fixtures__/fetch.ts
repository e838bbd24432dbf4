import { vi } from 'vitest';

const requestUrl = (input: string | URL | Request): string => {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.toString() : input.url;
};

/**
 * Serves `pages` (markup keyed by URL) through the global `fetch`; any other
 * URL answers 404.
 */
export const stubFetchWithPages = (pages: ReadonlyMap<string, string>) => {
  return vi.spyOn(globalThis, 'fetch').mockImplementation((input) => {
    const html = pages.get(requestUrl(input));
    return Promise.resolve(
      html === undefined
        ? new Response('Not Found', { status: 404, statusText: 'Not Found' })
        : new Response(html, { status: 200, headers: { 'content-type': 'text/html' } })
    );
  });
};
