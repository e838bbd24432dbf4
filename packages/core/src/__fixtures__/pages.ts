import { FetchError } from '../errors.js';
import type { MetaAttribute, PageDocument, PageSource } from '../page.js';

export interface StubPageInit {
  readonly text?: string;
  readonly title?: string;
  readonly heading?: string;
  readonly meta?: Partial<Record<MetaAttribute, Record<string, string>>>;
}

export const createStubPage = (url: string, init: StubPageInit = {}): PageDocument => ({
  url,
  getMetaContent: (attribute, key) => init.meta?.[attribute]?.[key],
  getTitleText: () => init.title,
  getFirstHeadingText: () => init.heading,
  getVisibleText: () => init.text ?? ''
});

export interface StubPageSource extends PageSource {
  readonly requests: readonly string[];
}

/** Serves pages from memory and records every URL it was asked for. */
export const createStubPageSource = (pages: Record<string, StubPageInit>): StubPageSource => {
  const requests: string[] = [];
  return {
    requests,
    load(url) {
      requests.push(url);
      const init = pages[url];
      if (!init) {
        return Promise.reject(new FetchError(url, `404 Not Found: ${url}`, { status: 404 }));
      }
      return Promise.resolve(createStubPage(url, init));
    }
  };
};
