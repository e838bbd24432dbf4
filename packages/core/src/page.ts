export type MetaAttribute = 'property' | 'name';

/**
 * Query surface the engine needs from a parsed page. Implementations decide
 * how markup is parsed; every method returns raw (untrimmed) text.
 */
export interface PageDocument {
  readonly url: string;
  getMetaContent(attribute: MetaAttribute, key: string): string | undefined;
  getTitleText(): string | undefined;
  getFirstHeadingText(): string | undefined;
  /** Tag-free text with whitespace collapsed to single spaces. */
  getVisibleText(): string;
}

export interface PageSource {
  load(url: string): Promise<PageDocument>;
}

export interface PageCache extends PageSource {
  has(url: string): boolean;
  readonly size: number;
}

/**
 * Memoizes `source` by URL for the lifetime of one organization. A failed
 * load is not cached, so the error surfaces to every caller that asks.
 */
export function createPageCache(source: PageSource): PageCache {
  const pages = new Map<string, Promise<PageDocument>>();

  return {
    load(url) {
      const cached = pages.get(url);
      if (cached) {
        return cached;
      }
      const pending = source.load(url);
      pages.set(url, pending);
      void pending.catch(() => {
        pages.delete(url);
      });
      return pending;
    },
    has(url) {
      return pages.has(url);
    },
    get size() {
      return pages.size;
    }
  };
}
