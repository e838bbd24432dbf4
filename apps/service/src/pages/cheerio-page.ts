import { load, type CheerioAPI } from 'cheerio';
import { ElementType } from 'domelementtype';
import type { AnyNode, Element, Text } from 'domhandler';

import type { MetaAttribute, PageDocument } from '@ngo-contacts/core';

// Script and style elements carry their own node types and are skipped already.
// Noscript fallback text stays visible.
const HIDDEN_TAGS = new Set(['template']);

const collapseWhitespace = (value: string): string => value.replace(/\s+/g, ' ').trim();

const isElementNode = (node: AnyNode): node is Element => node.type === ElementType.Tag;

const isTextNode = (node: AnyNode): node is Text => node.type === ElementType.Text;

const collectText = (nodes: readonly AnyNode[], parts: string[]): string[] => {
  for (const node of nodes) {
    if (isTextNode(node)) {
      const text = collapseWhitespace(node.data);
      if (text) {
        parts.push(text);
      }
    } else if (isElementNode(node) && !HIDDEN_TAGS.has(node.name)) {
      collectText(node.children, parts);
    }
  }
  return parts;
};

/** Text of every visible node under `nodes`, one space between nodes. */
export const extractText = (nodes: readonly AnyNode[]): string => collectText(nodes, []).join(' ');

const escapeAttributeValue = (value: string): string => value.replace(/["\\]/g, '\\$&');

export class CheerioPageDocument implements PageDocument {
  readonly url: string;
  private readonly $: CheerioAPI;
  private visibleText: string | undefined;

  constructor(url: string, html: string) {
    this.url = url;
    this.$ = load(html);
  }

  getMetaContent(attribute: MetaAttribute, key: string): string | undefined {
    return this.$(`meta[${attribute}="${escapeAttributeValue(key)}"]`).first().attr('content');
  }

  getTitleText(): string | undefined {
    const title = this.$('title').first();
    return title.length > 0 ? title.text() : undefined;
  }

  getFirstHeadingText(): string | undefined {
    const heading = this.$('h1').first();
    return heading.length > 0 ? extractText(heading.contents().toArray()) : undefined;
  }

  getVisibleText(): string {
    if (this.visibleText === undefined) {
      this.visibleText = extractText(this.$.root().contents().toArray());
    }
    return this.visibleText;
  }
}

export const parsePage = (url: string, html: string): PageDocument => new CheerioPageDocument(url, html);
