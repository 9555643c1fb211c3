/**
 * Link Discoverer
 * Internal page links worth following from a fetched page
 */

import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { cleanText, selectElements } from '../analysis/markup-node';
import { UrlClassifier } from './url-classifier';
import { normalizeUrl, resolveUrl } from './url-normalizer';

const LINK_CONTAINER_SELECTOR = ['div', 'section', 'article']
  .flatMap((tag) =>
    ['paginas-internas', 'content', 'main-content', 'container'].map((name) => `${tag}.${name}`)
  )
  .join(', ');

const HEADING_TAGS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6'];

export interface DiscoveredLink {
  url: string;
  title: string;
}

export class LinkDiscoverer {
  private readonly homepage: string;

  constructor(
    private readonly classifier: UrlClassifier,
    homepageUrl: string
  ) {
    this.homepage = normalizeUrl(homepageUrl);
  }

  /**
   * Candidate links from the page's content containers (or <body>).
   * Homepage, invalid, file and other-government links are dropped, as are
   * links whose title cannot be determined. Already-seen URLs are filtered
   * through isKnown; the caller still claims each link before following it.
   */
  discoverLinks(
    $: CheerioAPI,
    pageUrl: string,
    isKnown: (url: string) => boolean = () => false
  ): DiscoveredLink[] {
    const links: DiscoveredLink[] = [];
    const seen = new Set<string>();
    const order = new DocumentOrder($);

    let containers = selectElements($, LINK_CONTAINER_SELECTOR);
    if (containers.length === 0) {
      containers = selectElements($, 'body');
    }

    for (const container of containers) {
      $(container)
        .find('a[href]')
        .each((_, el) => {
          const href = ($(el).attr('href') || '').trim();
          if (!href) return;

          const url = resolveUrl(href, pageUrl);
          const normalized = normalizeUrl(url);

          if (
            normalized === this.homepage ||
            seen.has(normalized) ||
            isKnown(url) ||
            !this.classifier.isValidUrl(url) ||
            this.classifier.isInternalFile(url) ||
            this.classifier.isExternalGovLink(url)
          ) {
            return;
          }

          const title = extractLinkTitle($, el, order);
          if (!title) return;

          seen.add(normalized);
          links.push({ url, title });
        });
    }

    return links;
  }
}

/**
 * Title for a link: its text, an enclosing heading, the nearest heading
 * before or after it, the title attribute, then an image's alt text
 */
export function extractLinkTitle(
  $: CheerioAPI,
  link: Element,
  order: DocumentOrder = new DocumentOrder($)
): string | null {
  const text = cleanText($(link).text());
  if (text) return text;

  const parent = $(link).parent();
  const parentElement = parent.get(0);
  if (parentElement) {
    if (HEADING_TAGS.includes(parentElement.tagName.toLowerCase())) {
      const headingText = cleanText(parent.text());
      if (headingText) return headingText;
    }

    const previous = order.previousHeading(parentElement);
    if (previous) {
      const previousText = cleanText($(previous).text());
      if (previousText) return previousText;
    }

    const next = order.nextHeading(parentElement);
    if (next) {
      const nextText = cleanText($(next).text());
      if (nextText) return nextText;
    }
  }

  const titleAttribute = ($(link).attr('title') || '').trim();
  if (titleAttribute) return titleAttribute;

  const alt = ($(link).find('img').first().attr('alt') || '').trim();
  return alt || null;
}

/**
 * Position of every element in document order, built on first use
 */
export class DocumentOrder {
  private positions: Map<Element, number> | null = null;
  private headings: Element[] = [];

  constructor(private readonly $: CheerioAPI) {}

  previousHeading(element: Element): Element | null {
    const position = this.positionOf(element);
    let found: Element | null = null;
    for (const heading of this.headings) {
      if (this.positionOf(heading) >= position) break;
      found = heading;
    }
    return found;
  }

  nextHeading(element: Element): Element | null {
    const position = this.positionOf(element);
    return this.headings.find((heading) => this.positionOf(heading) > position) ?? null;
  }

  private positionOf(element: Element): number {
    if (!this.positions) {
      this.index();
    }
    return this.positions?.get(element) ?? -1;
  }

  private index(): void {
    const positions = new Map<Element, number>();
    selectElements(this.$, '*').forEach((el, i) => {
      positions.set(el, i);
    });
    this.positions = positions;
    this.headings = selectElements(this.$, HEADING_TAGS.join(', '));
  }
}

