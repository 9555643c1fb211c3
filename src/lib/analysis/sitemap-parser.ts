/**
 * Sitemap Parser
 * Reads <loc> entries from sitemap and sitemap-index documents
 */

import { DOMParser } from '@xmldom/xmldom';
import { CrawlError, CrawlErrorType } from '../crawling/crawl.errors';

/**
 * Every <loc> value in document order, whatever namespace the sitemap uses.
 * Throws a PARSE_FAILURE CrawlError on malformed XML.
 */
export function parseSitemapLocations(xml: string, sitemapUrl?: string): string[] {
  const errors: string[] = [];
  const parser = new DOMParser({
    errorHandler: {
      error: (msg: string) => {
        errors.push(msg);
      },
      fatalError: (msg: string) => {
        errors.push(msg);
      },
    },
  });

  const locations: string[] = [];
  try {
    const doc = parser.parseFromString(xml, 'text/xml');
    if (!doc || !doc.documentElement) {
      errors.push('Empty document');
    } else {
      const nodes = doc.getElementsByTagNameNS('*', 'loc');
      for (let i = 0; i < nodes.length; i++) {
        const value = (nodes[i].textContent || '').trim();
        if (value) {
          locations.push(value);
        }
      }
    }
  } catch (error) {
    errors.push(error instanceof Error ? error.message : String(error));
  }

  if (errors.length > 0) {
    throw new CrawlError(
      CrawlErrorType.PARSE_FAILURE,
      `Malformed sitemap XML: ${errors[0]}`,
      sitemapUrl
    );
  }

  return locations;
}
