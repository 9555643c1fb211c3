/**
 * Sitemap Parser Tests
 */

import { parseSitemapLocations } from '../sitemap-parser';
import { CrawlError, CrawlErrorType } from '../../crawling/crawl.errors';
import { emptySitemapXml, sitemapIndexXml } from '../../../__tests__/helpers/fixtures';

function parseError(xml: string): unknown {
  try {
    parseSitemapLocations(xml, 'https://www.agency.df.gov.br/sitemap.xml');
  } catch (error) {
    return error;
  }
  return null;
}

describe('parseSitemapLocations', () => {
  it('should read page locations in document order', () => {
    const xml = `<?xml version="1.0"?>
      <urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
        <url><loc>
          https://www.agency.df.gov.br/b
        </loc></url>
        <url><loc>https://www.agency.df.gov.br/a</loc><lastmod>2024-01-01</lastmod></url>
        <url><loc></loc></url>
      </urlset>`;

    expect(parseSitemapLocations(xml)).toEqual([
      'https://www.agency.df.gov.br/b',
      'https://www.agency.df.gov.br/a',
    ]);
  });

  it('should read sitemap index entries', () => {
    expect(parseSitemapLocations(sitemapIndexXml)).toEqual([
      'https://www.agency.df.gov.br/page-sitemap.xml',
    ]);
  });

  it('should read prefixed elements', () => {
    const xml = `<s:urlset xmlns:s="http://www.sitemaps.org/schemas/sitemap/0.9">
      <s:url><s:loc>https://www.agency.df.gov.br/x</s:loc></s:url>
    </s:urlset>`;

    expect(parseSitemapLocations(xml)).toEqual(['https://www.agency.df.gov.br/x']);
  });

  it('should return an empty list for a sitemap without locations', () => {
    expect(parseSitemapLocations(emptySitemapXml)).toEqual([]);
  });

  it('should raise a parse failure on malformed XML', () => {
    const error = parseError('<urlset><url><loc>https://x</loc></urlset>');

    expect(error).toBeInstanceOf(CrawlError);
    if (error instanceof CrawlError) {
      expect(error.type).toBe(CrawlErrorType.PARSE_FAILURE);
      expect(error.url).toBe('https://www.agency.df.gov.br/sitemap.xml');
      expect(error.message).toMatch(/^Malformed sitemap XML: /);
    }
  });

  it('should raise a parse failure on a document without elements', () => {
    const error = parseError('this is not xml');

    expect(error).toBeInstanceOf(CrawlError);
    if (error instanceof CrawlError) {
      expect(error.type).toBe(CrawlErrorType.PARSE_FAILURE);
    }
  });
});
