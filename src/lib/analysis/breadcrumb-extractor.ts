/**
 * Breadcrumb Extractor
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { cleanText, firstElement } from './markup-node';

const BREADCRUMB_SELECTORS = [
  'div.breadcrumbs',
  'div.breadcrumb',
  'ul.breadcrumb',
  'nav.breadcrumb',
  'div#breadcrumbs',
  'ol.breadcrumb',
  'nav[aria-label="Breadcrumb"]',
];

const HOME_LABELS = ['home', 'início', 'principal'];

/**
 * Read the breadcrumb trail as [siteName, ...titles].
 * Returns null when no trail (or only the root) is found.
 */
export function extractBreadcrumb($: CheerioAPI, siteName: string): string[] | null {
  let breadcrumb: Cheerio<Element> | null = null;

  for (const selector of BREADCRUMB_SELECTORS) {
    breadcrumb = firstElement($, selector);
    if (breadcrumb) break;
  }

  if (!breadcrumb) {
    // Any container with "bread" in one of its classes
    const byClass = $('div, nav, ul, ol')
      .filter((_, el) =>
        ($(el).attr('class') || '')
          .split(/\s+/)
          .some((name) => name.toLowerCase().includes('bread'))
      )
      .first();
    breadcrumb = byClass.length > 0 ? byClass : null;
  }

  if (!breadcrumb) {
    return null;
  }

  const ignored = [...HOME_LABELS, siteName.toLowerCase()];
  const hierarchy = [siteName];

  let links = breadcrumb.find('a').toArray();
  if (links.length > 0) {
    const firstText = cleanText($(links[0]).text()).toLowerCase();
    if (HOME_LABELS.some((label) => firstText.includes(label))) {
      links = links.slice(1);
    }
  }

  for (const link of links) {
    const title = cleanText($(link).text());
    if (title && !ignored.includes(title.toLowerCase())) {
      hierarchy.push(title);
    }
  }

  // The current page is usually plain text rather than a link
  let current = breadcrumb.find('span.current, span.current-item, span.active, strong.current, strong.current-item, strong.active, li.current, li.current-item, li.active').first();
  if (current.length === 0) {
    current = breadcrumb.find('span, strong, li').last();
  }

  if (current.length > 0) {
    const currentText = cleanText(current.text());
    if (
      currentText &&
      !ignored.includes(currentText.toLowerCase()) &&
      hierarchy[hierarchy.length - 1] !== currentText
    ) {
      hierarchy.push(currentText);
    }
  }

  return hierarchy.length > 1 ? hierarchy : null;
}
