/**
 * Content Analyzer
 * Heuristic layout, attention-point and content-count signals for a page.
 * Best effort: unknown markup leaves the defaults in place.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { AttentionFlag, PageLayout, PageRecord } from '../crawling/crawling.types';
import { clampContentCount } from '../crawling/page-record';
import { UrlClassifier } from '../crawling/url-classifier';
import { resolveUrl } from '../crawling/url-normalizer';
import { cleanText, firstElement } from './markup-node';

const CONTENT_CLASS_SELECTOR = '.paginas-internas, .conteudo, .content, .main-content';
const CONTENT_TAG_FALLBACKS = ['main', 'article', 'section', 'div'];

const COLLAPSIBLE_SELECTOR = ['div', 'section', 'article']
  .flatMap((tag) =>
    ['collapse', 'accordion', 'panel-collapse', 'panel-default', 'card', 'expandable'].map(
      (name) => `${tag}.${name}`
    )
  )
  .join(', ');

const CONTENT_ID_SELECTOR = '#conteudo, #content, #main-content';

const SIDE_MENU_SELECTOR = ['nav', 'div', 'aside']
  .flatMap((tag) =>
    ['menu', 'menu-lateral', 'menu-lateral-flutuante', 'sidebar', 'left-menu'].map(
      (name) => `${tag}.${name}`
    )
  )
  .join(', ');

const SIDE_MENU_TITLE_SELECTORS = ['h1', 'h2', 'h3', 'h4', 'h5', 'h6', '.title', '.menu-title'];

const MAIN_BODY_SELECTOR = '.corpo-principal, .main-body, .content-body';
const CONTENT_DIV_SELECTOR = 'div.section, div.content-section, div.widget';
const TABS_SELECTOR = 'div.tabs, div.tab-content, div.nav-tabs, ul.tabs, ul.tab-content, ul.nav-tabs';
const COMPLEX_TABLES_THRESHOLD = 2;

/**
 * Main content region: known content classes, then semantic tags, then <body>
 */
export function locateMainContent($: CheerioAPI): cheerio.Cheerio<Element> | null {
  for (const selector of [CONTENT_CLASS_SELECTOR, ...CONTENT_TAG_FALLBACKS, 'body']) {
    const region = firstElement($, selector);
    if (region) {
      return region;
    }
  }
  return null;
}

/**
 * Fill layout, attention flag, content count and file links on the record
 */
export function analyzeContent(
  $: CheerioAPI,
  url: string,
  record: PageRecord,
  classifier: UrlClassifier
): void {
  record.fileCount = 0;
  record.contentCount = 0;
  record.internalFileUrls.clear();
  record.externalGovFileUrls.clear();
  record.attentionFlag = AttentionFlag.NONE;
  record.sideMenuTitle = '-';

  const main = locateMainContent($);
  if (!main) {
    console.warn(`Could not find content on ${url}`);
    return;
  }

  const collapsibles = main.find(COLLAPSIBLE_SELECTOR);
  if (collapsibles.length > 0) {
    record.attentionFlag = AttentionFlag.HAS_COLLAPSIBLE;
  }

  let namedBlocks = 0;

  if (main.find(CONTENT_ID_SELECTOR).length > 0) {
    namedBlocks++;
  }

  const sideMenu = main.find(SIDE_MENU_SELECTOR).first();
  if (sideMenu.length > 0) {
    namedBlocks++;
    record.layout = PageLayout.THIRTY_SEVENTY;
    record.sideMenuTitle = extractSideMenuTitle(sideMenu);
  } else {
    record.layout = PageLayout.ONE_COLUMN;
  }

  if (main.find(MAIN_BODY_SELECTOR).length > 0) {
    namedBlocks++;
  }

  const sections = main.find('section, article');
  const contentDivs = main.find(CONTENT_DIV_SELECTOR);

  record.contentCount = clampContentCount(
    collapsibles.length + namedBlocks + sections.length + contentDivs.length
  );

  if (record.attentionFlag === AttentionFlag.NONE) {
    if (main.find(TABS_SELECTOR).length > 0) {
      record.attentionFlag = AttentionFlag.HAS_TABS;
    } else if (main.find('form').length > 0) {
      record.attentionFlag = AttentionFlag.HAS_FORM;
    } else if (main.find('table').length > COMPLEX_TABLES_THRESHOLD) {
      record.attentionFlag = AttentionFlag.HAS_COMPLEX_TABLES;
    }
  }

  collectFiles($, main, url, record, classifier);
}

function extractSideMenuTitle(sideMenu: cheerio.Cheerio<Element>): string {
  for (const selector of SIDE_MENU_TITLE_SELECTORS) {
    const heading = sideMenu.find(selector).first();
    if (heading.length > 0) {
      const title = cleanText(heading.text());
      return title || '-';
    }
  }
  return '-';
}

function collectFiles(
  $: CheerioAPI,
  container: cheerio.Cheerio<Element>,
  url: string,
  record: PageRecord,
  classifier: UrlClassifier
): void {
  container.find('a[href]').each((_, el) => {
    const href = ($(el).attr('href') || '').trim();
    if (!href) return;

    const fullUrl = resolveUrl(href, url);
    if (classifier.isInternalFile(fullUrl)) {
      record.internalFileUrls.add(fullUrl);
      record.fileCount++;
    } else if (classifier.isExternalGovLink(fullUrl)) {
      record.externalGovFileUrls.add(fullUrl);
    }
  });
}
