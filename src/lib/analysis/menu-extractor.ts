/**
 * Menu Extractor
 * Finds the primary navigation and infers a hierarchy for each of its links
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { UrlClassifier } from '../crawling/url-classifier';
import { resolveUrl } from '../crawling/url-normalizer';
import {
  DomMarkupNode,
  MarkupNode,
  cleanText,
  firstElement,
  hasAnyClass,
  previousElementSibling,
} from './markup-node';

/**
 * Primary navigation candidates, tried in order
 */
export const MENU_SELECTORS = [
  'ul#primary-menu',
  'nav#site-navigation',
  'ul.menu',
  'nav.main-navigation',
  'div.menu-principal-container',
  'div.navbar-collapse',
  'header#header',
  'div.header-menu',
];

const MENU_ITEM_TAGS = ['li', 'div'];
const MENU_ITEM_CLASSES = ['menu-item', 'dropdown'];
const SUBMENU_TAGS = ['ul', 'div'];
const SUBMENU_CLASSES = ['sub-menu', 'dropdown-menu', 'submenu'];
const MAX_ANCESTOR_LEVELS = 5;

export interface MenuItem {
  url: string;
  title: string;
  hierarchy: string[];
}

/**
 * Infer [rootLabel, ...parents, title] for a menu link by walking up to five
 * ancestors looking for enclosing menu items and submenus.
 */
export function inferMenuHierarchy(link: MarkupNode, rootLabel: string): string[] {
  const title = link.text();
  if (!title) {
    return [rootLabel];
  }

  const parentTitles: string[] = [];
  const addParent = (candidate: MarkupNode | null | undefined): void => {
    if (!candidate || candidate.isSameNode(link)) return;
    const parentTitle = candidate.text();
    // Nested li > a + ul.sub-menu reports the same parent twice
    if (parentTitle && parentTitle !== title && parentTitles[0] !== parentTitle) {
      parentTitles.unshift(parentTitle);
    }
  };

  let current = link.parent();
  let depth = 0;

  while (current && depth < MAX_ANCESTOR_LEVELS) {
    if (MENU_ITEM_TAGS.includes(current.tagName) && hasAnyClass(current, MENU_ITEM_CLASSES)) {
      addParent(current.children().find((child) => child.tagName === 'a'));
    } else if (SUBMENU_TAGS.includes(current.tagName) && hasAnyClass(current, SUBMENU_CLASSES)) {
      const previous = previousElementSibling(current);
      if (previous && previous.tagName === 'a') {
        addParent(previous);
      }
    }

    current = current.parent();
    depth++;
  }

  return [rootLabel, ...parentTitles, title];
}

/**
 * Locate the primary navigation region; null when the page has none
 */
export function findPrimaryMenu($: CheerioAPI): cheerio.Cheerio<Element> | null {
  for (const selector of MENU_SELECTORS) {
    const menu = firstElement($, selector);
    if (menu) {
      console.log(`Primary menu found with selector ${selector}`);
      return menu;
    }
  }

  const nav = firstElement($, 'nav');
  if (nav) {
    console.log('Primary menu found via <nav>');
    return nav;
  }

  return null;
}

/**
 * Every usable link in the menu with its inferred hierarchy
 */
export function extractMenuItems(
  $: CheerioAPI,
  menu: cheerio.Cheerio<Element>,
  startUrl: string,
  rootLabel: string,
  classifier: UrlClassifier
): MenuItem[] {
  const items: MenuItem[] = [];

  menu.find('a[href]').each((_, el) => {
    const href = ($(el).attr('href') || '').trim();
    const title = cleanText($(el).text());

    if (!href || !title) return;
    if (classifier.isExternalGovLink(href) || classifier.isInternalFile(href)) return;

    items.push({
      url: resolveUrl(href, startUrl),
      title,
      hierarchy: inferMenuHierarchy(new DomMarkupNode($, el), rootLabel),
    });
  });

  console.log(`Extracted ${items.length} menu links`);
  return items;
}
