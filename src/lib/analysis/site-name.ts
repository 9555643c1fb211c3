/**
 * Site name discovery from the homepage <title>
 */

import * as cheerio from 'cheerio';
import { cleanText } from './markup-node';

const TITLE_SEPARATORS = [' - ', ' | '];

/**
 * Cut a page title at its last " - " or " | " separator.
 * "Example Agency - Official Site" -> "Example Agency"
 */
export function stripTitleSuffix(title: string): string {
  const cleaned = cleanText(title);
  const cut = Math.max(...TITLE_SEPARATORS.map((separator) => cleaned.lastIndexOf(separator)));
  return cut > 0 ? cleaned.substring(0, cut).trim() : cleaned;
}

/**
 * Site display name from homepage markup; null when there is no usable title
 */
export function extractSiteName(html: string): string | null {
  const $ = cheerio.load(html);
  const title = $('title').first().text();
  const siteName = stripTitleSuffix(title);
  return siteName.length > 0 ? siteName : null;
}
