/**
 * URL Normalization Utilities
 * Canonical URL form used for de-duplication across discovery phases
 */

/**
 * Normalize a URL to scheme + host + path, dropping query, fragment and trailing slashes
 */
export function normalizeUrl(url: string, baseUrl?: string): string {
  try {
    const urlObj = baseUrl ? new URL(url, baseUrl) : new URL(url);
    const normalized = `${urlObj.protocol}//${urlObj.host}${urlObj.pathname}`;
    return normalized.replace(/\/+$/, '');
  } catch {
    // Unparseable: strip what we can by hand
    return url.split('#')[0].split('?')[0].trim().replace(/\/+$/, '');
  }
}

/**
 * Check whether two URLs address the same page once normalized
 */
export function isDuplicate(url1: string, url2: string): boolean {
  return normalizeUrl(url1) === normalizeUrl(url2);
}

/**
 * Resolve relative URL to absolute
 */
export function resolveUrl(url: string, baseUrl: string): string {
  try {
    if (url.startsWith('http://') || url.startsWith('https://')) {
      return url;
    }
    return new URL(url, baseUrl).href;
  } catch {
    return url;
  }
}

/**
 * Extract host (with port) from URL, lowercased
 */
export function extractDomain(url: string): string {
  try {
    return new URL(url).host.toLowerCase();
  } catch {
    return '';
  }
}

/**
 * Parse a URL that may be relative; relative URLs come back with an empty host
 */
export function parseLooseUrl(url: string): { protocol: string; host: string; pathname: string } {
  try {
    const urlObj = new URL(url);
    return { protocol: urlObj.protocol, host: urlObj.host.toLowerCase(), pathname: urlObj.pathname };
  } catch {
    try {
      const urlObj = new URL(url, 'http://relative.invalid');
      return { protocol: '', host: '', pathname: urlObj.pathname };
    } catch {
      return { protocol: '', host: '', pathname: '' };
    }
  }
}

/**
 * Build the sitemap.xml address at the site root
 */
export function sitemapUrlFor(startUrl: string): string {
  return new URL('/sitemap.xml', startUrl).href;
}

/**
 * Short slug for file names, e.g. "https://www.tarf.economia.df.gov.br" -> "tarf"
 */
export function siteSlug(url: string): string {
  let host = extractDomain(url).split(':')[0];
  if (host.startsWith('www.')) {
    host = host.substring(4);
  }
  return host.split('.')[0] || 'site';
}
