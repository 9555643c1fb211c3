/**
 * URL Classifier
 * Stateless predicates over URLs for a single crawled domain
 */

import { parseLooseUrl } from './url-normalizer';

const BLOCKED_PAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.pdf', '.doc', '.docx'];
const BLOCKED_PAGE_PATHS = ['wp-content', 'wp-includes'];

const FILE_EXTENSIONS = [
  '.pdf', '.doc', '.docx', '.xls', '.xlsx', '.zip',
  '.jpg', '.jpeg', '.png', '.gif', '.mp4', '.mp3',
  '.wav', '.pptx', '.txt',
];
const UPLOAD_PATH_PATTERNS = ['/documents/', '/wp-content/', '/wp-conteudo/'];

const NEWS_PATH_INDICATORS = [
  '/category/noticias',
  '/noticias/',
  '/todas-as-noticias',
  '/category/servicos-ao-cidadao',
  '/category/modulo-destaques',
];

export const NEWS_CATEGORIES = [
  'Notícias',
  'Destaques principais',
  'Destaques secretaria',
  'Destaques sem foto',
  'Destaque',
  'Todas as notícias',
  'Destaques principais carrossel',
  'Notícias da secretaria',
  'Módulo destaques da secretaria',
  'Módulo carrossel de destaques principais',
  'Módulo destaques sem foto - fundo azul',
  'Módulo destaques sem foto-fundo azul',
  'Módulo destaques com fotos - fundo azul',
  'Módulo destaques do TARF',
  'modulo-15-botoes',
  'Categoria',
  'A secretária',
  'Sala de imprensa',
  'Secretaria na mídia',
  'Notícias do TARF',
  'Carrossel de destaques',
];

/**
 * Lowercase, trim and strip diacritics
 */
export function canonicalizeText(text: string): string {
  return text.trim().toLowerCase().normalize('NFKD').replace(/\p{M}/gu, '');
}

export class UrlClassifier {
  private readonly domain: string;
  private readonly newsCategories: Set<string>;

  constructor(
    domain: string,
    private readonly govDomainSuffixes: string[] = ['.df.gov.br'],
    newsCategories: string[] = NEWS_CATEGORIES
  ) {
    this.domain = domain.toLowerCase();
    this.newsCategories = new Set(newsCategories.map(canonicalizeText));
  }

  /**
   * Absolute http(s) page URL on the crawled domain
   */
  isValidUrl(url: string): boolean {
    if (!url) return false;

    const parsed = parseLooseUrl(url);
    const lower = url.toLowerCase();

    return (
      (parsed.protocol === 'http:' || parsed.protocol === 'https:') &&
      this.isOwnHost(parsed.host) &&
      !url.includes('#') &&
      !BLOCKED_PAGE_PATHS.some((pattern) => lower.includes(pattern)) &&
      !BLOCKED_PAGE_EXTENSIONS.some((ext) => lower.includes(ext))
    );
  }

  /**
   * Document or media hosted by the crawled site (or a relative link to one)
   */
  isInternalFile(url: string): boolean {
    if (!url) return false;

    const parsed = parseLooseUrl(url);
    const path = parsed.pathname.toLowerCase();

    const isFile = FILE_EXTENSIONS.some((ext) => path.endsWith(ext));
    const isUpload = UPLOAD_PATH_PATTERNS.some((pattern) => path.includes(pattern));

    return this.isOwnHost(parsed.host) && (isFile || isUpload);
  }

  /**
   * Link to another government site
   */
  isExternalGovLink(url: string): boolean {
    const host = parseLooseUrl(url).host;
    if (!host) return false;

    const isGov = this.govDomainSuffixes.some((suffix) => host.includes(suffix.toLowerCase()));
    return isGov && host !== this.domain;
  }

  isNewsUrl(url: string): boolean {
    const path = parseLooseUrl(url).pathname.toLowerCase();
    return NEWS_PATH_INDICATORS.some((indicator) => path.includes(indicator));
  }

  /**
   * True when any breadcrumb segment names a news category
   */
  isNewsBreadcrumb(parts: string[] | null | undefined): boolean {
    if (!parts || parts.length === 0) return false;
    return parts.some((part) => this.newsCategories.has(canonicalizeText(part)));
  }

  private isOwnHost(host: string): boolean {
    return host === '' || host === this.domain;
  }
}
