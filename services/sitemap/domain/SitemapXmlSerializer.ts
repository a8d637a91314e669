/**
 * SitemapXmlSerializer renders sitemap entries into sitemaps.org XML
 */

import { SitemapUrl } from '../../../shared/domain/models/SitemapUrl.js';

export const SITEMAP_CONTENT_TYPE = 'application/xml; charset=utf-8';

const XML_HEADER = '<?xml version="1.0" encoding="UTF-8"?>\n';
const URLSET_OPEN = '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9"';
const XHTML_NAMESPACE = '\n        xmlns:xhtml="http://www.w3.org/1999/xhtml"';
const URLSET_CLOSE = '</urlset>\n';
const SITEMAP_INDEX_OPEN = '<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">\n';
const SITEMAP_INDEX_CLOSE = '</sitemapindex>\n';

const XML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  "'": '&apos;',
  '"': '&quot;',
  '>': '&gt;',
  '<': '&lt;'
};

/**
 * Escape the five XML special characters in one pass.
 * Input must be raw text: an existing entity such as `&amp;` is escaped again.
 */
export function escapeXml(value: string | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  return value.replace(/[&'"><]/g, char => XML_ENTITIES[char] ?? char);
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a lastmod timestamp in W3C datetime form.
 * Midnight renders as a bare date; any other time renders to the second, without a zone.
 */
export function formatLastmod(lastmod: Date): string {
  const date = `${pad(lastmod.getUTCFullYear(), 4)}-${pad(lastmod.getUTCMonth() + 1)}-${pad(lastmod.getUTCDate())}`;
  const isMidnight =
    lastmod.getUTCHours() === 0 &&
    lastmod.getUTCMinutes() === 0 &&
    lastmod.getUTCSeconds() === 0 &&
    lastmod.getUTCMilliseconds() === 0;

  if (isMidnight) {
    return date;
  }
  return `${date}T${pad(lastmod.getUTCHours())}:${pad(lastmod.getUTCMinutes())}:${pad(lastmod.getUTCSeconds())}`;
}

export function formatPriority(priority: number): string {
  return priority.toFixed(1);
}

export function stripTrailingSlash(url: string): string {
  return url.endsWith('/') ? url.slice(0, -1) : url;
}

/**
 * Stateless renderer for sitemap and sitemap index documents
 */
export class SitemapXmlSerializer {
  /**
   * Render a <urlset> document. Entries are written in iteration order; the
   * xhtml namespace is declared only when some entry has alternates.
   */
  renderDocument(urls: Iterable<SitemapUrl>): string {
    const entries = Array.from(urls);
    const hasAlternates = entries.some(url => url.alternates.size > 0);

    const parts: string[] = [XML_HEADER, URLSET_OPEN];
    if (hasAlternates) {
      parts.push(XHTML_NAMESPACE);
    }
    parts.push('>\n');

    for (const url of entries) {
      this.appendUrl(parts, url);
    }

    parts.push(URLSET_CLOSE);
    return parts.join('');
  }

  /**
   * Render a <sitemapindex> referencing sitemap-1.xml .. sitemap-{sitemapCount}.xml under baseUrl
   */
  renderIndex(sitemapCount: number, baseUrl: string): string {
    const base = stripTrailingSlash(baseUrl);
    const parts: string[] = [XML_HEADER, SITEMAP_INDEX_OPEN];

    for (let i = 1; i <= sitemapCount; i++) {
      parts.push(
        '  <sitemap>\n',
        `    <loc>${escapeXml(`${base}/sitemap-${i}.xml`)}</loc>\n`,
        '  </sitemap>\n'
      );
    }

    parts.push(SITEMAP_INDEX_CLOSE);
    return parts.join('');
  }

  private appendUrl(parts: string[], url: SitemapUrl): void {
    parts.push('  <url>\n', `    <loc>${escapeXml(url.loc)}</loc>\n`);

    url.alternates.forEach((href, hreflang) => {
      parts.push(`    <xhtml:link rel="alternate" hreflang="${escapeXml(hreflang)}" href="${escapeXml(href)}"/>\n`);
    });

    if (url.lastmod) {
      parts.push(`    <lastmod>${formatLastmod(url.lastmod)}</lastmod>\n`);
    }

    if (url.changefreq) {
      parts.push(`    <changefreq>${url.changefreq}</changefreq>\n`);
    }

    if (url.priority !== undefined) {
      parts.push(`    <priority>${formatPriority(url.priority)}</priority>\n`);
    }

    parts.push('  </url>\n');
  }
}
