/**
 * SitemapLocaleResolver decides which locales apply to a route and builds
 * locale-qualified URLs and hreflang alternates for it.
 *
 * Locale resolution order:
 * 1. locales given explicitly for the route
 * 2. the configured `locales` list
 * 3. locales detected by the caller, if any were passed
 */

import { getLogger } from '../../../shared/infrastructure/logging.js';
import { LocaleUrlPattern, SitemapProperties } from '../../../shared/infrastructure/config.js';
import { ReadonlyAlternates, X_DEFAULT } from '../../../shared/domain/models/SitemapUrl.js';
import { stripTrailingSlash } from './SitemapXmlSerializer.js';

const logger = getLogger();

export type LocaleSettings = Pick<
  SitemapProperties,
  'baseUrl' | 'locales' | 'localeUrlPattern' | 'localeQueryParamName' | 'defaultLocale' | 'omitDefaultLocaleInUrl'
>;

function ensureLeadingSlash(path: string | null | undefined): string {
  if (!path) {
    return '/';
  }
  return path.startsWith('/') ? path : `/${path}`;
}

export class SitemapLocaleResolver {
  constructor(private readonly settings: LocaleSettings) {}

  /**
   * Resolve the locales for one route
   * @param explicitLocales Locales declared on the route itself
   * @param detectedLocales Locales detected by the caller, used only when nothing else applies
   * @returns Locale codes; empty when the route gets no locale handling
   */
  resolveLocales(explicitLocales?: readonly string[], detectedLocales?: readonly string[]): string[] {
    if (explicitLocales && explicitLocales.length > 0) {
      logger.debug(`Using route-level locales: ${explicitLocales.join(', ')}`, 'SitemapLocaleResolver');
      return [...explicitLocales];
    }

    if (this.settings.locales.length > 0) {
      logger.debug(`Using configured locales: ${this.settings.locales.join(', ')}`, 'SitemapLocaleResolver');
      return [...this.settings.locales];
    }

    if (detectedLocales && detectedLocales.length > 0) {
      logger.debug(`Using detected locales: ${detectedLocales.join(', ')}`, 'SitemapLocaleResolver');
      return [...detectedLocales];
    }

    logger.debug('No locales resolved, configure locales for multilingual sitemaps', 'SitemapLocaleResolver');
    return [];
  }

  buildUrl(path: string | null | undefined): string {
    return this.baseUrl() + ensureLeadingSlash(path);
  }

  buildLocalizedUrl(path: string | null | undefined, locale: string): string {
    const baseUrl = this.baseUrl();
    const normalPath = ensureLeadingSlash(path);

    if (this.settings.omitDefaultLocaleInUrl && locale === this.settings.defaultLocale) {
      return baseUrl + normalPath;
    }

    switch (this.settings.localeUrlPattern) {
      case LocaleUrlPattern.PATH_PREFIX:
        return `${baseUrl}/${locale}${normalPath}`;
      case LocaleUrlPattern.QUERY_PARAM: {
        const fullUrl = baseUrl + normalPath;
        const separator = fullUrl.includes('?') ? '&' : '?';
        return `${fullUrl}${separator}${this.settings.localeQueryParamName}=${locale}`;
      }
    }
  }

  /**
   * Build the hreflang alternates for a path: one URL per distinct locale,
   * then x-default pointing at the default locale (or the first one).
   * The result is read-only.
   */
  buildAlternates(path: string | null | undefined, locales: readonly string[] | null | undefined): ReadonlyMap<string, string> {
    if (!locales || locales.length === 0) {
      return new ReadonlyAlternates();
    }

    const alternates = new Map<string, string>();

    for (const locale of locales) {
      if (!alternates.has(locale)) {
        alternates.set(locale, this.buildLocalizedUrl(path, locale));
      }
    }

    const { defaultLocale } = this.settings;
    const xDefaultLocale = defaultLocale !== undefined && locales.includes(defaultLocale) ? defaultLocale : locales[0];
    alternates.set(X_DEFAULT, this.buildLocalizedUrl(path, xDefaultLocale));

    return new ReadonlyAlternates(alternates);
  }

  private baseUrl(): string {
    return stripTrailingSlash(this.settings.baseUrl);
  }
}
