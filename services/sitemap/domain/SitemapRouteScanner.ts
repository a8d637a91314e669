/**
 * SitemapRouteScanner turns an application's route table into sitemap URLs
 * and registers them in the SitemapRegistry with a single bulk insert.
 *
 * - With autoScan on, every route answering an allowed method is included
 *   unless excluded; with it off, only routes carrying sitemap options are.
 * - Routes with path variables (`/users/{id}`, `/users/:id`, `/files/*`) are
 *   skipped: their concrete URLs are unknown, add them programmatically.
 * - Route options win over controller options, which win over configured defaults.
 * - When locales apply, one URL per locale is registered, each carrying the
 *   full alternates map.
 */

import { SitemapUrl, sitemapUrl } from '../../../shared/domain/models/SitemapUrl.js';
import { SitemapProperties } from '../../../shared/infrastructure/config.js';
import { getLogger } from '../../../shared/infrastructure/logging.js';
import { SitemapLocaleResolver } from './SitemapLocaleResolver.js';
import { SitemapRegistry } from './SitemapRegistry.js';
import { RouteDefinition, SitemapRouteOptions } from './RouteTypes.js';

const logger = getLogger();

const PATH_VARIABLE_PATTERN = /\{[^}]+\}|\/:[^/]+|\*/;

const LASTMOD_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?$/;

export type ScannerSettings = Pick<
  SitemapProperties,
  'autoScan' | 'autoScanMethods' | 'defaultPriority' | 'defaultChangefreq'
>;

/**
 * Parse a lastmod string as a local timestamp (stored in the Date's UTC fields)
 * @returns The timestamp, or undefined when the value is empty or not a valid date
 */
export function parseLastmod(value: string | undefined): Date | undefined {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }

  const match = LASTMOD_PATTERN.exec(trimmed);
  if (!match) {
    logger.warn(`Failed to parse lastmod value '${trimmed}'`, 'SitemapRouteScanner');
    return undefined;
  }

  const [, year, month, day, hours = '0', minutes = '0', seconds = '0', fraction = ''] = match;
  const millis = Number(fraction.padEnd(3, '0').slice(0, 3));
  // setUTCFullYear keeps years 0-99 as written, where Date.UTC would map them to 1900-1999
  const timestamp = new Date(0);
  timestamp.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  timestamp.setUTCHours(Number(hours), Number(minutes), Number(seconds), millis);

  // Out-of-range fields roll over (2025-02-30 becomes March 2), reject those
  const valid =
    timestamp.getUTCFullYear() === Number(year) &&
    timestamp.getUTCMonth() === Number(month) - 1 &&
    timestamp.getUTCDate() === Number(day) &&
    timestamp.getUTCHours() === Number(hours) &&
    timestamp.getUTCMinutes() === Number(minutes) &&
    timestamp.getUTCSeconds() === Number(seconds);

  if (!valid) {
    logger.warn(`Failed to parse lastmod value '${trimmed}': out of range`, 'SitemapRouteScanner');
    return undefined;
  }

  return timestamp;
}

export function hasPathVariables(path: string): boolean {
  return PATH_VARIABLE_PATTERN.test(path);
}

export class SitemapRouteScanner {
  private scanned = false;

  constructor(
    private readonly registry: SitemapRegistry,
    private readonly localeResolver: SitemapLocaleResolver,
    private readonly settings: ScannerSettings
  ) {}

  /**
   * Scan the routes and register the resulting URLs. Runs once; later calls do nothing.
   * @returns Number of URLs registered by this call
   * @throws ValidationError when a route declares an invalid priority; the scan
   *   is then not marked as done and nothing is registered
   */
  scan(routes: Iterable<RouteDefinition>): number {
    if (this.scanned) {
      logger.debug('Route scan already performed, skipping', 'SitemapRouteScanner');
      return 0;
    }

    logger.info('Scanning routes for sitemap registration...', 'SitemapRouteScanner');

    const discovered: SitemapUrl[] = [];
    for (const route of routes) {
      if (route.exclude) {
        continue;
      }

      const options = route.sitemap ?? route.controllerSitemap;
      if (!this.shouldInclude(route, options)) {
        continue;
      }

      if (hasPathVariables(route.path)) {
        logger.warn(
          `Skipping route with path variables: ${route.path}, add these URLs programmatically via SitemapRegistry.add()`,
          'SitemapRouteScanner'
        );
        continue;
      }

      discovered.push(...this.buildUrlsForRoute(route.path, options));
    }

    this.registry.addAll(discovered);
    this.scanned = true;
    logger.info(`Sitemap route scan complete: ${discovered.length} URLs registered`, 'SitemapRouteScanner');
    return discovered.length;
  }

  isScanned(): boolean {
    return this.scanned;
  }

  /**
   * Build the URLs for one route path: one plain URL without locales, or one URL per locale
   */
  buildUrlsForRoute(path: string, options?: SitemapRouteOptions): SitemapUrl[] {
    const priority = options?.priority !== undefined && options.priority >= 0 ? options.priority : this.settings.defaultPriority;
    const changefreq = options?.changefreq ?? this.settings.defaultChangefreq;
    const lastmod = parseLastmod(options?.lastmod);
    const locales = this.localeResolver.resolveLocales(options?.locales);

    if (locales.length === 0) {
      return [
        sitemapUrl(this.localeResolver.buildUrl(path))
          .priority(priority)
          .changefreq(changefreq)
          .lastmod(lastmod)
          .build()
      ];
    }

    const alternates = this.localeResolver.buildAlternates(path, locales);
    const urls: SitemapUrl[] = [];
    for (const locale of new Set(locales)) {
      urls.push(
        sitemapUrl(this.localeResolver.buildLocalizedUrl(path, locale))
          .priority(priority)
          .changefreq(changefreq)
          .lastmod(lastmod)
          .alternates(alternates)
          .build()
      );
    }
    return urls;
  }

  private shouldInclude(route: RouteDefinition, options: SitemapRouteOptions | undefined): boolean {
    if (!options && !this.settings.autoScan) {
      return false;
    }

    const methods = route.methods ?? [];
    return methods.length === 0 || methods.some(method => this.settings.autoScanMethods.includes(method.toUpperCase()));
  }
}
