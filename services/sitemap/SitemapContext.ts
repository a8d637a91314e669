/**
 * SitemapContext wires the registry, serializer, locale resolver and route
 * scanner for one application. Create it once at startup, share it by
 * reference, and shut it down when the process stops.
 */

import { InitializationType, SitemapProperties } from '../../shared/infrastructure/config.js';
import { getLogger } from '../../shared/infrastructure/logging.js';
import { SitemapXmlSerializer } from './domain/SitemapXmlSerializer.js';
import { SitemapLocaleResolver } from './domain/SitemapLocaleResolver.js';
import { SitemapRegistry } from './domain/SitemapRegistry.js';
import { SitemapRouteScanner } from './domain/SitemapRouteScanner.js';
import { RouteDefinition, RouteSource } from './domain/RouteTypes.js';

const logger = getLogger();

/**
 * Route source over a fixed list of routes
 */
export class StaticRouteSource implements RouteSource {
  constructor(private readonly routes: readonly RouteDefinition[]) {}

  getRoutes(): Iterable<RouteDefinition> {
    return this.routes;
  }
}

export class SitemapContext {
  readonly serializer: SitemapXmlSerializer;
  readonly localeResolver: SitemapLocaleResolver;
  readonly registry: SitemapRegistry;
  readonly scanner: SitemapRouteScanner;

  constructor(
    readonly properties: SitemapProperties,
    private readonly routeSource: RouteSource = new StaticRouteSource([])
  ) {
    this.serializer = new SitemapXmlSerializer();
    this.localeResolver = new SitemapLocaleResolver(properties);
    this.registry = new SitemapRegistry(properties, this.serializer);
    this.scanner = new SitemapRouteScanner(this.registry, this.localeResolver, properties);
  }

  /**
   * Scan the route source unless that already happened
   */
  ensureScanned(): void {
    if (!this.scanner.isScanned()) {
      this.scanner.scan(this.routeSource.getRoutes());
    }
  }

  /**
   * Run the startup scan when initialization is eager
   */
  start(): void {
    if (this.properties.initialization === InitializationType.EAGER) {
      this.ensureScanned();
    }
    logger.info(
      `Sitemap context started (baseUrl=${this.properties.baseUrl}, initialization=${this.properties.initialization})`,
      'SitemapContext'
    );
  }

  shutdown(): void {
    this.registry.clear();
    this.registry.removeAllListeners();
    logger.info('Sitemap context shut down', 'SitemapContext');
  }
}

export function createSitemapContext(properties: SitemapProperties, routeSource?: RouteSource): SitemapContext {
  return new SitemapContext(properties, routeSource);
}
