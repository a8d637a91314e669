/**
 * Maps sitemap requests to registry accessors
 *
 * - GET /sitemap.xml returns the sitemap, or the sitemap index once the
 *   entries exceed maxUrlsPerSitemap
 * - GET /sitemap-{n}.xml returns page n of the index, 404 when out of range
 */

import { SitemapPageNotFoundError, isSitemapError } from '../../../shared/domain/errors.js';
import { InitializationType } from '../../../shared/infrastructure/config.js';
import { getLogger } from '../../../shared/infrastructure/logging.js';
import { SitemapContext } from '../../../services/sitemap/SitemapContext.js';
import { SITEMAP_CONTENT_TYPE } from '../../../services/sitemap/domain/SitemapXmlSerializer.js';

const logger = getLogger();

const SITEMAP_PATH = '/sitemap.xml';
const SITEMAP_PAGE_PATH = /^\/sitemap-(\d+)\.xml$/;

/**
 * Transport-independent response
 */
export interface SitemapResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export class SitemapHandler {
  constructor(private readonly context: SitemapContext) {}

  /**
   * Whether this handler serves the given path at all
   */
  handles(pathname: string): boolean {
    return this.context.properties.enabled && (pathname === SITEMAP_PATH || SITEMAP_PAGE_PATH.test(pathname));
  }

  handle(method: string, pathname: string): SitemapResponse {
    if (!this.handles(pathname)) {
      return this.createTextResponse(404, 'Not Found');
    }

    if (method !== 'GET' && method !== 'HEAD') {
      const response = this.createTextResponse(405, 'Method Not Allowed');
      response.headers.Allow = 'GET, HEAD';
      return response;
    }

    try {
      this.ensureScanned();

      if (pathname === SITEMAP_PATH) {
        return this.createXmlResponse(this.sitemap());
      }

      const pageMatch = SITEMAP_PAGE_PATH.exec(pathname);
      const page = pageMatch ? Number(pageMatch[1]) : 0;
      return this.createXmlResponse(this.sitemapPage(page));
    } catch (error) {
      if (isSitemapError(error) && error.errorCode === 'SITEMAP_PAGE_NOT_FOUND') {
        logger.debug(error.message, 'SitemapHandler');
        return this.createTextResponse(404, 'Not Found');
      }

      const failure = error instanceof Error ? error : new Error(String(error));
      logger.logError(failure, 'SitemapHandler', `Failed to serve ${pathname}`);
      return this.createTextResponse(500, 'Internal Server Error');
    }
  }

  private sitemap(): string {
    const { registry } = this.context;
    return registry.requiresIndex() ? registry.getSitemapIndexXml() : registry.getSitemapXml();
  }

  private sitemapPage(page: number): string {
    const { registry } = this.context;
    const sitemapCount = registry.getSitemapCount();
    if (page < 1 || page > sitemapCount) {
      throw new SitemapPageNotFoundError(page, sitemapCount);
    }
    return registry.getSitemapPageXml(page);
  }

  /**
   * In lazy mode the first sitemap request triggers the route scan
   */
  private ensureScanned(): void {
    if (this.context.properties.initialization === InitializationType.LAZY) {
      this.context.ensureScanned();
    }
  }

  private createXmlResponse(body: string): SitemapResponse {
    return { status: 200, headers: { 'Content-Type': SITEMAP_CONTENT_TYPE }, body };
  }

  private createTextResponse(status: number, body: string): SitemapResponse {
    return { status, headers: { 'Content-Type': 'text/plain; charset=utf-8' }, body };
  }
}
