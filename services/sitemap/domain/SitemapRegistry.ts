/**
 * SitemapRegistry holds every sitemap URL in memory and serves the rendered
 * sitemap documents.
 *
 * The full sitemap and the sitemap index are cached. Each cached document is
 * an immutable record tagged with the generation it was rendered from; every
 * structural mutation advances the generation and drops both records, so a
 * document rendered before a mutation is never served after it returns.
 * Registry calls are synchronous, so a render always sees one consistent
 * snapshot of the entries and a cache miss renders exactly once.
 *
 * Individual sitemap pages are rendered on every request and never cached,
 * which keeps memory bounded when the registry is large enough to need an index.
 */

import EventEmitter from 'events';
import { SitemapUrl } from '../../../shared/domain/models/SitemapUrl.js';
import { SitemapProperties } from '../../../shared/infrastructure/config.js';
import { getLogger } from '../../../shared/infrastructure/logging.js';
import { SitemapXmlSerializer } from './SitemapXmlSerializer.js';

const logger = getLogger();

export type RegistrySettings = Pick<SitemapProperties, 'baseUrl' | 'maxUrlsPerSitemap'>;

export type SitemapDocumentKind = 'sitemap' | 'index';

/**
 * Emitted after every mutation that changed the entries
 */
export interface RegistryInvalidatedEvent {
  /** Generation the registry moved to */
  generation: number;

  /** Number of entries after the mutation */
  size: number;
}

/**
 * Emitted after a cached document was rendered
 */
export interface RegistryGeneratedEvent {
  kind: SitemapDocumentKind;
  generation: number;
  bytes: number;
}

interface CachedDocument {
  readonly generation: number;
  readonly xml: string;
}

export class SitemapRegistry extends EventEmitter {
  private readonly urls = new Map<string, SitemapUrl>();
  private generation = 0;
  private sitemapCache: CachedDocument | null = null;
  private indexCache: CachedDocument | null = null;

  constructor(
    private readonly settings: RegistrySettings,
    private readonly serializer: SitemapXmlSerializer = new SitemapXmlSerializer()
  ) {
    super();
  }

  /**
   * Add a URL, replacing any entry with the same loc
   */
  add(url: SitemapUrl): void {
    this.urls.set(url.loc, url);
    this.invalidate();
    logger.debug(`Added sitemap URL: ${url.loc}`, 'SitemapRegistry');
  }

  /**
   * Add many URLs, invalidating the cached documents once for the whole batch
   */
  addAll(urls: Iterable<SitemapUrl>): void {
    let count = 0;
    for (const url of urls) {
      this.urls.set(url.loc, url);
      count++;
    }
    this.invalidate();
    logger.debug(`Added ${count} sitemap URLs`, 'SitemapRegistry');
  }

  /**
   * Remove the URL with the given loc
   * @returns True if an entry was removed
   */
  remove(loc: string): boolean {
    const removed = this.urls.delete(loc);
    if (removed) {
      this.invalidate();
      logger.debug(`Removed sitemap URL: ${loc}`, 'SitemapRegistry');
    }
    return removed;
  }

  clear(): void {
    this.urls.clear();
    this.invalidate();
    logger.debug('Cleared all sitemap URLs', 'SitemapRegistry');
  }

  contains(loc: string): boolean {
    return this.urls.has(loc);
  }

  size(): number {
    return this.urls.size;
  }

  /**
   * Snapshot of all entries in insertion order. The returned array is a copy.
   */
  getUrls(): readonly SitemapUrl[] {
    return Array.from(this.urls.values());
  }

  /**
   * Get one page of entries
   * @param page 1-based page number
   * @returns The entries of that page; empty when the page is out of range
   */
  getPage(page: number, pageSize: number): readonly SitemapUrl[] {
    if (!Number.isInteger(page) || page < 1 || !Number.isInteger(pageSize) || pageSize < 1) {
      return [];
    }

    const fromIndex = (page - 1) * pageSize;
    if (fromIndex >= this.urls.size) {
      return [];
    }

    return this.getUrls().slice(fromIndex, fromIndex + pageSize);
  }

  /**
   * Number of sitemap pages needed for the current entries; 0 when empty
   */
  getSitemapCount(): number {
    const total = this.urls.size;
    if (total === 0) {
      return 0;
    }
    return Math.ceil(total / this.settings.maxUrlsPerSitemap);
  }

  requiresIndex(): boolean {
    return this.urls.size > this.settings.maxUrlsPerSitemap;
  }

  getGeneration(): number {
    return this.generation;
  }

  /**
   * The sitemap with every entry. Served from cache until the next mutation.
   */
  getSitemapXml(): string {
    const cached = this.sitemapCache;
    if (cached && cached.generation === this.generation) {
      return cached.xml;
    }

    return this.render(
      'sitemap',
      () => this.serializer.renderDocument(this.urls.values()),
      document => (this.sitemapCache = document)
    );
  }

  /**
   * The sitemap index referencing every sitemap page. Served from cache until the next mutation.
   */
  getSitemapIndexXml(): string {
    const cached = this.indexCache;
    if (cached && cached.generation === this.generation) {
      return cached.xml;
    }

    return this.render(
      'index',
      () => this.serializer.renderIndex(this.getSitemapCount(), this.settings.baseUrl),
      document => (this.indexCache = document)
    );
  }

  /**
   * One sitemap page of at most maxUrlsPerSitemap entries. Never cached.
   * @param page 1-based page number; out-of-range pages render an empty urlset
   */
  getSitemapPageXml(page: number): string {
    return this.serializer.renderDocument(this.getPage(page, this.settings.maxUrlsPerSitemap));
  }

  /**
   * Render a document, store it as the current cache record, then announce it
   */
  private render(
    kind: SitemapDocumentKind,
    renderer: () => string,
    store: (document: CachedDocument) => void
  ): string {
    const generation = this.generation;
    const xml = renderer();
    store(Object.freeze({ generation, xml }));

    const event: RegistryGeneratedEvent = { kind, generation, bytes: Buffer.byteLength(xml) };
    logger.debug(`Generated ${kind} XML for generation ${generation}`, 'SitemapRegistry', event);
    this.emit('generated', event);
    return xml;
  }

  private invalidate(): void {
    this.generation++;
    this.sitemapCache = null;
    this.indexCache = null;
    const event: RegistryInvalidatedEvent = { generation: this.generation, size: this.urls.size };
    this.emit('invalidated', event);
  }
}
