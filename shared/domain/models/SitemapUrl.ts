/**
 * SitemapUrl entity representing one URL registered for the sitemap.
 * This is the core domain model of the sitemap registry.
 */

import { ValidationError } from '../errors.js';

/**
 * How frequently a page is likely to change, per the sitemaps.org protocol.
 * An entry without a change frequency leaves the field undefined.
 */
export enum ChangeFrequency {
  ALWAYS = 'always',
  HOURLY = 'hourly',
  DAILY = 'daily',
  WEEKLY = 'weekly',
  MONTHLY = 'monthly',
  YEARLY = 'yearly',
  NEVER = 'never'
}

/**
 * hreflang value marking the alternate used when no other locale matches.
 */
export const X_DEFAULT = 'x-default';

/**
 * A validated, immutable sitemap entry
 */
export interface SitemapUrl {
  /** Absolute URL of the page; unique key inside the registry */
  readonly loc: string;

  /** Last modification timestamp, read through its UTC fields */
  readonly lastmod?: Date;

  /** Change frequency hint */
  readonly changefreq?: ChangeFrequency;

  /** Priority relative to other pages of the site, 0.0 to 1.0 */
  readonly priority?: number;

  /** hreflang code (or x-default) to alternate URL, in insertion order */
  readonly alternates: ReadonlyMap<string, string>;
}

/**
 * Fields accepted when creating a sitemap entry
 */
export interface SitemapUrlInit {
  loc: string;
  lastmod?: Date;
  changefreq?: ChangeFrequency;
  priority?: number;
  alternates?: ReadonlyMap<string, string> | Record<string, string>;
}

/**
 * Create a sitemap entry, validating every field once.
 * @throws ValidationError when loc is blank or not http(s), or priority is outside [0, 1]
 */
export function createSitemapUrl(init: SitemapUrlInit): SitemapUrl {
  const { loc, lastmod, changefreq, priority } = init;

  if (typeof loc !== 'string' || loc.trim().length === 0) {
    throw new ValidationError('loc must not be blank', { loc });
  }

  if (!loc.startsWith('http://') && !loc.startsWith('https://')) {
    throw new ValidationError(`loc must start with http:// or https://, got: ${loc}`, { loc });
  }

  if (priority !== undefined && !(priority >= 0 && priority <= 1)) {
    throw new ValidationError(`priority must be between 0.0 and 1.0, got: ${priority}`, { loc, priority });
  }

  if (lastmod !== undefined && Number.isNaN(lastmod.getTime())) {
    throw new ValidationError(`lastmod is not a valid date`, { loc });
  }

  const lastmodTime = lastmod?.getTime();

  return Object.freeze({
    loc,
    // A Date is mutable; hand out a fresh copy on every read
    get lastmod(): Date | undefined {
      return lastmodTime === undefined ? undefined : new Date(lastmodTime);
    },
    changefreq,
    priority,
    alternates: new ReadonlyAlternates(alternateEntries(init.alternates))
  });
}

function alternateEntries(input: SitemapUrlInit['alternates']): Iterable<readonly [string, string]> {
  if (input === undefined) {
    return [];
  }
  return isAlternatesMap(input) ? input.entries() : Object.entries(input);
}

function isAlternatesMap(
  input: ReadonlyMap<string, string> | Record<string, string>
): input is ReadonlyMap<string, string> {
  return input instanceof Map || input instanceof ReadonlyAlternates;
}

/**
 * Read-only hreflang to URL mapping in insertion order. The entries are
 * copied on construction and the instance has no mutators.
 */
export class ReadonlyAlternates implements ReadonlyMap<string, string> {
  private readonly map: Map<string, string>;

  constructor(entries: Iterable<readonly [string, string]> = []) {
    this.map = new Map(entries);
    Object.freeze(this);
  }

  get size(): number {
    return this.map.size;
  }

  get(hreflang: string): string | undefined {
    return this.map.get(hreflang);
  }

  has(hreflang: string): boolean {
    return this.map.has(hreflang);
  }

  forEach(callbackfn: (href: string, hreflang: string, map: ReadonlyMap<string, string>) => void, thisArg?: unknown): void {
    this.map.forEach((href, hreflang) => callbackfn.call(thisArg, href, hreflang, this));
  }

  entries(): ReturnType<Map<string, string>['entries']> {
    return this.map.entries();
  }

  keys(): ReturnType<Map<string, string>['keys']> {
    return this.map.keys();
  }

  values(): ReturnType<Map<string, string>['values']> {
    return this.map.values();
  }

  [Symbol.iterator](): ReturnType<Map<string, string>['entries']> {
    return this.map.entries();
  }
}

/**
 * Fluent builder for sitemap entries
 */
export class SitemapUrlBuilder {
  private lastmodValue?: Date;
  private changefreqValue?: ChangeFrequency;
  private priorityValue?: number;
  private readonly alternatesValue = new Map<string, string>();

  constructor(private readonly loc: string) {}

  lastmod(lastmod: Date | undefined): this {
    this.lastmodValue = lastmod;
    return this;
  }

  changefreq(changefreq: ChangeFrequency | undefined): this {
    this.changefreqValue = changefreq;
    return this;
  }

  priority(priority: number | undefined): this {
    this.priorityValue = priority;
    return this;
  }

  alternate(hreflang: string, href: string): this {
    this.alternatesValue.set(hreflang, href);
    return this;
  }

  /**
   * Replace all alternates collected so far
   */
  alternates(alternates: ReadonlyMap<string, string>): this {
    this.alternatesValue.clear();
    alternates.forEach((href, hreflang) => this.alternatesValue.set(hreflang, href));
    return this;
  }

  build(): SitemapUrl {
    return createSitemapUrl({
      loc: this.loc,
      lastmod: this.lastmodValue,
      changefreq: this.changefreqValue,
      priority: this.priorityValue,
      alternates: this.alternatesValue
    });
  }
}

export function sitemapUrl(loc: string): SitemapUrlBuilder {
  return new SitemapUrlBuilder(loc);
}
