/**
 * Type definitions for route discovery
 */

import { z } from 'zod';
import { ChangeFrequency } from '../../../shared/domain/models/SitemapUrl.js';

/**
 * Sitemap options attached to a route or to the controller that owns it
 */
export interface SitemapRouteOptions {
  /** Priority, 0.0 to 1.0; a negative value means "use the configured default" */
  priority?: number;

  /** Change frequency; falls back to the configured default */
  changefreq?: ChangeFrequency;

  /** Last modification, `YYYY-MM-DD` or `YYYY-MM-DDTHH:MM:SS` */
  lastmod?: string;

  /** Locales for this route; overrides the configured locales */
  locales?: string[];
}

/**
 * One route of a web application's route table
 */
export interface RouteDefinition {
  /** Path pattern, e.g. `/about` or `/users/:id` */
  path: string;

  /** HTTP methods the route answers; empty or absent means all */
  methods?: string[];

  /** Options declared on the route itself */
  sitemap?: SitemapRouteOptions;

  /** Options declared on the controller, used when the route declares none */
  controllerSitemap?: SitemapRouteOptions;

  /** Keep this route out of the sitemap */
  exclude?: boolean;
}

/**
 * Supplies the route table to scan. How routes are discovered is up to the implementation.
 */
export interface RouteSource {
  getRoutes(): Iterable<RouteDefinition>;
}

export const SitemapRouteOptionsSchema = z.object({
  priority: z.number().optional(),
  changefreq: z.nativeEnum(ChangeFrequency).optional(),
  lastmod: z.string().optional(),
  locales: z.array(z.string().min(1)).optional()
});

export const RouteDefinitionSchema = z.object({
  path: z.string(),
  methods: z.array(z.string()).optional(),
  sitemap: SitemapRouteOptionsSchema.optional(),
  controllerSitemap: SitemapRouteOptionsSchema.optional(),
  exclude: z.boolean().optional()
});
