/**
 * Configuration module for the sitemap registry
 *
 * Loads configuration from environment variables, config files, and defaults
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ChangeFrequency } from '../domain/models/SitemapUrl.js';
import { ConfigurationError } from '../domain/errors.js';

// Load environment variables from .env file if present
dotenv.config();

/**
 * Strategy for embedding a locale code into a URL
 */
export enum LocaleUrlPattern {
  /** https://example.com/en/about */
  PATH_PREFIX = 'path-prefix',

  /** https://example.com/about?lang=en */
  QUERY_PARAM = 'query-param'
}

/**
 * When the route scan runs
 */
export enum InitializationType {
  /** Scan at startup, before the first request */
  EAGER = 'eager',

  /** Scan on the first sitemap request */
  LAZY = 'lazy'
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * Sitemap settings consumed by the registry, locale resolver and scanner
 */
export const SitemapPropertiesSchema = z.object({
  enabled: z.boolean().default(true),
  baseUrl: z
    .string({ required_error: 'baseUrl is required' })
    .regex(/^https?:\/\/\S+$/, 'baseUrl must be an absolute http(s) URL'),
  autoScan: z.boolean().default(false),
  autoScanMethods: z
    .array(z.string().min(1))
    .default(['GET'])
    .transform(methods => methods.map(method => method.toUpperCase())),
  defaultPriority: z.number().min(0).max(1).default(0.5),
  defaultChangefreq: z.nativeEnum(ChangeFrequency).optional(),
  initialization: z.nativeEnum(InitializationType).default(InitializationType.EAGER),
  // 50,000 is the ceiling of the sitemaps.org protocol
  maxUrlsPerSitemap: z.number().int().min(1).max(50_000).default(50_000),
  locales: z.array(z.string().min(1)).default([]),
  localeUrlPattern: z.nativeEnum(LocaleUrlPattern).default(LocaleUrlPattern.PATH_PREFIX),
  localeQueryParamName: z.string().min(1).default('lang'),
  defaultLocale: z.string().min(1).optional(),
  omitDefaultLocaleInUrl: z.boolean().default(false)
});

export type SitemapProperties = z.infer<typeof SitemapPropertiesSchema>;
export type SitemapPropertiesInput = z.input<typeof SitemapPropertiesSchema>;

// Define configuration schema
export interface AppConfig {
  /** Base directory for data storage (logs) */
  dataDir: string;

  /** Log level */
  logLevel: LogLevelName;

  /** Whether log lines are written at all */
  logEnabled: boolean;

  /** HTTP server settings */
  server: {
    /** Interface to bind */
    host: string;

    /** Port to listen on */
    port: number;
  };

  /** Unvalidated sitemap settings; see resolveSitemapProperties */
  sitemap: Record<string, unknown>;
}

// Get home directory
const HOME_DIR = os.homedir();

const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

function parseLogLevel(value: string | undefined): LogLevelName {
  const level = LOG_LEVELS.find(candidate => candidate === value?.toLowerCase());
  return level ?? 'info';
}

function parseList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Read SITEMAP_* variables that are set into a partial sitemap settings object
 */
function sitemapFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const str = (name: string, key: string) => {
    const value = env[name];
    if (value !== undefined && value !== '') result[key] = value;
  };
  const bool = (name: string, key: string) => {
    const value = env[name];
    if (value !== undefined && value !== '') result[key] = value === 'true';
  };
  const num = (name: string, key: string) => {
    const value = env[name];
    if (value !== undefined && value !== '') result[key] = Number(value);
  };
  const list = (name: string, key: string) => {
    const value = env[name];
    if (value !== undefined) result[key] = parseList(value);
  };

  str('SITEMAP_BASE_URL', 'baseUrl');
  bool('SITEMAP_ENABLED', 'enabled');
  bool('SITEMAP_AUTO_SCAN', 'autoScan');
  list('SITEMAP_AUTO_SCAN_METHODS', 'autoScanMethods');
  num('SITEMAP_DEFAULT_PRIORITY', 'defaultPriority');
  str('SITEMAP_DEFAULT_CHANGEFREQ', 'defaultChangefreq');
  str('SITEMAP_INITIALIZATION', 'initialization');
  num('SITEMAP_MAX_URLS_PER_SITEMAP', 'maxUrlsPerSitemap');
  list('SITEMAP_LOCALES', 'locales');
  str('SITEMAP_LOCALE_URL_PATTERN', 'localeUrlPattern');
  str('SITEMAP_LOCALE_QUERY_PARAM', 'localeQueryParamName');
  str('SITEMAP_DEFAULT_LOCALE', 'defaultLocale');
  bool('SITEMAP_OMIT_DEFAULT_LOCALE', 'omitDefaultLocaleInUrl');

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Function to load configuration from a file
function loadConfigFromFile(filePath: string): Record<string, unknown> {
  try {
    if (fs.existsSync(filePath)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf8'));
      if (isRecord(parsed)) {
        return parsed;
      }
      console.warn(`Ignoring configuration in ${filePath}: expected a JSON object`);
    }
  } catch (error) {
    console.warn(`Failed to load configuration from ${filePath}:`, error);
  }
  return {};
}

const globalConfigPath = path.join(HOME_DIR, '.sitemap-registry', 'config.json');
const localConfigPath = path.join(process.cwd(), 'sitemap.config.json');

/**
 * Merge configurations with precedence: default < global file < local file < environment variables
 */
export function buildConfig(
  env: NodeJS.ProcessEnv = process.env,
  files: Record<string, unknown>[] = [loadConfigFromFile(globalConfigPath), loadConfigFromFile(localConfigPath)]
): AppConfig {
  const merged: Record<string, unknown> = {};
  let sitemap: Record<string, unknown> = {};
  for (const file of files) {
    const { sitemap: fileSitemap, ...rest } = file;
    Object.assign(merged, rest);
    if (isRecord(fileSitemap)) {
      sitemap = { ...sitemap, ...fileSitemap };
    }
  }

  const dataDir = env.SITEMAP_DATA_DIR || (typeof merged.dataDir === 'string' ? merged.dataDir : path.join(HOME_DIR, '.sitemap-registry'));
  const fileServer = isRecord(merged.server) ? merged.server : {};

  return {
    dataDir,
    logLevel: parseLogLevel(env.SITEMAP_LOG_LEVEL ?? (typeof merged.logLevel === 'string' ? merged.logLevel : undefined)),
    logEnabled: env.SITEMAP_LOG_ENABLED !== undefined ? env.SITEMAP_LOG_ENABLED !== 'false' : merged.logEnabled !== false,
    server: {
      host: env.SITEMAP_HOST || (typeof fileServer.host === 'string' ? fileServer.host : '0.0.0.0'),
      port: parseInt(env.SITEMAP_PORT || String(typeof fileServer.port === 'number' ? fileServer.port : 8080), 10)
    },
    sitemap: { ...sitemap, ...sitemapFromEnv(env) }
  };
}

let config = buildConfig();

// Export the final configuration
export { config };

// Also export a function to reload configuration
export function reloadConfig(): AppConfig {
  config = buildConfig();
  return config;
}

/**
 * Validate sitemap settings and apply defaults
 * @throws ConfigurationError listing every invalid field
 */
export function resolveSitemapProperties(input: SitemapPropertiesInput): SitemapProperties {
  return parseSitemapProperties(input);
}

/**
 * Resolve sitemap settings from the loaded configuration, with explicit overrides on top
 */
export function loadSitemapProperties(overrides: Partial<SitemapPropertiesInput> = {}): SitemapProperties {
  return parseSitemapProperties({ ...config.sitemap, ...overrides });
}

function parseSitemapProperties(input: unknown): SitemapProperties {
  const parsed = SitemapPropertiesSchema.safeParse(input);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`invalid sitemap properties: ${summary}`, { issues: parsed.error.issues });
  }
  return parsed.data;
}
