/**
 * Defines custom error types for the sitemap registry.
 */

/**
 * Base class for all sitemap registry errors.
 * Carries a machine-readable errorCode and optional details.
 */
export class SitemapError extends Error {
  public errorCode: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, errorCode: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

// --- Validation Errors ---

export class ValidationError extends SitemapError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation failed: ${message}`, 'VALIDATION_ERROR', details);
  }
}

// --- Configuration Errors ---

export class ConfigurationError extends SitemapError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', details);
  }
}

// --- Serving Errors ---

export class SitemapPageNotFoundError extends SitemapError {
  constructor(page: number, sitemapCount: number) {
    super(`Sitemap page ${page} not found (available: 1..${sitemapCount}).`, 'SITEMAP_PAGE_NOT_FOUND', { page, sitemapCount });
  }
}

export function isSitemapError(error: unknown): error is SitemapError {
  return error instanceof SitemapError;
}
