/**
 * SitemapContextTest
 *
 * Tests for context wiring and lifecycle
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { SitemapContext, StaticRouteSource, createSitemapContext } from '../SitemapContext.js';
import { RouteDefinition, RouteSource } from '../domain/RouteTypes.js';
import { InitializationType, SitemapPropertiesInput, resolveSitemapProperties } from '../../../shared/infrastructure/config.js';
import { Logger } from '../../../shared/infrastructure/logging.js';

Logger.configure({ enabled: false });

class CountingRouteSource implements RouteSource {
  calls = 0;

  constructor(private readonly routes: RouteDefinition[]) {}

  getRoutes(): Iterable<RouteDefinition> {
    this.calls++;
    return this.routes;
  }
}

function createContext(source: RouteSource, overrides: Partial<SitemapPropertiesInput> = {}): SitemapContext {
  return createSitemapContext(
    resolveSitemapProperties({ baseUrl: 'https://example.com', autoScan: true, ...overrides }),
    source
  );
}

describe('SitemapContext', () => {
  it('scans at start when initialization is eager', () => {
    const source = new CountingRouteSource([{ path: '/a' }]);
    const context = createContext(source);

    context.start();

    assert.equal(source.calls, 1);
    assert.equal(context.scanner.isScanned(), true);
    assert.equal(context.registry.size(), 1);
  });

  it('defers the scan when initialization is lazy', () => {
    const source = new CountingRouteSource([{ path: '/a' }]);
    const context = createContext(source, { initialization: InitializationType.LAZY });

    context.start();
    assert.equal(source.calls, 0);
    assert.equal(context.registry.size(), 0);

    context.ensureScanned();
    context.ensureScanned();
    assert.equal(source.calls, 1);
    assert.equal(context.registry.size(), 1);
  });

  it('starts empty without a route source', () => {
    const context = new SitemapContext(resolveSitemapProperties({ baseUrl: 'https://example.com' }));
    context.start();

    assert.equal(context.registry.size(), 0);
    assert.equal(context.scanner.isScanned(), true);
  });

  it('shares one registry between its components', () => {
    const context = createContext(new StaticRouteSource([{ path: '/a' }]));
    context.start();
    context.registry.addAll(context.scanner.buildUrlsForRoute('/b'));

    assert.ok(context.registry.getSitemapXml().includes('<loc>https://example.com/b</loc>'));
  });

  it('clears the registry and detaches listeners on shutdown', () => {
    const context = createContext(new StaticRouteSource([{ path: '/a' }]));
    context.start();
    context.registry.on('generated', () => undefined);

    context.shutdown();

    assert.equal(context.registry.size(), 0);
    assert.equal(context.registry.listenerCount('generated'), 0);
  });
});
