/**
 * HttpServerTest
 *
 * Exercises the node:http adapter on an ephemeral local port
 */

import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import http from 'http';
import net from 'net';
import { createSitemapServer } from '../http-server.js';
import { createSitemapContext, StaticRouteSource } from '../../../services/sitemap/SitemapContext.js';
import { resolveSitemapProperties } from '../../../shared/infrastructure/config.js';
import { Logger } from '../../../shared/infrastructure/logging.js';

Logger.configure({ enabled: false });

describe('createSitemapServer', () => {
  let server: http.Server;
  let port = 0;
  let baseUrl = '';

  before(async () => {
    const context = createSitemapContext(
      resolveSitemapProperties({ baseUrl: 'https://example.com', autoScan: true }),
      new StaticRouteSource([{ path: '/' }, { path: '/about?x=1&y=2' }])
    );
    context.start();
    server = createSitemapServer(context);

    await new Promise<void>(resolve => server.listen(0, '127.0.0.1', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error(`unexpected server address: ${String(address)}`);
    }
    port = address.port;
    baseUrl = `http://127.0.0.1:${port}`;
  });

  after(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  it('serves the sitemap with content type and length', async () => {
    const response = await fetch(`${baseUrl}/sitemap.xml`);
    const body = await response.text();

    assert.equal(response.status, 200);
    assert.equal(response.headers.get('content-type'), 'application/xml; charset=utf-8');
    assert.equal(response.headers.get('content-length'), String(Buffer.byteLength(body)));
    assert.ok(body.includes('<loc>https://example.com/about?x=1&amp;y=2</loc>'));
  });

  it('ignores the query string when routing', async () => {
    const response = await fetch(`${baseUrl}/sitemap.xml?cache=bust`);
    await response.text();

    assert.equal(response.status, 200);
  });

  it('sends headers without a body for HEAD', async () => {
    const response = await fetch(`${baseUrl}/sitemap.xml`, { method: 'HEAD' });
    const body = await response.text();

    assert.equal(response.status, 200);
    assert.equal(body, '');
    assert.ok(Number(response.headers.get('content-length')) > 0);
  });

  it('answers 404 and 405', async () => {
    const missing = await fetch(`${baseUrl}/sitemap-9.xml`);
    await missing.text();
    assert.equal(missing.status, 404);

    const post = await fetch(`${baseUrl}/sitemap.xml`, { method: 'POST' });
    await post.text();
    assert.equal(post.status, 405);
    assert.equal(post.headers.get('allow'), 'GET, HEAD');
  });

  it('answers 400 to a request target that is not a URL and keeps serving', async () => {
    const reply = await new Promise<string>((resolve, reject) => {
      const socket = net.connect(port, '127.0.0.1', () => {
        socket.write('GET http://[x HTTP/1.1\r\nHost: 127.0.0.1\r\nConnection: close\r\n\r\n');
      });
      let data = '';
      socket.setEncoding('utf8');
      socket.on('data', chunk => (data += chunk));
      socket.on('end', () => resolve(data));
      socket.on('error', reject);
    });

    assert.match(reply, /^HTTP\/1\.1 400 Bad Request\r\n/);
    assert.ok(reply.endsWith('\r\n\r\nBad Request'));

    const response = await fetch(`${baseUrl}/sitemap.xml`);
    await response.text();
    assert.equal(response.status, 200);
  });
});
