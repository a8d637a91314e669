/**
 * node:http adapter for the sitemap handler
 */

import http from 'http';
import { getLogger } from '../../shared/infrastructure/logging.js';
import { SitemapContext } from '../../services/sitemap/SitemapContext.js';
import { SitemapHandler, SitemapResponse } from './handlers/sitemap-handler.js';

const logger = getLogger();

const BAD_REQUEST: SitemapResponse = {
  status: 400,
  headers: { 'Content-Type': 'text/plain; charset=utf-8' },
  body: 'Bad Request'
};

/**
 * Extract the pathname of a request target
 * @returns The pathname, or undefined when the target is not a valid URL
 */
function parsePathname(target: string | undefined): string | undefined {
  try {
    return new URL(target ?? '/', 'http://localhost').pathname;
  } catch (error) {
    logger.debug(`Rejecting unparseable request target: ${target}`, 'SitemapServer', error);
    return undefined;
  }
}

function send(res: http.ServerResponse, method: string, response: SitemapResponse): void {
  res.writeHead(response.status, {
    ...response.headers,
    'Content-Length': String(Buffer.byteLength(response.body))
  });
  res.end(method === 'HEAD' ? undefined : response.body);
}

export function createSitemapServer(context: SitemapContext): http.Server {
  const handler = new SitemapHandler(context);

  return http.createServer((req, res) => {
    const method = req.method ?? 'GET';
    const pathname = parsePathname(req.url);

    const response = pathname === undefined ? BAD_REQUEST : handler.handle(method, pathname);
    logger.debug(`${method} ${pathname ?? req.url} -> ${response.status}`, 'SitemapServer');
    send(res, method, response);
  });
}
