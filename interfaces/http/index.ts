#!/usr/bin/env node
/**
 * HTTP entry point: serves /sitemap.xml and /sitemap-{n}.xml
 *
 * Routes to scan are read from the JSON file named by SITEMAP_ROUTES_FILE
 * (an array of route definitions), when set.
 */

import { config, loadSitemapProperties } from '../../shared/infrastructure/config.js';
import { getLogger } from '../../shared/infrastructure/logging.js';
import { createSitemapContext, StaticRouteSource } from '../../services/sitemap/SitemapContext.js';
import { createSitemapServer } from './http-server.js';
import { loadRouteFile } from './route-file.js';

const logger = getLogger();

function main(): void {
  const properties = loadSitemapProperties();
  const routesFile = process.env.SITEMAP_ROUTES_FILE;
  const context = createSitemapContext(properties, new StaticRouteSource(routesFile ? loadRouteFile(routesFile) : []));
  context.start();

  const server = createSitemapServer(context);
  server.listen(config.server.port, config.server.host, () => {
    logger.info(`Sitemap server listening on ${config.server.host}:${config.server.port}`, 'SitemapServer');
  });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}, shutting down`, 'SitemapServer');
    server.close(() => {
      context.shutdown();
      void logger.flush().then(
        () => process.exit(0),
        () => process.exit(1)
      );
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  console.error('Failed to start sitemap server:', error);
  process.exit(1);
}
