/**
 * Loads a route table from a JSON file
 */

import fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from '../../shared/domain/errors.js';
import { RouteDefinition, RouteDefinitionSchema } from '../../services/sitemap/domain/RouteTypes.js';

const RouteFileSchema = z.array(RouteDefinitionSchema);

/**
 * Read route definitions from a JSON array file
 * @throws ConfigurationError when the file is not valid JSON or not a list of routes
 */
export function loadRouteFile(filePath: string): RouteDefinition[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`cannot read routes file ${filePath}`, {
      cause: error instanceof Error ? error.message : String(error)
    });
  }

  const result = RouteFileSchema.safeParse(parsed);
  if (!result.success) {
    const summary = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`invalid routes file ${filePath}: ${summary}`, { issues: result.error.issues });
  }
  return result.data;
}
