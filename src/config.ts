/**
 * Configuration for finddata
 */

import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// __dirname is src/ under tsx and dist/ when built, package.json sits one level up
export const PACKAGE_JSON_FILE = join(__dirname, '..', 'package.json');

// Catalog REST service
export const CATALOG_HOST = process.env.FINDDATA_HOST || 'icat.sns.gov';
export const CATALOG_PORT = process.env.FINDDATA_PORT || '2080';
export const CATALOG_BASE_URL = withTrailingSlash(
  process.env.FINDDATA_BASE_URL || `http://${CATALOG_HOST}:${CATALOG_PORT}/icat-rest-ws/`
);

export const FACILITY = 'SNS';

// Logging
export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING'] as const;
export const DEFAULT_LOG_LEVEL = 'WARNING';

/**
 * Ensure a base URL ends with a slash so relative paths can be appended
 */
export function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}
