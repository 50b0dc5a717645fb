/**
 * Type definitions for finddata
 */

import type { LOG_LEVELS } from './config.js';

// =============================================================================
// LOGGING
// =============================================================================

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

// =============================================================================
// CATALOG DOCUMENT (parsed XML response)
// =============================================================================

export interface CatalogElement {
  kind: 'element';
  name: string;
  children: CatalogNode[];
}

export interface CatalogText {
  kind: 'text';
  value: string;
}

export type CatalogNode = CatalogElement | CatalogText;

// =============================================================================
// LOOKUP RESULTS
// =============================================================================

export interface Found<T> {
  found: true;
  value: T;
}

export interface NotFound {
  found: false;
  reason: string;
}

export type LookupResult<T> = Found<T> | NotFound;

export function found<T>(value: T): Found<T> {
  return { found: true, value };
}

export function notFound(reason: string): NotFound {
  return { found: false, reason };
}

// =============================================================================
// CLIENT OPTIONS
// =============================================================================

export type FetchLike = (url: string) => Promise<Response>;

export interface CatalogClientOptions {
  baseUrl?: string;
  logger?: Logger;
  fetch?: FetchLike;
  /** Local filesystem existence check used to filter catalog locations */
  exists?: (path: string) => boolean;
}
