/**
 * Shared fixtures for catalog tests
 */

import { vi } from 'vitest';
import { CatalogClient } from '../src/catalog.js';
import type { Logger } from '../src/types.js';

export const BASE_URL = 'http://catalog.test:8080/icat-rest-ws/';

export const INSTRUMENTS_XML = `<?xml version="1.0" encoding="UTF-8"?>
<instruments>
  <instrument>ARCS</instrument>
  <instrument>CNCS</instrument>
  <instrument>SEQ</instrument>
</instruments>`;

export function proposalXml(proposal: string): string {
  return `<metadata><proposal>${proposal}</proposal></metadata>`;
}

export function locationsXml(paths: string[]): string {
  const items = paths.map((path) => `<location>${path}</location>`).join('');
  return `<datafile><locations>${items}</locations></datafile>`;
}

/**
 * Fake fetch serving XML bodies keyed by path relative to BASE_URL.
 * Unknown paths answer 404.
 */
export function fakeFetch(routes: Record<string, string>) {
  return vi.fn(async (url: string) => {
    const body = routes[url.slice(BASE_URL.length)];
    if (body === undefined) {
      return new Response('Not Found', { status: 404, statusText: 'Not Found' });
    }
    return new Response(body, { status: 200, headers: { 'Content-Type': 'application/xml' } });
  });
}

export function makeClient(
  routes: Record<string, string>,
  existing: string[] = [],
  logger?: Logger
) {
  const fetch = fakeFetch(routes);
  const client = new CatalogClient({
    baseUrl: BASE_URL,
    fetch,
    exists: (path) => existing.includes(path),
    logger
  });
  return { client, fetch };
}
