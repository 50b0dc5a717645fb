/**
 * Error types raised by the catalog client and the CLI
 */

// Non-2xx response from the catalog service
export class CatalogRequestError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly statusText: string
  ) {
    super(`Catalog error: ${status} ${statusText} (${url})`);
    this.name = 'CatalogRequestError';
  }
}

// Response body that is not well-formed XML
export class CatalogParseError extends Error {
  constructor(
    readonly url: string,
    detail: string,
    readonly line?: number
  ) {
    super(`Malformed XML from ${url}${line !== undefined ? ` (line ${line})` : ''}: ${detail}`);
    this.name = 'CatalogParseError';
  }
}

// Neither file naming convention produced an existing location
export class NotFoundError extends Error {
  constructor(
    readonly instrument: string,
    readonly run: number
  ) {
    super(`Failed to find file for instrument ${instrument} and run ${run}`);
    this.name = 'NotFoundError';
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
