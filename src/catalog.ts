/**
 * Client for the data catalog REST service
 *
 * Each lookup fetches one XML document, pulls a single field out of it
 * and discards the tree. Nothing is cached between calls.
 */

import { existsSync } from 'node:fs';
import { CATALOG_BASE_URL, FACILITY, withTrailingSlash } from './config.js';
import { CatalogRequestError, NotFoundError, UsageError } from './errors.js';
import { silentLogger } from './logger.js';
import { childElements, findFirstElement, firstText, parseDocument, textValues } from './xml.js';
import { found, notFound } from './types.js';
import type { CatalogClientOptions, CatalogNode, FetchLike, Logger, LookupResult } from './types.js';

/**
 * File names tried for a run, oldest convention first
 */
export function dataFileNames(instrument: string, run: number): string[] {
  return [`${instrument}_${run}_event.nxs`, `${instrument}_${run}.nxs.h5`];
}

export class CatalogClient {
  readonly baseUrl: string;
  private readonly logger: Logger;
  private readonly fetch: FetchLike;
  private readonly exists: (path: string) => boolean;

  constructor(options: CatalogClientOptions = {}) {
    this.baseUrl = withTrailingSlash(options.baseUrl ?? CATALOG_BASE_URL);
    this.logger = options.logger ?? silentLogger;
    this.fetch = options.fetch ?? ((url) => fetch(url));
    this.exists = options.exists ?? existsSync;
  }

  /**
   * Fetch `path` relative to the base URL and parse the body
   */
  private async getDocument(path: string): Promise<CatalogNode[]> {
    const url = `${this.baseUrl}${path}`;
    this.logger.debug(`GET ${url}`);

    const response = await this.fetch(url);

    if (!response.ok) {
      throw new CatalogRequestError(url, response.status, response.statusText);
    }

    const body = await response.text();
    return parseDocument(body, url);
  }

  /**
   * Instrument codes known to the catalog, in the case the service uses
   */
  async listInstruments(): Promise<string[]> {
    const doc = await this.getDocument(`experiment/${FACILITY}`);
    const instruments = findFirstElement(doc, 'instruments');
    if (!instruments) {
      this.logger.warn('Catalog returned no instrument list');
      return [];
    }
    return childElements(instruments).flatMap(textValues);
  }

  /**
   * Upper-case `name` and check it against the live instrument list
   */
  async validateInstrument(name: string): Promise<string> {
    const instrument = name.toUpperCase();
    const known = await this.listInstruments();
    if (!known.some((candidate) => candidate.toUpperCase() === instrument)) {
      throw new UsageError(`Unknown instrument "${name}" (known: ${known.join(', ')})`);
    }
    return instrument;
  }

  async findProposal(instrument: string, run: number): Promise<LookupResult<string>> {
    const doc = await this.getDocument(`dataset/${FACILITY}/${instrument}/${run}/metaOnly`);
    const element = findFirstElement(doc, 'proposal');
    const proposal = element && firstText(element);
    return proposal !== undefined ? found(proposal) : notFound('Failed to find proposal');
  }

  /**
   * Run range string for a proposal, e.g. "1234-1240,1250"
   */
  async listRunsInProposal(instrument: string, proposal: string): Promise<LookupResult<string>> {
    const doc = await this.getDocument(`experiment/${FACILITY}/${instrument}/${proposal}`);
    const element = findFirstElement(doc, 'runRange');
    const runRange = element && firstText(element);
    return runRange !== undefined
      ? found(runRange.replace(/ /g, ''))
      : notFound(`Failed to find runs for proposal ${proposal}`);
  }

  /**
   * First catalog location for `filename` that exists on this machine
   */
  async findFileLocation(filename: string): Promise<LookupResult<string>> {
    const doc = await this.getDocument(`datafile/filename/${filename}`);
    const candidates = this.procLocations(doc);
    this.logger.debug(`Catalog locations for ${filename}: ${candidates.join(', ') || '(none)'}`);

    const location = candidates.find((path) => this.exists(path));
    return location !== undefined ? found(location) : notFound(`Failed to find file ${filename}`);
  }

  /**
   * Candidate paths from the first <locations> element, in document order
   */
  private procLocations(doc: CatalogNode[]): string[] {
    const locations = findFirstElement(doc, 'locations');
    if (!locations) return [];
    return childElements(locations, 'location').flatMap((location) => {
      const path = firstText(location);
      return path !== undefined ? [path] : [];
    });
  }

  /**
   * Locate the data file for a run, trying each naming convention in turn.
   * Throws NotFoundError when none of them resolves.
   */
  async findDataFile(instrument: string, run: number): Promise<string> {
    for (const filename of dataFileNames(instrument, run)) {
      const result = await this.findFileLocation(filename);
      if (result.found) {
        return result.value;
      }
      this.logger.info(result.reason);
    }
    throw new NotFoundError(instrument, run);
  }
}
