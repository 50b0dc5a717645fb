/**
 * finddata
 *
 * Locate experiment data files, proposals and run ranges
 * through the facility data catalog REST service.
 */

export { CatalogClient, dataFileNames } from './catalog.js';
export { expandRuns, expandRunTokens, toRunNumber } from './runs.js';
export { findData } from './finddata.js';
export { createLogger } from './logger.js';
export * from './errors.js';
export * from './types.js';
