/**
 * Run-number token expansion
 *
 * Accepts a bare integer ("123"), a comma list ("1,5,9"), dash ranges
 * ("100-105") or any mix of those ("100-105,110"). Tokens that fail to
 * convert become 0 and are dropped, so run 0 cannot be requested.
 */

import { silentLogger } from './logger.js';
import type { Logger } from './types.js';

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

// Digit strings beyond the safe integer range would lose precision
function parseInteger(text: string): number | null {
  if (!INTEGER_PATTERN.test(text)) return null;
  const value = parseInt(text, 10);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Convert text to a run number, or 0 when it is not an integer
 */
export function toRunNumber(text: string, logger: Logger = silentLogger): number {
  const value = parseInteger(text);
  if (value === null) {
    logger.info(`Could not convert "${text}" to a run number`);
    return 0;
  }
  return value;
}

/**
 * Inclusive ascending range
 */
function span(first: number, last: number): number[] {
  const runs: number[] = [];
  for (let run = first; run <= last; run++) {
    runs.push(run);
  }
  return runs;
}

/**
 * Expand a single run token into run numbers, in the order written
 */
export function expandRuns(token: string, logger: Logger = silentLogger): number[] {
  const direct = parseInteger(token);
  if (direct !== null) {
    return direct ? [direct] : [];
  }

  const runs: number[] = [];

  for (const piece of token.split(',')) {
    if (piece.includes('-')) {
      // "8-5" and "5-8" are the same range; "1-2-3" spans lowest to highest
      const bounds = piece
        .split('-')
        .map((part) => toRunNumber(part, logger))
        .sort((a, b) => a - b);
      const low = bounds[0];
      const high = bounds[bounds.length - 1];
      if (low) {
        runs.push(...span(low, high));
      }
    } else {
      const run = toRunNumber(piece, logger);
      if (run) {
        runs.push(run);
      }
    }
  }

  return runs;
}

/**
 * Expand every positional run token, keeping duplicates and order
 */
export function expandRunTokens(tokens: string[], logger: Logger = silentLogger): number[] {
  return tokens.flatMap((token) => expandRuns(token, logger));
}
