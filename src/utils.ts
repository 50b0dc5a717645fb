/**
 * Utility functions for finddata
 */

import { readFile } from 'node:fs/promises';
import { PACKAGE_JSON_FILE } from './config.js';
import { UsageError } from './errors.js';

/**
 * Read JSON file with type safety
 */
export async function readJson<T>(filePath: string): Promise<T | null> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as T;
  } catch {
    return null;
  }
}

/**
 * Version string from package.json
 */
export async function getVersion(): Promise<string> {
  const pkg = await readJson<{ version?: string }>(PACKAGE_JSON_FILE);
  return pkg?.version ?? 'unknown';
}

export interface ParsedArgs {
  options: Record<string, string | boolean>;
  positionals: string[];
}

export interface ArgSpec {
  // Options that never take a value
  flags: readonly string[];
  // Options that always take a value
  valued: readonly string[];
}

/**
 * Parse command line arguments
 * Supports --key=value and --key value for valued options, bare --flag for flags.
 * Everything after a lone "--" is positional.
 */
export function parseArgs(args: string[], spec: ArgSpec): ParsedArgs {
  const options: Record<string, string | boolean> = {};
  const positionals: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--') {
      positionals.push(...args.slice(i + 1));
      break;
    }

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const eqIndex = arg.indexOf('=');
    const key = eqIndex !== -1 ? arg.slice(2, eqIndex) : arg.slice(2);

    if (spec.flags.includes(key)) {
      if (eqIndex !== -1) {
        throw new UsageError(`option --${key} does not take a value`);
      }
      options[key] = true;
    } else if (spec.valued.includes(key)) {
      if (eqIndex !== -1) {
        // --key=value format
        options[key] = arg.slice(eqIndex + 1);
      } else {
        // --key value format
        const nextArg = args[i + 1];
        if (nextArg === undefined || nextArg.startsWith('--')) {
          throw new UsageError(`option --${key} expects a value`);
        }
        options[key] = nextArg;
        i++; // Skip the next arg since we consumed it as a value
      }
    } else {
      throw new UsageError(`unrecognized option ${arg}`);
    }
  }

  return { options, positionals };
}
