/**
 * Word lists for shell completion (see completion/finddata.bash)
 */

import { LOG_LEVELS } from './config.js';
import type { CatalogClient } from './catalog.js';

export const COMPLETION_CATEGORIES = ['instruments', 'loglevels', 'options'] as const;
export type CompletionCategory = (typeof COMPLETION_CATEGORIES)[number];

export const CLI_OPTIONS = [
  '-h',
  '--help',
  '--version',
  '--loglevel',
  '--filename',
  '--getproposal',
  '--listruns',
  '--complete'
] as const;

export function isCompletionCategory(value: string): value is CompletionCategory {
  return (COMPLETION_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Space-separated candidates for a completion category
 */
export async function completionWords(category: CompletionCategory, client: CatalogClient): Promise<string> {
  switch (category) {
    case 'instruments':
      return (await client.listInstruments()).join(' ');
    case 'loglevels':
      return LOG_LEVELS.join(' ');
    case 'options':
      return CLI_OPTIONS.join(' ');
  }
}
