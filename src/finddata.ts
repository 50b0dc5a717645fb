/**
 * finddata command
 *
 * Looks up data file locations, proposals and proposal run ranges
 * for an instrument in the data catalog. Returns the process exit code.
 */

import { CatalogClient } from './catalog.js';
import { completionWords, isCompletionCategory, COMPLETION_CATEGORIES } from './completion.js';
import { DEFAULT_LOG_LEVEL, LOG_LEVELS } from './config.js';
import { NotFoundError, UsageError } from './errors.js';
import { createLogger, isLogLevel } from './logger.js';
import { expandRunTokens } from './runs.js';
import { getVersion, parseArgs } from './utils.js';
import type { Logger } from './types.js';

export const USAGE = 'Usage: finddata [options] [instrument] [runs...]';

const HELP = `${USAGE}

Find data files, proposals and run ranges in the data catalog.

Arguments:
  instrument              Instrument name (case-insensitive)
  runs                    Run numbers: 123, 1,5,9 or 100-105,110

Options:
  -h, --help              Show this message and exit
  --version               Print the version and exit
  --loglevel <level>      ${LOG_LEVELS.join(', ')} (default ${DEFAULT_LOG_LEVEL})
  --filename <name>       Look up a file by name instead of by run
  --getproposal           Print the proposal for each run
  --listruns              Print the run range of the proposal given as the only run argument
  --complete <category>   Print completion words (${COMPLETION_CATEGORIES.join(', ')})`;

const ARG_SPEC = {
  flags: ['help', 'version', 'getproposal', 'listruns'],
  valued: ['loglevel', 'filename', 'complete']
} as const;

export interface FindDataDeps {
  createClient?: (logger: Logger) => CatalogClient;
  print?: (line: string) => void;
  printError?: (line: string) => void;
  writeLog?: (line: string) => void;
}

function stringOption(options: Record<string, string | boolean>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Run finddata with the given arguments (without the node/script prefix)
 */
export async function findData(argv: string[], deps: FindDataDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line));
  const printError = deps.printError ?? ((line: string) => console.error(line));
  const createClient = deps.createClient ?? ((logger: Logger) => new CatalogClient({ logger }));

  try {
    const { options, positionals } = parseArgs(
      argv.map((arg) => (arg === '-h' ? '--help' : arg)),
      ARG_SPEC
    );

    if (options.help) {
      print(HELP);
      return 0;
    }

    if (options.version) {
      print(`finddata ${await getVersion()}`);
      return 0;
    }

    const level = (stringOption(options, 'loglevel') ?? DEFAULT_LOG_LEVEL).toUpperCase();
    if (!isLogLevel(level)) {
      throw new UsageError(`invalid --loglevel "${level}" (choose from ${LOG_LEVELS.join(', ')})`);
    }
    const logger = createLogger(level, deps.writeLog);
    const client = createClient(logger);

    const category = stringOption(options, 'complete');
    if (category !== undefined) {
      if (!isCompletionCategory(category)) {
        throw new UsageError(
          `invalid --complete "${category}" (choose from ${COMPLETION_CATEGORIES.join(', ')})`
        );
      }
      print(await completionWords(category, client));
      return 0;
    }

    const filename = stringOption(options, 'filename');
    if (filename !== undefined) {
      const location = await client.findFileLocation(filename);
      print(location.found ? location.value : location.reason);
      return location.found ? 0 : 1;
    }

    const [name, ...tokens] = positionals;
    if (name === undefined) {
      throw new UsageError('must specify an instrument');
    }
    const instrument = await client.validateInstrument(name);
    logger.debug(`Instrument ${instrument}, run arguments: ${tokens.join(' ') || '(none)'}`);

    if (options.listruns) {
      if (tokens.length !== 1) {
        throw new UsageError('--listruns takes exactly one proposal');
      }
      const runRange = await client.listRunsInProposal(instrument, tokens[0]);
      print(runRange.found ? runRange.value : runRange.reason);
      return 0;
    }

    const runs = expandRunTokens(tokens, logger);
    if (runs.length === 0) {
      throw new UsageError('failed to specify any runs');
    }
    logger.info(`Looking up ${runs.length} run(s) for ${instrument}`);

    for (const run of runs) {
      if (options.getproposal) {
        const proposal = await client.findProposal(instrument, run);
        print(`${run} ${proposal.found ? proposal.value : proposal.reason}`);
        continue;
      }

      try {
        print(await client.findDataFile(instrument, run));
      } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
        print(err.message);
      }
    }

    return 0;
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    printError(USAGE);
    printError(`finddata: error: ${err.message}`);
    return 2;
  }
}
