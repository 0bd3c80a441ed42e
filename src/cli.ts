/**
 * Command router. `write` receives everything meant for stdout.
 */
import { expandBounds, isFrameRange, rewritePath } from './sequence/index.js';
import { UsageError } from './utils/errors.js';
import { logger } from './utils/logger.js';
import {
  collectSequences,
  convertAll,
  encodeAll,
  formatListing,
  viewAll,
} from './pipeline/index.js';
import { outputPathOptions, parseCommandLine, USAGE } from './pipeline/options.js';

function single(positionals: string[], what: string): string {
  const [value, ...others] = positionals;
  if (value === undefined || others.length > 0) {
    throw new UsageError(`Expected exactly one ${what}`);
  }
  return value;
}

export async function runCli(argv: readonly string[], write: (text: string) => void): Promise<void> {
  const { command, positionals, options, extraArgs } = parseCommandLine(argv);
  const outputOptions = outputPathOptions(options);

  switch (command) {
    case 'help':
      write(USAGE);
      return;

    case 'format':
      write(rewritePath(single(positionals, 'path'), outputOptions) + '\n');
      return;

    case 'range': {
      const range = single(positionals, 'frame range');
      if (!isFrameRange(range)) throw new UsageError(`Not a frame range: ${range}`);
      write(JSON.stringify(expandBounds(range)) + '\n');
      return;
    }

    default:
      break;
  }

  const sequences = await collectSequences(positionals, options);
  if (sequences.length === 0) {
    logger.warn('No sequences found', { roots: positionals });
  }

  switch (command) {
    case 'ls':
      write(formatListing(sequences, options));
      break;
    case 'convert':
      for (const job of await convertAll(sequences, outputOptions, extraArgs)) {
        write(`${job.output}\n`);
      }
      break;
    case 'encode':
      for (const job of await encodeAll(sequences, outputOptions, options.framerate, extraArgs)) {
        write(`${job.output}\n`);
      }
      break;
    case 'view':
      await viewAll(sequences, extraArgs);
      break;
  }
}
