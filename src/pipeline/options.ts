/**
 * Command-line parsing. Everything after a bare `--` is forwarded untouched
 * to the external tool.
 */
import { parseArgs } from 'util';
import { z } from 'zod';
import { isFrameRange } from '../sequence/index.js';
import type { OutputPathOptions } from '../sequence/index.js';
import { UsageError } from '../utils/errors.js';

export const COMMANDS = ['ls', 'convert', 'encode', 'view', 'format', 'range', 'help'] as const;

export type Command = typeof COMMANDS[number];

// ── Option Schema ─────────────────────────────────────────────────────────────

const OptionsSchema = z.object({
  recurse:   z.boolean().default(false),
  include:   z.array(z.string().min(1)).optional(),
  exclude:   z.array(z.string().min(1)).default([]),
  json:      z.boolean().default(false),
  missing:   z.boolean().default(false),
  pad:       z.string().optional(),
  suffix:    z.string().optional(),
  prefix:    z.string().optional(),
  ext:       z.string().optional(),
  dir:       z.string().optional(),
  frames:    z.string().refine(isFrameRange, 'expected a frame range such as 1-10,12').optional(),
  framerate: z.coerce.number().positive().optional(),
});

export type CommandOptions = z.infer<typeof OptionsSchema>;

export interface CommandLine {
  command: Command;
  positionals: string[];
  options: CommandOptions;
  /** Arguments after `--` */
  extraArgs: string[];
}

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

export function parseCommandLine(argv: readonly string[]): CommandLine {
  const [command = 'help', ...rest] = argv;
  if (!isCommand(command)) {
    throw new UsageError(`Unknown command: ${command}. Use: ${COMMANDS.join(', ')}`);
  }

  const split = rest.indexOf('--');
  const own = split === -1 ? rest : rest.slice(0, split);
  const extraArgs = split === -1 ? [] : rest.slice(split + 1);

  let parsedArgs: ReturnType<typeof parseCliArgs>;
  try {
    parsedArgs = parseCliArgs(own);
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }

  const options = OptionsSchema.safeParse(parsedArgs.values);
  if (!options.success) {
    const issues = options.error.issues.map(i => `--${i.path.join('.')}: ${i.message}`).join('; ');
    throw new UsageError(`Invalid options: ${issues}`);
  }

  return { command, positionals: parsedArgs.positionals, options: options.data, extraArgs };
}

function parseCliArgs(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    strict: true,
    options: {
      recurse:   { type: 'boolean', short: 'r' },
      include:   { type: 'string', short: 'i', multiple: true },
      exclude:   { type: 'string', short: 'x', multiple: true },
      json:      { type: 'boolean' },
      missing:   { type: 'boolean' },
      pad:       { type: 'string' },
      suffix:    { type: 'string' },
      prefix:    { type: 'string' },
      ext:       { type: 'string' },
      dir:       { type: 'string' },
      frames:    { type: 'string' },
      framerate: { type: 'string' },
    },
  });
}

/** Output-path options named on the command line. */
export function outputPathOptions(options: CommandOptions): OutputPathOptions {
  const out: OutputPathOptions = {};
  if (options.pad !== undefined) out.pad = options.pad;
  if (options.suffix !== undefined) out.suffix = options.suffix;
  if (options.prefix !== undefined) out.prefix = options.prefix;
  if (options.ext !== undefined) out.extension = options.ext;
  if (options.dir !== undefined) out.directory = options.dir;
  return out;
}

export const USAGE = `Usage: framescan <command> [options] [roots...] [-- tool args]

Commands:
  ls        list sequences (--json, --missing)
  convert   convert sequences with oiiotool
  encode    encode sequences to movies with ffmpeg (--framerate)
  view      open sequences in the viewer
  format    rewrite a path template: framescan format <path>
  range     decode a frame range: framescan range <frames>

Options:
  -r, --recurse          descend into subdirectories
  -i, --include <glob>   keep matching file names (repeatable)
  -x, --exclude <glob>   drop matching file names (repeatable)
  --frames <range>       treat the single positional as a template with these frames
  --pad <char>           placeholder style: % (printf), # or any string, '' to drop
  --suffix, --prefix, --ext, --dir   output path overrides
`;
