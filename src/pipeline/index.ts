/**
 * Command handlers: scan → aggregate → hand each sequence to a tool.
 *
 * External tools run one at a time, in template-path order, and a failure
 * stops the run.
 */
import { ENCODE_DEFAULTS } from '../config.js';
import { logger } from '../utils/logger.js';
import { UsageError } from '../utils/errors.js';
import { scanFiles } from '../scan/files.js';
import {
  aggregateSequences,
  describeSequence,
  findMissingFrames,
  withOutput,
  type OutputPathOptions,
  type SequenceDescriptor,
  type SequenceDescriptorWithOutput,
} from '../sequence/index.js';
import { convertSequence } from '../media/oiiotool.js';
import { encodeSequence } from '../media/ffmpeg.js';
import { viewSequence } from '../media/viewer.js';
import type { CommandOptions } from './options.js';

// ── Collection ────────────────────────────────────────────────────────────────

/**
 * Resolve the sequences a command works on: either a single template given
 * with `--frames`, or everything found under the positional roots.
 */
export async function collectSequences(
  positionals: string[],
  options: CommandOptions,
  cwd: string = process.cwd(),
): Promise<SequenceDescriptor[]> {
  if (options.frames !== undefined) {
    const [template, ...others] = positionals;
    if (template === undefined || others.length > 0) {
      throw new UsageError('--frames needs exactly one template path');
    }
    return [describeSequence(template, options.frames)];
  }

  const roots = positionals.length > 0 ? positionals : [cwd];
  const files = await scanFiles(roots, {
    recurse: options.recurse,
    include: options.include,
    exclude: options.exclude,
  });
  const sequences = aggregateSequences(files, { cwd });

  logger.info('Pipeline: sequences found', { files: files.length, sequences: sequences.length });
  return sequences;
}

// ── Listing ───────────────────────────────────────────────────────────────────

export interface ListingOptions {
  json?: boolean;
  missing?: boolean;
}

/** Render sequences as tab-separated `path frames count` lines, or JSON. */
export function formatListing(sequences: SequenceDescriptor[], options: ListingOptions = {}): string {
  if (options.json) {
    const rows = options.missing
      ? sequences.map(s => ({ ...s, missing: findMissingFrames(s.frames) }))
      : sequences;
    return JSON.stringify(rows, null, 2) + '\n';
  }

  return sequences
    .map(s => {
      const columns = [s.path, s.frames, String(s.count)];
      if (options.missing) columns.push(findMissingFrames(s.frames).join(','));
      return columns.join('\t') + '\n';
    })
    .join('');
}

// ── Tools ─────────────────────────────────────────────────────────────────────

/**
 * Throw when any job would write onto its own source, which happens for
 * sequences whose names carry no rewritable frame token (`frames/%04d.exr`).
 */
function assertNoOverwrite(jobs: SequenceDescriptorWithOutput[]): void {
  const clash = jobs.find(j => j.output === j.path);
  if (clash) {
    throw new UsageError(
      `Output would overwrite ${clash.path}; pass --ext, --dir, --prefix or --suffix`,
    );
  }
}

/**
 * Convert every sequence with oiiotool.
 * Refuses to run when an output path would overwrite its source.
 */
export async function convertAll(
  sequences: SequenceDescriptor[],
  outputOptions: OutputPathOptions,
  extraArgs: string[] = [],
): Promise<SequenceDescriptorWithOutput[]> {
  const jobs = sequences.map(s => withOutput(s, outputOptions));
  assertNoOverwrite(jobs);

  for (const job of jobs) {
    await convertSequence(job, extraArgs);
  }
  return jobs;
}

/**
 * Encode every sequence to a movie. The frame token is dropped from the
 * output name and the extension defaults to DEFAULT_VIDEO_EXT.
 * Refuses to run when an output path would overwrite its source.
 */
export async function encodeAll(
  sequences: SequenceDescriptor[],
  outputOptions: OutputPathOptions,
  framerate: number = ENCODE_DEFAULTS.framerate,
  extraArgs: string[] = [],
): Promise<SequenceDescriptorWithOutput[]> {
  const jobs = sequences.map(s =>
    withOutput(s, { pad: '', extension: ENCODE_DEFAULTS.extension, ...outputOptions }),
  );
  assertNoOverwrite(jobs);

  for (const job of jobs) {
    await encodeSequence(job, { framerate, extraArgs });
  }
  return jobs;
}

export async function viewAll(sequences: SequenceDescriptor[], extraArgs: string[] = []): Promise<void> {
  for (const sequence of sequences) {
    await viewSequence(sequence, extraArgs);
  }
}
