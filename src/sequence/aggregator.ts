/**
 * Sequence aggregation — group a flat list of file paths into numbered
 * sequences keyed by their template path.
 *
 * Files join the same sequence only when directory, basename, frame width
 * and extension all agree, so `shot_1.exr` and `shot_01.exr` stay apart.
 */
import * as path from 'path';
import { compressFrames, measureFrames } from './frame-range.js';
import { parseSequencePath, templatePath } from './path-parser.js';
import { rewritePath } from './path-template.js';
import type {
  AggregateOptions,
  OutputPathOptions,
  SequenceDescriptor,
  SequenceDescriptorWithOutput,
} from './types.js';

function stripCwd(template: string, cwd: string | undefined): string {
  if (!cwd) return template;
  const base = cwd.endsWith(path.sep) ? cwd : cwd + path.sep;
  return template.startsWith(base) ? template.slice(base.length) : template;
}

/**
 * Collapse `paths` into sequence descriptors, ordered by template path.
 * Paths without a frame number are dropped, and so are frame numbers too long
 * to hold exactly (more than 15 digits of value); single files still form a
 * sequence of one.
 */
export function aggregateSequences(
  paths: Iterable<string>,
  options: AggregateOptions = {},
): SequenceDescriptor[] {
  const groups = new Map<string, number[]>();

  for (const filePath of paths) {
    const parsed = parseSequencePath(filePath);
    if (!parsed?.frame) continue;

    const frame = parseInt(parsed.frame, 10);
    if (!Number.isSafeInteger(frame)) continue;

    const key = templatePath({ ...parsed, frame: parsed.frame });
    const frames = groups.get(key) ?? [];
    frames.push(frame);
    groups.set(key, frames);
  }

  const keys = [...groups.keys()].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const sequences: SequenceDescriptor[] = [];

  for (const key of keys) {
    const frames = (groups.get(key) ?? []).sort((a, b) => a - b);
    const first = frames[0];
    const last = frames[frames.length - 1];
    if (first === undefined || last === undefined) continue;

    sequences.push({
      path: stripCwd(key, options.cwd),
      frames: compressFrames(frames),
      first,
      last,
      count: frames.length,
    });
  }

  return sequences;
}

/** Attach the output path a downstream tool should write to. */
export function withOutput(
  sequence: SequenceDescriptor,
  options: OutputPathOptions = {},
): SequenceDescriptorWithOutput {
  return { ...sequence, output: rewritePath(sequence.path, options) };
}

/**
 * Describe a sequence from a template path and range string supplied by hand,
 * e.g. `('shot_%04d.exr', '1001-1100')`. Bounds and count are exact even for
 * out-of-order input.
 */
export function describeSequence(template: string, frames: string): SequenceDescriptor {
  return { path: template, frames, ...measureFrames(frames) };
}
