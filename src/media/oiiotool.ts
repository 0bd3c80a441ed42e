/**
 * Image sequence conversion through OpenImageIO's oiiotool.
 */
import { TOOLS } from '../config.js';
import { logger } from '../utils/logger.js';
import type { SequenceDescriptorWithOutput } from '../sequence/index.js';
import { runTool } from './process.js';

export function buildConvertArgs(
  sequence: SequenceDescriptorWithOutput,
  extraArgs: readonly string[] = [],
): string[] {
  return [sequence.path, '--frames', sequence.frames, ...extraArgs, '-v', '-o', sequence.output];
}

/** Convert every frame of `sequence` into `sequence.output`. */
export async function convertSequence(
  sequence: SequenceDescriptorWithOutput,
  extraArgs: readonly string[] = [],
): Promise<void> {
  logger.info('oiiotool: converting sequence', {
    path: sequence.path,
    frames: sequence.frames,
    output: sequence.output,
  });
  runTool(TOOLS.oiiotool, buildConvertArgs(sequence, extraArgs), 'oiiotool convert');
}
