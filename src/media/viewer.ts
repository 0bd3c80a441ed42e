import { TOOLS } from '../config.js';
import { logger } from '../utils/logger.js';
import type { SequenceDescriptor } from '../sequence/index.js';
import { runTool } from './process.js';

/** Open `sequence` in the configured viewer and wait for it to close. */
export async function viewSequence(
  sequence: SequenceDescriptor,
  extraArgs: readonly string[] = [],
): Promise<void> {
  logger.info('Viewer: opening sequence', { path: sequence.path, frames: sequence.frames });
  runTool(TOOLS.viewer, [...extraArgs, sequence.path], 'viewer');
}
