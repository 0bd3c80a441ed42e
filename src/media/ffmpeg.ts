/**
 * Video encoding of image sequences through FFmpeg's image2 demuxer.
 * The input is the printf template path; `-start_number` points FFmpeg at the
 * first frame on disk.
 */
import { TOOLS, ENCODE_DEFAULTS } from '../config.js';
import { logger } from '../utils/logger.js';
import type { SequenceDescriptorWithOutput } from '../sequence/index.js';
import { runTool } from './process.js';

export interface EncodeOptions {
  /** Input frame rate (default: DEFAULT_FRAMERATE) */
  framerate?: number;
  /** Passed to FFmpeg between the input and the output */
  extraArgs?: readonly string[];
}

export function buildEncodeArgs(
  sequence: SequenceDescriptorWithOutput,
  options: EncodeOptions = {},
): string[] {
  const { framerate = ENCODE_DEFAULTS.framerate, extraArgs = [] } = options;
  return [
    '-y',
    '-r', String(framerate),
    '-start_number', String(sequence.first),
    '-i', sequence.path,
    ...extraArgs,
    sequence.output,
  ];
}

/** Encode `sequence` into the movie file at `sequence.output`. */
export async function encodeSequence(
  sequence: SequenceDescriptorWithOutput,
  options: EncodeOptions = {},
): Promise<void> {
  logger.info('FFmpeg: encoding sequence', {
    path: sequence.path,
    first: sequence.first,
    output: sequence.output,
  });
  runTool(TOOLS.ffmpeg, buildEncodeArgs(sequence, options), 'ffmpeg encode');
}
