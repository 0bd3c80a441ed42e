/**
 * Path-template rewriting — swap the frame token of a file name for another
 * placeholder style and padding, and optionally re-home the file under a new
 * directory, extension, prefix or suffix.
 *
 * Recognised frame tokens, each preceded by `.` or `_` and followed by `.`:
 *   1234     digit run      width = run length
 *   ####     hash run       width = run length
 *   %04d     printf         width = N (one or two digits)
 */
import * as path from 'path';
import { printfPlaceholder } from './path-parser.js';
import type { OutputPathOptions } from './types.js';

// Greedy lead so the token nearest the extension wins.
const FRAME_TOKEN_PATTERN = /^(.*)([._])(\d+|#+|%0(\d{1,2})d)\./;

export interface FrameToken {
  /** Offset of the separator in the file name */
  index: number;
  /** Length of separator + token + trailing dot */
  length: number;
  separator: string;
  width: number;
}

/** Locate the frame token in a file name (no directory). */
export function findFrameToken(filename: string): FrameToken | null {
  const match = FRAME_TOKEN_PATTERN.exec(filename);
  if (!match) return null;

  const [, lead = '', separator = '', token = '', printfWidth] = match;
  const width = printfWidth !== undefined ? parseInt(printfWidth, 10) : token.length;
  return {
    index: lead.length,
    length: separator.length + token.length + 1,
    separator,
    width,
  };
}

function placeholderFor(pad: string, separator: string, width: number): string {
  if (pad === '') return '';
  if (pad === '%') return separator + printfPlaceholder(width);
  return separator + pad.repeat(width);
}

/**
 * Rewrite the frame token of `filePath` in the requested style.
 * Paths without a frame token are returned unchanged, overrides included.
 *
 * @example
 * rewritePath('test.1234.exr')                   // 'test.%04d.exr'
 * rewritePath('test.%05d.exr', { pad: '#' })     // 'test.#####.exr'
 * rewritePath('shot_%04d.exr', { pad: '', extension: 'mov' }) // 'shot.mov'
 */
export function rewritePath(filePath: string, options: OutputPathOptions = {}): string {
  const { pad = '%', suffix = '', prefix = '' } = options;

  const token = findFrameToken(path.basename(filePath));
  if (!token) return filePath;

  const currentExt = path.extname(filePath);
  const stem = path.basename(filePath, currentExt);
  const directory = options.directory ?? path.dirname(filePath);

  let extension = currentExt;
  if (options.extension) {
    extension = options.extension.startsWith('.') ? options.extension : `.${options.extension}`;
  }

  const name = stem + extension;
  const replacement = suffix + placeholderFor(pad, token.separator, token.width) + '.';
  const rewritten = name.slice(0, token.index) + replacement + name.slice(token.index + token.length);

  return path.join(directory, prefix + rewritten);
}
