/**
 * Sequence filename grammar.
 *
 *   directory  longest prefix ending in `/` or `\`
 *   basename   longest following run ending in `.` or `_`
 *   frame      digit run right after the basename (optional)
 *   extension  remainder: dotted groups such as `.1bar` (optional digit, then
 *              a letter) followed by a final `.ext`
 *
 * Groups are greedy left to right, so `shot.v002.1001.exr` splits as
 * `shot.v002.` / `1001` / `.exr`.
 */
import type { ParsedPathComponents } from './types.js';

const SEQUENCE_PATH_PATTERN =
  /^(?<directory>.*[\\/])?(?<basename>[^\\/]*[._])?(?<frame>\d+)?(?<extension>(?:\.\d?[A-Za-z][A-Za-z0-9]*)*\.[A-Za-z0-9]+)?$/;

/**
 * Split `path` into sequence components, or null when it does not fit the
 * grammar at all. A result without `frame` is not a sequence member.
 */
export function parseSequencePath(path: string): ParsedPathComponents | null {
  const groups = SEQUENCE_PATH_PATTERN.exec(path)?.groups;
  if (!groups) return null;

  const parsed: ParsedPathComponents = {
    directory: groups['directory'] ?? '',
    basename: groups['basename'] ?? '',
    extension: groups['extension'] ?? '',
  };
  const frame = groups['frame'];
  if (frame !== undefined) parsed.frame = frame;
  return parsed;
}

/** printf placeholder for a frame of `width` digits, e.g. `%04d`. */
export function printfPlaceholder(width: number): string {
  return `%0${width}d`;
}

/**
 * Group key of a parsed sequence member: the path with its frame digits
 * replaced by a printf placeholder of the same width.
 */
export function templatePath(parsed: ParsedPathComponents & { frame: string }): string {
  return parsed.directory + parsed.basename + printfPlaceholder(parsed.frame.length) + parsed.extension;
}
