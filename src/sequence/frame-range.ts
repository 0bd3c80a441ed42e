/**
 * Frame range strings: `1-4,7,9-10` style lists of single frames and
 * inclusive runs.
 */
import type { FrameBounds } from './types.js';

const FRAME_RANGE_PATTERN = /^\d+(-\d+)?(,\d+(-\d+)?)*$/;

type Segment = [start: number, end: number];

function parseSegments(range: string): Segment[] {
  const segments: Segment[] = [];
  if (range === '') return segments;

  for (const part of range.split(',')) {
    const [a, b = a] = part.split('-').map(s => parseInt(s, 10));
    if (a === undefined || Number.isNaN(a) || Number.isNaN(b)) continue;
    segments.push([a, b]);
  }
  return segments;
}

/** Segments ordered by start, with overlapping or touching runs joined. */
function mergedSegments(range: string): Segment[] {
  const sorted = parseSegments(range)
    .map(([a, b]): Segment => (a <= b ? [a, b] : [b, a]))
    .sort((x, y) => x[0] - y[0]);

  const merged: Segment[] = [];
  for (const [a, b] of sorted) {
    const tail = merged[merged.length - 1];
    if (tail && a <= tail[1] + 1) {
      tail[1] = Math.max(tail[1], b);
    } else {
      merged.push([a, b]);
    }
  }
  return merged;
}

/**
 * True when `value` is a well-formed range string whose frames are safe
 * integers in strictly ascending order (`1-4,7,9-10`, not `30,10` or `5-3`).
 */
export function isFrameRange(value: string): boolean {
  if (!FRAME_RANGE_PATTERN.test(value)) return false;

  let previous = -1;
  for (const [a, b] of parseSegments(value)) {
    if (!Number.isSafeInteger(a) || !Number.isSafeInteger(b)) return false;
    if (a <= previous || b < a) return false;
    previous = b;
  }
  return true;
}

/**
 * Collapse frames into a range string, in input order.
 * Pass frames sorted ascending for canonical output.
 */
export function compressFrames(frames: readonly number[]): string {
  const [head, ...rest] = frames;
  if (head === undefined) return '';

  let out = String(head);
  let last = head;
  let continuing = false;

  for (const frame of rest) {
    if (frame === last + 1) {
      continuing = true;
    } else {
      out += continuing ? `-${last},${frame}` : `,${frame}`;
      continuing = false;
    }
    last = frame;
  }

  if (continuing) out += `-${last}`;
  return out;
}

/**
 * First and last frame of a range string.
 *
 * `count` is `last - first + 1`, which overcounts broken ranges
 * (`1-4,7,9-10` gives 10, not 7). Use `measureFrames` for the exact member
 * count.
 */
export function expandBounds(range: string): FrameBounds {
  const tokens = range.split(/[-,]/);
  const first = parseInt(tokens[0] ?? '', 10);
  if (tokens.length === 1) {
    return { first, last: first, count: 1 };
  }
  const last = parseInt(tokens[tokens.length - 1] ?? '', 10);
  return { first, last, count: last - first + 1 };
}

/**
 * Exact bounds and member count of a range string, computed per run so a
 * huge range costs nothing. Runs out of order or reversed (`5-3`) are
 * normalised first.
 */
export function measureFrames(range: string): FrameBounds {
  const segments = mergedSegments(range);
  const head = segments[0];
  const tail = segments[segments.length - 1];
  if (!head || !tail) return { first: 0, last: 0, count: 0 };

  let count = 0;
  for (const [a, b] of segments) count += b - a + 1;
  return { first: head[0], last: tail[1], count };
}

/**
 * Every frame a range string names, in order. Builds one array entry per
 * frame; prefer `measureFrames` when only the count is needed.
 */
export function expandFrames(range: string): number[] {
  const frames: number[] = [];
  for (const [start, end] of parseSegments(range)) {
    for (let f = start; f <= end; f++) frames.push(f);
  }
  return frames;
}

/** Frames between the first and last of `range` that it does not include. */
export function findMissingFrames(range: string): number[] {
  const missing: number[] = [];
  let previousEnd: number | undefined;

  for (const [a, b] of mergedSegments(range)) {
    if (previousEnd !== undefined) {
      for (let f = previousEnd + 1; f < a; f++) missing.push(f);
    }
    previousEnd = b;
  }
  return missing;
}
