/**
 * Shared types for sequence detection and path-template rewriting.
 */

// ============================================
// Descriptors
// ============================================

export interface SequenceDescriptor {
  /** Template path with a printf-style frame placeholder, e.g. `shot/beauty_%04d.exr` */
  readonly path: string;
  /** Compact range encoding, e.g. `1-4,7,9-10` */
  readonly frames: string;
  readonly first: number;
  readonly last: number;
  /** Number of member files; not necessarily `last - first + 1` */
  readonly count: number;
}

export interface SequenceDescriptorWithOutput extends SequenceDescriptor {
  /** Path handed to an external tool as its output */
  readonly output: string;
}

// ============================================
// Parsing
// ============================================

/**
 * A path split into the parts of the sequence grammar.
 * `directory + basename + frame + extension` is always the original path.
 */
export interface ParsedPathComponents {
  /** Empty, or ends with `/` or `\` */
  directory: string;
  /** Empty, or ends with `.` or `_` */
  basename: string;
  /** Digit run; absent when the file carries no frame number */
  frame?: string;
  extension: string;
}

export interface FrameBounds {
  first: number;
  last: number;
  count: number;
}

// ============================================
// Options
// ============================================

export interface OutputPathOptions {
  /** `%` for printf style (default), `''` to drop the frame token, any other string is repeated */
  pad?: string;
  /** Inserted between the name and the frame placeholder (default: '') */
  suffix?: string;
  /** Prepended to the file name (default: '') */
  prefix?: string;
  /** Replacement extension; a leading `.` is added when missing */
  extension?: string;
  /** Replacement directory */
  directory?: string;
}

export interface AggregateOptions {
  /** Working directory stripped from the front of template paths */
  cwd?: string;
}
