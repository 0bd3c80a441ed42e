export { aggregateSequences, withOutput, describeSequence } from './aggregator.js';
export {
  compressFrames,
  expandBounds,
  expandFrames,
  findMissingFrames,
  isFrameRange,
  measureFrames,
} from './frame-range.js';
export { parseSequencePath, templatePath, printfPlaceholder } from './path-parser.js';
export { rewritePath, findFrameToken } from './path-template.js';
export type { FrameToken } from './path-template.js';
export type {
  AggregateOptions,
  FrameBounds,
  OutputPathOptions,
  ParsedPathComponents,
  SequenceDescriptor,
  SequenceDescriptorWithOutput,
} from './types.js';
