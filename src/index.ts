// Library entrypoint that exposes the flatten functions and separator styles for consumers.
export { default as flatten } from './flatten.js';
export { flattenPreservingSequences } from './flatten.js';
export {
  flattenString,
  flattenStringPreservingSequences,
  parseNested,
  encodeSorted,
} from './lib/flatten-string.js';
export {
  DotStyle,
  PathStyle,
  RailsStyle,
  UnderscoreStyle,
  SeparatorStyles,
  buildStyle,
  composeKey,
  createStyle,
  describeStyle,
  isSeparatorStyleName,
  resolveStyle,
} from './lib/separator-style.js';
export type { StyleOverrides } from './lib/separator-style.js';
export { FlattenError, NotValidInputError, NotValidJsonInputError } from './lib/errors.js';
export type { FlattenErrorCode } from './lib/errors.js';
export { classifyValue, isJsonObject, parseDepth } from './lib/utils.js';
export * from './types/index.js';
