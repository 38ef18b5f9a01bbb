import type { JsonValue } from './jsonValueTypes.js';

/**
 * Decoration applied to every nested key segment: before + middle + key + after.
 * The top-level segment is never decorated.
 */
export interface SeparatorStyle {
  readonly before: string;
  readonly middle: string;
  readonly after: string;
}

/**
 * Names of the predefined separator styles
 */
export type SeparatorStyleName = 'dot' | 'path' | 'rails' | 'underscore';

/**
 * Flattened result: composed key -> scalar, or an untouched sub-tree where
 * depth truncation or array preservation stopped descent
 */
export interface FlatMap {
  [key: string]: JsonValue;
}

/**
 * Input syntax accepted by the text front end
 */
export type InputSyntax = 'json' | 'json5';

/**
 * Options for the text-in/text-out functions
 */
export interface FlattenStringOptions {
  /** Decoder used after the leading-brace check (default: 'json') */
  syntax?: InputSyntax;
}
