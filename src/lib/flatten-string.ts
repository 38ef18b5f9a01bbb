import JSON5 from 'json5';
import { flatten, flattenPreservingSequences } from '../flatten.js';
import { DotStyle } from './separator-style.js';
import { NotValidJsonInputError } from './errors.js';
import { classifyValue, isJsonObject } from './utils.js';
import type { FlattenStringOptions, InputSyntax, JsonObject, JsonValue, SeparatorStyle } from '../types/index.js';

const LeadingBrace = /^\s*\{/;

/**
 * Decode text that must hold an object. Syntax errors from the decoder are
 * rethrown as-is.
 */
export function parseNested(text: string, syntax: InputSyntax = 'json'): JsonObject {
  if (!LeadingBrace.test(text)) {
    throw new NotValidJsonInputError();
  }
  const parsed: unknown = syntax === 'json5' ? JSON5.parse(text) : JSON.parse(text);
  if (!isJsonObject(parsed)) {
    throw new NotValidJsonInputError();
  }
  return parsed;
}

/**
 * Flatten a JSON object given as text and return the result as compact JSON,
 * with object keys in sorted order.
 */
export function flattenString(
  nestedString: string,
  prefix: string = '',
  style: SeparatorStyle = DotStyle,
  depth: number = -1,
  options: FlattenStringOptions = {}
): string {
  const nested = parseNested(nestedString, options.syntax);
  return encodeSorted(flatten(nested, prefix, style, depth));
}

/**
 * Text variant of {@link flattenPreservingSequences}.
 */
export function flattenStringPreservingSequences(
  nestedString: string,
  prefix: string = '',
  style: SeparatorStyle = DotStyle,
  depth: number = -1,
  options: FlattenStringOptions = {}
): string {
  const nested = parseNested(nestedString, options.syntax);
  return encodeSorted(flattenPreservingSequences(nested, prefix, style, depth));
}

/**
 * Compact JSON with the keys of every object sorted by UTF-16 code unit.
 * Written out pair by pair: a rebuilt object would still list integer-like
 * keys first.
 */
export function encodeSorted(value: JsonValue): string {
  const node = classifyValue(value);
  switch (node.kind) {
    case 'mapping': {
      const pairs = Object.entries(node.value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, v]) => `${JSON.stringify(key)}:${encodeSorted(v)}`);
      return `{${pairs.join(',')}}`;
    }
    case 'sequence':
      return `[${node.value.map((item) => encodeSorted(item)).join(',')}]`;
    case 'scalar':
      return JSON.stringify(node.value);
    default: {
      const unreachable: never = node;
      throw new Error(`Unhandled value: ${JSON.stringify(unreachable)}`);
    }
  }
}
