import { composeKey, DotStyle } from './lib/separator-style.js';
import { NotValidInputError } from './lib/errors.js';
import { classifyValue, setEntry } from './lib/utils.js';
import type { FlatMap, JsonObject, JsonValue, SeparatorStyle } from './types/index.js';

/**
 * Flatten a nested object into a single-level object whose keys encode the
 * path to each value.
 *
 * `depth` is the number of nesting levels collapsed into a key: `0` stores the
 * whole input under `prefix`, a negative depth descends without limit, and a
 * positive depth stores whatever lies deeper as an untouched sub-tree.
 *
 * @throws {NotValidInputError} when `nested` is not an object or array
 * @throws {RangeError} when `depth` is not an integer
 */
export function flatten(
  nested: JsonObject,
  prefix: string = '',
  style: SeparatorStyle = DotStyle,
  depth: number = -1
): FlatMap {
  return flattenInternal(nested, prefix, style, depth, false);
}

/**
 * Same as {@link flatten}, but arrays are kept intact as values instead of
 * being decomposed by index.
 */
export function flattenPreservingSequences(
  nested: JsonObject,
  prefix: string = '',
  style: SeparatorStyle = DotStyle,
  depth: number = -1
): FlatMap {
  return flattenInternal(nested, prefix, style, depth, true);
}

function flattenInternal(
  nested: JsonObject,
  prefix: string,
  style: SeparatorStyle,
  depth: number,
  preserveSequences: boolean
): FlatMap {
  // Checked up front so that depth 0 rejects a scalar root too
  if (classifyValue(nested).kind === 'scalar') {
    throw new NotValidInputError();
  }
  if (!Number.isInteger(depth)) {
    throw new RangeError(`Depth must be an integer, got ${depth}`);
  }

  // Entering the root already costs one level, so a positive depth is bumped
  // to keep it equal to the number of levels joined into the key.
  const remaining = depth > 0 ? depth + 1 : depth;

  const result: FlatMap = {};
  walk(true, result, nested, prefix, style, remaining, preserveSequences);
  return result;
}

function walk(
  isTop: boolean,
  output: FlatMap,
  node: JsonValue,
  prefix: string,
  style: SeparatorStyle,
  depth: number,
  preserveSequences: boolean
): void {
  if (depth === 0) {
    setEntry(output, prefix, node);
    return;
  }

  const assign = (key: string, value: JsonValue): void => {
    const child = classifyValue(value);
    switch (child.kind) {
      case 'mapping':
        walk(false, output, child.value, key, style, depth - 1, preserveSequences);
        break;
      case 'sequence':
        if (preserveSequences) {
          setEntry(output, key, child.value);
        } else {
          walk(false, output, child.value, key, style, depth - 1, preserveSequences);
        }
        break;
      case 'scalar':
        setEntry(output, key, child.value);
        break;
      default: {
        const unreachable: never = child;
        throw new Error(`Unhandled value: ${JSON.stringify(unreachable)}`);
      }
    }
  };

  const current = classifyValue(node);
  switch (current.kind) {
    case 'mapping':
      for (const [k, v] of Object.entries(current.value)) {
        assign(composeKey(isTop, prefix, k, style), v);
      }
      break;
    case 'sequence':
      if (preserveSequences) {
        setEntry(output, prefix, current.value);
        break;
      }
      current.value.forEach((v, i) => {
        assign(composeKey(isTop, prefix, String(i), style), v);
      });
      break;
    case 'scalar':
      throw new NotValidInputError();
    default: {
      const unreachable: never = current;
      throw new Error(`Unhandled value: ${JSON.stringify(unreachable)}`);
    }
  }
}

export default flatten;
