import type { SeparatorStyle, SeparatorStyleName } from '../types/index.js';

export const DotStyle: SeparatorStyle = Object.freeze({ before: '', middle: '.', after: '' });
export const PathStyle: SeparatorStyle = Object.freeze({ before: '', middle: '/', after: '' });
export const RailsStyle: SeparatorStyle = Object.freeze({ before: '[', middle: '', after: ']' });
export const UnderscoreStyle: SeparatorStyle = Object.freeze({ before: '', middle: '_', after: '' });

// Name -> predefined style, used by the CLI and the Action
export const SeparatorStyles: Readonly<Record<SeparatorStyleName, SeparatorStyle>> = Object.freeze({
  dot: DotStyle,
  path: PathStyle,
  rails: RailsStyle,
  underscore: UnderscoreStyle,
});

export function isSeparatorStyleName(name: string): name is SeparatorStyleName {
  return Object.prototype.hasOwnProperty.call(SeparatorStyles, name);
}

/**
 * Look up a predefined style by name (case-insensitive).
 */
export function resolveStyle(name: string): SeparatorStyle {
  const normalized = name.trim().toLowerCase();
  if (!isSeparatorStyleName(normalized)) {
    const available = Object.keys(SeparatorStyles).join(', ');
    throw new Error(`Unknown separator style '${name}'. Available styles: ${available}`);
  }
  return SeparatorStyles[normalized];
}

/**
 * Build a custom style. Omitted parts are empty.
 */
export function createStyle(before: string = '', middle: string = '', after: string = ''): SeparatorStyle {
  return Object.freeze({ before, middle, after });
}

/**
 * Append `subKey` to `prefix`. The top level is written as-is so that a
 * caller-supplied prefix reads as a plain leading token; nested levels get the
 * style's decoration.
 */
export function composeKey(isTopLevel: boolean, prefix: string, subKey: string, style: SeparatorStyle): string {
  if (isTopLevel) {
    return prefix + subKey;
  }
  return prefix + style.before + style.middle + subKey + style.after;
}

export interface StyleOverrides {
  before?: string;
  middle?: string;
  after?: string;
}

/**
 * Resolve a named style, replacing any part given in `overrides`.
 */
export function buildStyle(name: string, overrides: StyleOverrides = {}): SeparatorStyle {
  const base = resolveStyle(name);
  const { before, middle, after } = overrides;
  if (before === undefined && middle === undefined && after === undefined) {
    return base;
  }
  return createStyle(before ?? base.before, middle ?? base.middle, after ?? base.after);
}

/**
 * Name of the predefined style with the same parts, or the parts themselves
 * for a custom style.
 */
export function describeStyle(style: SeparatorStyle): string {
  for (const [name, predefined] of Object.entries(SeparatorStyles)) {
    if (predefined.before === style.before && predefined.middle === style.middle && predefined.after === style.after) {
      return name;
    }
  }
  const { before, middle, after } = style;
  return `custom ${JSON.stringify({ before, middle, after })}`;
}
