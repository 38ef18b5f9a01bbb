/**
 * Leaf values of a parsed JSON document
 */
export type JsonScalar = string | number | boolean | null;

export type JsonArray = JsonValue[];

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Generic JSON value - primitives, arrays and nested objects
 */
export type JsonValue = JsonScalar | JsonArray | JsonObject;

/**
 * A classified value. The flattener dispatches on `kind` rather than
 * inspecting values ad hoc.
 */
export type ValueNode =
  | { kind: 'mapping'; value: JsonObject }
  | { kind: 'sequence'; value: JsonArray }
  | { kind: 'scalar'; value: JsonScalar };
