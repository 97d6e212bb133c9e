export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

interface Serializable {
  toJSON(): unknown;
}

/** The closed set of input shapes `toJson` knows how to convert. */
export type Shape =
  | { kind: 'primitive'; value: JsonPrimitive }
  | { kind: 'bigint'; value: bigint }
  | { kind: 'date'; value: Date }
  | { kind: 'serializable'; value: Serializable }
  | { kind: 'array'; value: readonly unknown[] }
  | { kind: 'map'; value: ReadonlyMap<unknown, unknown> }
  | { kind: 'set'; value: ReadonlySet<unknown> }
  | { kind: 'record'; value: object }
  | { kind: 'opaque' };

function isSerializable(value: object): value is Serializable {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

export function classifyShape(value: unknown): Shape {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return { kind: 'primitive', value };
    case 'number':
      return { kind: 'primitive', value: Number.isFinite(value) ? value : null };
    case 'undefined':
      return { kind: 'primitive', value: null };
    case 'bigint':
      return { kind: 'bigint', value };
    case 'function':
    case 'symbol':
      return { kind: 'opaque' };
    default:
      break;
  }
  if (typeof value !== 'object' || value === null) return { kind: 'primitive', value: null };
  if (value instanceof Date) return { kind: 'date', value };
  if (Array.isArray(value)) return { kind: 'array', value };
  if (value instanceof Map) return { kind: 'map', value };
  if (value instanceof Set) return { kind: 'set', value };
  if (isSerializable(value)) return { kind: 'serializable', value };
  return { kind: 'record', value };
}

function recordToJson(entries: Iterable<[string, unknown]>, ancestors: WeakSet<object>): JsonObject {
  const out: JsonObject = {};
  for (const [key, item] of entries) {
    const shape = classifyShape(item);
    // undefined, functions and symbols are left out, as JSON.stringify does
    if (shape.kind === 'opaque' || item === undefined) continue;
    out[key] = fromShape(shape, ancestors);
  }
  return out;
}

type ContainerShape = Exclude<Shape, { kind: 'primitive' | 'bigint' | 'date' | 'opaque' }>;

function fromContainer(shape: ContainerShape, ancestors: WeakSet<object>): JsonValue {
  switch (shape.kind) {
    case 'serializable': {
      const out = shape.value.toJSON();
      return out === shape.value
        ? recordToJson(Object.entries(shape.value), ancestors)
        : fromShape(classifyShape(out), ancestors);
    }
    case 'array':
      return shape.value.map((item) => fromShape(classifyShape(item), ancestors));
    case 'map':
      return recordToJson(
        Array.from(shape.value, ([k, v]): [string, unknown] => [String(k), v]),
        ancestors,
      );
    case 'set':
      return Array.from(shape.value, (item) => fromShape(classifyShape(item), ancestors));
    case 'record':
      return recordToJson(Object.entries(shape.value), ancestors);
  }
}

function fromShape(shape: Shape, ancestors: WeakSet<object>): JsonValue {
  switch (shape.kind) {
    case 'primitive':
      return shape.value;
    case 'bigint':
      return shape.value.toString();
    case 'date':
      return Number.isNaN(shape.value.getTime()) ? null : shape.value.toISOString();
    case 'opaque':
      return null;
    default:
      break;
  }
  // an object that contains itself becomes null where it repeats
  if (ancestors.has(shape.value)) return null;
  ancestors.add(shape.value);
  try {
    return fromContainer(shape, ancestors);
  } finally {
    ancestors.delete(shape.value);
  }
}

/**
 * Converts an API response (models, maps, dates, plain records) into JSON-safe data.
 * A reference back to an enclosing object is written as `null`.
 */
export function toJson(value: unknown): JsonValue {
  return fromShape(classifyShape(value), new WeakSet());
}

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toJsonObject(value: unknown): JsonObject {
  const json = toJson(value);
  if (!isJsonObject(json)) {
    throw new TypeError(`expected a JSON object, got ${Array.isArray(json) ? 'array' : typeof json}`);
  }
  return json;
}
