/**
 * Read access to the value handed to an object rule set.
 *
 * Map-shaped inputs are plain objects and Maps keyed only by strings; every other
 * non-array object is record-shaped and read by property name.
 */

export type InputShape = 'map' | 'record';

export interface InputAccessor {
  readonly shape: InputShape;
  /** Field keys present on a map-shaped input; empty for records. */
  keys(): string[];
  has(key: string): boolean;
  get(key: string): unknown;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

class PlainObjectInput implements InputAccessor {
  readonly shape = 'map' as const;

  constructor(private readonly source: Record<string, unknown>) {}

  keys(): string[] {
    return Object.keys(this.source);
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.source, key);
  }

  get(key: string): unknown {
    return this.has(key) ? this.source[key] : undefined;
  }
}

class MapInput implements InputAccessor {
  readonly shape = 'map' as const;

  constructor(private readonly source: Map<unknown, unknown>) {}

  keys(): string[] {
    const keys: string[] = [];
    for (const key of this.source.keys()) {
      if (typeof key === 'string') keys.push(key);
    }
    return keys;
  }

  has(key: string): boolean {
    return this.source.has(key);
  }

  get(key: string): unknown {
    return this.source.get(key);
  }
}

class RecordInput implements InputAccessor {
  readonly shape = 'record' as const;

  constructor(
    private readonly source: object,
    private readonly mapping: ReadonlyMap<string, string> | undefined
  ) {}

  keys(): string[] {
    return [];
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  get(key: string): unknown {
    const property = this.mapping?.get(key) ?? key;
    return Reflect.get(this.source, property);
  }
}

/**
 * Accessor for `value`, or `undefined` when it is neither map- nor
 * record-shaped. A Map with any non-string key is neither.
 * `mapping` (field key → property) applies to records.
 */
export function accessInput(
  value: unknown,
  mapping?: ReadonlyMap<string, string>
): InputAccessor | undefined {
  if (isPlainObject(value)) return new PlainObjectInput(value);
  if (value instanceof Map) {
    return nonStringKeyType(value) === undefined ? new MapInput(value) : undefined;
  }
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return new RecordInput(value, mapping);
  }
  return undefined;
}

/** Type of the first key of `source` that is not a string. */
export function nonStringKeyType(source: Map<unknown, unknown>): string | undefined {
  for (const key of source.keys()) {
    if (typeof key !== 'string') return key === null ? 'null' : typeof key;
  }
  return undefined;
}

const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode a JSON text or UTF-8 bytes into a plain object.
 * Returns `undefined` when the input is not JSON text or not an object.
 */
export function decodeJsonObject(
  input: string | Uint8Array
): Record<string, unknown> | undefined {
  let parsed: unknown;
  try {
    const text = typeof input === 'string' ? input : decoder.decode(input);
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  return isPlainObject(parsed) ? parsed : undefined;
}
