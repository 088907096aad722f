import { isPlainObject } from './input.js';

/**
 * Write access to the output of an object rule set.
 * `set` and `setInBucket` return false when the key has no destination.
 */
export interface Setter {
  readonly isMap: boolean;
  set(key: string, value: unknown): boolean;
  setInBucket(bucket: string, key: string, value: unknown): boolean;
}

function defineEntry(
  target: Record<string, unknown>,
  key: string,
  value: unknown
): void {
  // defineProperty keeps keys such as "__proto__" as own data properties.
  Object.defineProperty(target, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

function writeInto(container: unknown, key: string, value: unknown): boolean {
  if (container instanceof Map) {
    container.set(key, value);
    return true;
  }
  if (isPlainObject(container)) {
    defineEntry(container, key, value);
    return true;
  }
  return false;
}

export class MapSetter implements Setter {
  readonly isMap = true;

  constructor(private readonly target: Record<string, unknown>) {}

  set(key: string, value: unknown): boolean {
    defineEntry(this.target, key, value);
    return true;
  }

  setInBucket(bucket: string, key: string, value: unknown): boolean {
    let container = Object.prototype.hasOwnProperty.call(this.target, bucket)
      ? this.target[bucket]
      : undefined;
    if (!isPlainObject(container) && !(container instanceof Map)) {
      container = {};
      defineEntry(this.target, bucket, container);
    }
    return writeInto(container, key, value);
  }
}

/**
 * Writes record-shaped outputs through the field key → property mapping.
 */
export class RecordSetter implements Setter {
  readonly isMap = false;

  constructor(
    private readonly target: object,
    private readonly mapping: ReadonlyMap<string, string>
  ) {}

  set(key: string, value: unknown): boolean {
    const property = this.mapping.get(key);
    if (property === undefined) return false;
    return Reflect.set(this.target, property, value);
  }

  setInBucket(bucket: string, key: string, value: unknown): boolean {
    const property = this.mapping.get(bucket);
    if (property === undefined) return false;
    let container: unknown = Reflect.get(this.target, property);
    if (!isPlainObject(container) && !(container instanceof Map)) {
      container = {};
      if (!Reflect.set(this.target, property, container)) return false;
    }
    return writeInto(container, key, value);
  }
}
