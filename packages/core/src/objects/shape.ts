import { isPlainObject } from './input.js';
import { MapSetter, RecordSetter, type Setter } from './setter.js';

/**
 * How an object rule set builds, recognises and writes its output.
 */
export interface OutputShape<T> {
  readonly isMap: boolean;
  /** Used in descriptions and internal error messages. */
  readonly name: string;
  /** Field key → property; only record shapes have one. */
  readonly mapping: ReadonlyMap<string, string> | undefined;
  create(): T;
  accepts(value: unknown): value is T;
  setter(target: T): Setter;
}

export function mapShape<V>(): OutputShape<Record<string, V>> {
  return {
    isMap: true,
    name: 'map',
    mapping: undefined,
    create: () => ({}),
    accepts: (value): value is Record<string, V> => isPlainObject(value),
    setter: (target) => new MapSetter(target),
  };
}

/**
 * Record output built by `factory`. Without `keys`, every own property of
 * a freshly built instance is a field under its own name.
 */
export function recordShape<T extends object>(
  factory: () => T,
  keys?: Readonly<Record<string, string>>
): OutputShape<T> {
  const template = factory();
  const prototype: unknown = Object.getPrototypeOf(template);
  const mapping = new Map<string, string>(
    keys
      ? Object.entries(keys)
      : Object.keys(template).map((property) => [property, property])
  );
  const name =
    typeof template.constructor === 'function' && template.constructor.name
      ? template.constructor.name
      : 'record';

  return {
    isMap: false,
    name,
    mapping,
    create: factory,
    accepts: (value): value is T =>
      typeof value === 'object' &&
      value !== null &&
      Object.getPrototypeOf(value) === prototype,
    setter: (target) => new RecordSetter(target, mapping),
  };
}

export function describeValueType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (value instanceof Map) return 'Map';
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === null || proto === Object.prototype) return 'map';
    const ctor: unknown = value.constructor;
    if (typeof ctor === 'function' && ctor.name) return ctor.name;
    return 'object';
  }
  return typeof value;
}
