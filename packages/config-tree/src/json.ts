import type { HclMap, HclValue } from '@tfcanvas/contracts';

import { listShape } from './values';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export class ConfigValueError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(path ? `${message} at "${path}"` : message);
    this.name = 'ConfigValueError';
  }
}

/** Called for values that have no direct counterpart and were kept as raw expressions */
export type AmbiguityHandler = (path: string, value: unknown) => void;

/** Key of the wrapper object that marks a whole-number Float, e.g. `{ "$float": 2 }` */
export const FLOAT_TAG = '$float';

export interface JsonCodecOptions {
  /**
   * Write whole-number Floats as `{ "$float": n }` and read that form back as a Float.
   * Plain JSON cannot tell `2.0` from `2`.
   */
  tagFloats?: boolean;
}

function childPath(path: string, key: string | number): string {
  if (typeof key === 'number') return `${path}[${key}]`;
  return path ? `${path}.${key}` : key;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function taggedFloat(input: Record<string, unknown>): number | undefined {
  const keys = Object.keys(input);
  const value = input[FLOAT_TAG];
  return keys.length === 1 && keys[0] === FLOAT_TAG && typeof value === 'number' ? value : undefined;
}

function convert(input: unknown, path: string, onAmbiguity: AmbiguityHandler | undefined, options: JsonCodecOptions): HclValue {
  if (typeof input === 'string') return { type: 'String', value: input };
  if (typeof input === 'boolean') return { type: 'Boolean', value: input };

  if (typeof input === 'number') {
    if (!Number.isFinite(input)) throw new ConfigValueError(`Non-finite number ${input}`, path);
    return Number.isInteger(input) ? { type: 'Integer', value: input } : { type: 'Float', value: input };
  }

  if (input === null) {
    onAmbiguity?.(path, input);
    return { type: 'Raw', value: 'null' };
  }

  if (Array.isArray(input)) {
    const items = input.map((item, i) => convert(item, childPath(path, i), onAmbiguity, options));
    if (listShape(items) === 'mixed') throw new ConfigValueError('List mixes objects with other values', path);
    return { type: 'List', value: items };
  }

  if (isPlainObject(input)) {
    const tagged = options.tagFloats ? taggedFloat(input) : undefined;
    if (tagged !== undefined) {
      if (!Number.isFinite(tagged)) throw new ConfigValueError(`Non-finite number ${tagged}`, path);
      return { type: 'Float', value: tagged };
    }
    return { type: 'Map', value: convertObject(input, path, onAmbiguity, options) };
  }

  throw new ConfigValueError(`Unsupported value of type ${typeof input}`, path);
}

function convertObject(input: Record<string, unknown>, path: string, onAmbiguity: AmbiguityHandler | undefined, options: JsonCodecOptions): HclMap {
  const result: HclMap = new Map();
  for (const [key, value] of Object.entries(input)) result.set(key, convert(value, childPath(path, key), onAmbiguity, options));
  return result;
}

/** Converts parsed JSON into a value tree. Integers and other numbers map to Integer and Float. */
export function fromJson(input: unknown, onAmbiguity?: AmbiguityHandler, options: JsonCodecOptions = {}): HclValue {
  return convert(input, '', onAmbiguity, options);
}

export function mapFromJson(input: unknown, onAmbiguity?: AmbiguityHandler, options: JsonCodecOptions = {}): HclMap {
  if (!isPlainObject(input)) throw new ConfigValueError('Expected an object', '');
  return convertObject(input, '', onAmbiguity, options);
}

export function toJson(value: HclValue, options: JsonCodecOptions = {}): JsonValue {
  switch (value.type) {
    case 'String':
    case 'Boolean':
    case 'Integer': {
      return value.value;
    }
    case 'Float': {
      return options.tagFloats && Number.isInteger(value.value) ? { [FLOAT_TAG]: value.value } : value.value;
    }
    case 'Raw': {
      return value.value === 'null' ? null : value.value;
    }
    case 'List': {
      return value.value.map((item) => toJson(item, options));
    }
    case 'Map': {
      return mapToJson(value.value, options);
    }
  }
}

export function mapToJson(source: HclMap, options: JsonCodecOptions = {}): { [key: string]: JsonValue } {
  const result: { [key: string]: JsonValue } = {};
  for (const [key, value] of source) result[key] = toJson(value, options);
  return result;
}
