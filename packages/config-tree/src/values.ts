import type { HclMap, HclValue, HclValueType, ScalarValue } from '@tfcanvas/contracts';

export type ValueOf<T extends HclValueType> = Extract<HclValue, { type: T }>;

export const str = (value: string): ValueOf<'String'> => ({ type: 'String', value });
export const bool = (value: boolean): ValueOf<'Boolean'> => ({ type: 'Boolean', value });
export const int = (value: number): ValueOf<'Integer'> => ({ type: 'Integer', value });
export const float = (value: number): ValueOf<'Float'> => ({ type: 'Float', value });
export const raw = (value: string): ValueOf<'Raw'> => ({ type: 'Raw', value });
export const list = (...items: HclValue[]): ValueOf<'List'> => ({ type: 'List', value: items });

type MapEntries = Record<string, HclValue> | Array<[string, HclValue]>;

export function map(entries: MapEntries = []): ValueOf<'Map'> {
  return { type: 'Map', value: toHclMap(entries) };
}

export function toHclMap(entries: MapEntries): HclMap {
  return new Map(Array.isArray(entries) ? entries : Object.entries(entries));
}

export function isScalar(value: HclValue): value is ScalarValue {
  return value.type !== 'List' && value.type !== 'Map';
}

export function isMap(value: HclValue): value is ValueOf<'Map'> {
  return value.type === 'Map';
}

export function cloneValue(value: HclValue): HclValue {
  switch (value.type) {
    case 'List': {
      return { type: 'List', value: value.value.map((item) => cloneValue(item)) };
    }
    case 'Map': {
      return { type: 'Map', value: cloneMap(value.value) };
    }
    default: {
      return { ...value };
    }
  }
}

export function cloneMap(source: HclMap): HclMap {
  const copy: HclMap = new Map();
  for (const [key, value] of source) copy.set(key, cloneValue(value));
  return copy;
}

/** Structural equality; Map entries must also appear in the same order */
export function valuesEqual(a: HclValue, b: HclValue): boolean {
  if (a.type === 'List' && b.type === 'List') return a.value.length === b.value.length && a.value.every((item, i) => valuesEqual(item, b.value[i]));
  if (a.type === 'Map' && b.type === 'Map') return mapsEqual(a.value, b.value);
  if (a.type === 'List' || a.type === 'Map' || b.type === 'List' || b.type === 'Map') return false;
  return a.type === b.type && a.value === b.value;
}

export function mapsEqual(a: HclMap, b: HclMap): boolean {
  if (a.size !== b.size) return false;

  const left = [...a.entries()];
  const right = [...b.entries()];
  return left.every(([key, value], i) => right[i][0] === key && valuesEqual(value, right[i][1]));
}

/**
 * Lists are expected to hold either only maps or no maps at all.
 * `mixed` marks a list that breaks that rule.
 */
export type ListShape = 'empty' | 'blocks' | 'scalars' | 'mixed';

export function listShape(items: HclValue[]): ListShape {
  if (items.length === 0) return 'empty';

  const maps = items.filter((item) => item.type === 'Map').length;
  if (maps === items.length) return 'blocks';
  if (maps === 0) return 'scalars';
  return 'mixed';
}
