import type { HclMap, ScalarValue } from '@tfcanvas/contracts';
import { isScalar } from '@tfcanvas/config-tree';

export interface FlattenOptions {
  /**
   * How many levels of nested maps are exposed as editable leaves.
   * 1 matches the classic editing surface: `tags.Env` but never `a.b.c`.
   */
  maxDepth?: number;
}

export const DEFAULT_MAX_DEPTH = 1;

export interface LeafVisit {
  path: string;
  key: string;
  /** Path of the enclosing map, undefined for top-level keys */
  group?: string;
  value: ScalarValue;
}

export function resolveDepth(options: FlattenOptions = {}): number {
  const depth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(depth) || depth < 0) throw new RangeError(`maxDepth must be a non-negative integer, got ${depth}`);
  return depth;
}

/** Visits editable scalar leaves in key order. Lists, maps past maxDepth and keys containing a dot are skipped. */
export function visitLeaves(config: HclMap, maxDepth: number, visit: (leaf: LeafVisit) => void, onGroup?: (path: string) => void): void {
  const walk = (entries: HclMap, group: string | undefined, depth: number) => {
    for (const [key, value] of entries) {
      // a dotted key has no field path that splits back to it; it is kept but not editable
      if (key.includes('.')) continue;
      const path = group === undefined ? key : `${group}.${key}`;

      if (isScalar(value)) visit({ path, key, group, value });
      else if (value.type === 'Map' && depth < maxDepth) {
        onGroup?.(path);
        walk(value.value, path, depth + 1);
      }
    }
  };

  walk(config, undefined, 0);
}

/**
 * Splits a dotted path into at most maxDepth + 1 segments.
 * With maxDepth 1, "a.b.c" becomes ["a", "b.c"].
 */
export function splitPath(path: string, maxDepth: number): string[] {
  const parts = path.split('.');
  if (parts.length <= maxDepth + 1) return parts;
  return [...parts.slice(0, maxDepth), parts.slice(maxDepth).join('.')];
}
