import type { FlatFieldSet, HclMap, HclValue } from '@tfcanvas/contracts';
import { cloneMap } from '@tfcanvas/config-tree';

import { type FlattenOptions, resolveDepth, splitPath, visitLeaves } from './paths';

export function flatten(config: HclMap, options?: FlattenOptions): FlatFieldSet {
  const fields: FlatFieldSet = new Map();
  visitLeaves(config, resolveDepth(options), ({ path, value }) => fields.set(path, value));
  return fields;
}

/** Paths of the maps that label groups of fields on an editing surface */
export function listGroups(config: HclMap, options?: FlattenOptions): string[] {
  const groups: string[] = [];
  visitLeaves(
    config,
    resolveDepth(options),
    () => {},
    (path) => groups.push(path)
  );
  return groups;
}

function assign(target: HclMap, segments: string[], value: HclValue): void {
  let current = target;

  for (const segment of segments.slice(0, -1)) {
    const existing = current.get(segment);
    if (existing?.type === 'Map') {
      current = existing.value;
      continue;
    }

    // A scalar in the way of a group is replaced by the group
    const child: HclMap = new Map();
    current.set(segment, { type: 'Map', value: child });
    current = child;
  }

  current.set(segments.at(-1) ?? '', value);
}

/** Rebuilds a nested map from flat fields. Exact inverse of flatten for its own output. */
export function reassemble(fields: FlatFieldSet, options?: FlattenOptions): HclMap {
  return reconcile(new Map(), fields, options);
}

/**
 * Applies edited fields on top of an existing config.
 * Subtrees that are not editable (lists, deeper maps, empty maps) survive untouched;
 * keys keep their position and unknown paths are appended.
 */
export function reconcile(config: HclMap, fields: FlatFieldSet, options?: FlattenOptions): HclMap {
  const depth = resolveDepth(options);
  const result = cloneMap(config);

  for (const [path, value] of fields) assign(result, splitPath(path, depth), value);

  return result;
}
