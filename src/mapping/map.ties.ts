import { OutOfRangeError } from '../errors';
import type { MapNode, Renumbering } from './map.types';

/**
 * Rewrite every slot reference of `map` through `renumbering` (old index → new index).
 *
 * Constants and structure are preserved. The input is left untouched and a new tree is returned,
 * so snapshots holding the old tree stay consistent with the values vectors they were taken for.
 *
 * @throws OutOfRangeError for a slot index the renumbering does not cover.
 */
export function retargetMap(map: MapNode, renumbering: Renumbering): MapNode {
  switch (map.kind) {
    case 'constant':
      return map;
    case 'slot': {
      const target = renumbering[map.index];
      if (target === undefined) throw new OutOfRangeError(map.index, renumbering.length);
      return { kind: 'slot', index: target };
    }
    case 'sequence':
      return { kind: 'sequence', items: map.items.map((item) => retargetMap(item, renumbering)) };
    case 'apply':
      return {
        kind: 'apply',
        ctor: map.ctor,
        args: map.args.map((arg) => retargetMap(arg, renumbering)),
      };
  }
}

/** Distinct slot indices referenced by `map`, ascending. */
export function slotIndices(map: MapNode): number[] {
  const found = new Set<number>();
  const visit = (node: MapNode): void => {
    if (node.kind === 'slot') found.add(node.index);
    else if (node.kind === 'sequence') node.items.forEach(visit);
    else if (node.kind === 'apply') node.args.forEach(visit);
  };
  visit(map);
  return [...found].sort((a, b) => a - b);
}

/** Highest slot index referenced by `map`; -1 when it holds no slot. */
export function maxSlotIndex(map: MapNode): number {
  const indices = slotIndices(map);
  return indices.length ? indices[indices.length - 1] : -1;
}
