import { OutOfRangeError } from '../errors';
import { construct } from '../methods/constructors';
import { isRecord } from '../utils/json';
import type { MapNode } from './map.types';

/**
 * Evaluate a map against a values vector, rebuilding the nested configuration it was built from.
 *
 * Pure: neither the map nor the values are mutated, so concurrent readers of the same map need no
 * coordination. `values` is usually a vector of numbers proposed by an optimizer, but reading
 * against the registry's own Variables reproduces the symbolic configuration.
 *
 * @throws OutOfRangeError when a slot index is beyond `values`.
 */
export function readMap(map: MapNode, values: ReadonlyArray<unknown>): unknown {
  switch (map.kind) {
    case 'constant':
      return map.value;
    case 'slot':
      if (map.index >= values.length) throw new OutOfRangeError(map.index, values.length);
      return values[map.index];
    case 'sequence':
      return map.items.map((item) => readMap(item, values));
    case 'apply':
      return construct(
        map.ctor,
        map.args.map((arg) => readMap(arg, values))
      );
    default: {
      const unknownNode: never = map;
      throw new Error(`Unknown map node ${JSON.stringify(unknownNode)}.`);
    }
  }
}

/**
 * {@link readMap} for maps built from mappings.
 * @throws Error when the map does not evaluate to a record.
 */
export function readRecord(map: MapNode, values: ReadonlyArray<unknown>): Record<string, unknown> {
  const result = readMap(map, values);
  if (!isRecord(result)) throw new Error('Map does not describe a key-value mapping.');
  return result;
}
