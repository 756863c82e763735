import { MissingParameterError, UnknownParameterError } from '../errors';
import { readMap } from '../mapping/map.read';
import { retargetMap } from '../mapping/map.ties';
import type { MapNode, MapRecord, Renumbering } from '../mapping/map.types';

/**
 * Resolve parameter names to registry slots before a tie.
 *
 * Validation happens up front so a bad request never leaves the model half-tied.
 * @throws UnknownParameterError for an empty list or a name the registry does not hold.
 */
export function resolveTieIndices(names: readonly string[], registered: readonly string[]): number[] {
  if (names.length === 0)
    throw new UnknownParameterError('Cannot tie an empty list of parameters.');
  return names.map((name) => {
    const index = registered.indexOf(name);
    if (index < 0)
      throw new UnknownParameterError(
        `Cannot tie parameter ${name}. It is not present in parameters ${registered.join(', ')}.`,
        name
      );
    return index;
  });
}

/** Retarget every map of a model through one renumbering. */
export function retargetMaps(maps: Readonly<MapRecord>, renumbering: Renumbering): MapRecord {
  const retargeted: MapRecord = {};
  for (const [key, map] of Object.entries(maps)) retargeted[key] = retargetMap(map, renumbering);
  return retargeted;
}

/**
 * Immutable view of a model's recipes at one tie version. Safe to hand to concurrent readers (or
 * to post to a worker): later ties replace the model's maps instead of editing them.
 */
export interface ModelSnapshot {
  /** Number of ties applied to the model when the snapshot was taken. */
  readonly version: number;
  readonly names: readonly string[];
  readonly maps: Readonly<MapRecord>;
}

function freezeNode(node: MapNode): MapNode {
  if (Object.isFrozen(node)) return node;
  if (node.kind === 'sequence') {
    node.items.forEach(freezeNode);
    Object.freeze(node.items);
  } else if (node.kind === 'apply') {
    node.args.forEach(freezeNode);
    Object.freeze(node.args);
    Object.freeze(node.ctor);
  }
  return Object.freeze(node);
}

export function createSnapshot(version: number, names: readonly string[], maps: Readonly<MapRecord>): ModelSnapshot {
  const frozen: MapRecord = {};
  for (const [key, map] of Object.entries(maps)) frozen[key] = freezeNode(map);
  return Object.freeze({
    version,
    names: Object.freeze([...names]),
    maps: Object.freeze(frozen),
  });
}

/**
 * Evaluate one map of a snapshot.
 * @throws MissingParameterError when the snapshot has no map under `key`.
 */
export function readSnapshot(snapshot: ModelSnapshot, key: string, values: ReadonlyArray<unknown>): unknown {
  if (!Object.prototype.hasOwnProperty.call(snapshot.maps, key))
    throw new MissingParameterError(key, `Snapshot has no map named '${key}'.`);
  return readMap(snapshot.maps[key], values);
}
