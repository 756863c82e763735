/**
 * JSON codec for map recipes and map bundles.
 *
 * Map JSON mirrors {@link MapNode} one to one: node kind discriminant, constant payloads,
 * constructor specs (tags from the closed set) and child ordering. Constants are limited to what
 * JSON can carry plus boxed non-finite numbers and complex numbers; `undefined` is written as a
 * constant without a `value` field.
 *
 * A *bundle* packages the named maps of a model with the slot names (and optionally a values
 * vector) so a recipe can be stored or shipped to a worker and evaluated without the model.
 *
 * Bundle layout (formatVersion = 1):
 *  { formatVersion: 1, names: string[], maps: { [key]: MapJSON }, values?: ValueJSON[] }
 */
import { MissingParameterError } from '../errors';
import { CONSTRUCTOR_TAGS } from '../methods/constructors';
import { Complex } from '../structures/complex';
import { Label } from '../structures/labelled';
import { decodeNumber, EncodedNumber, encodeNumber, isBoxedNumber, isRecord } from '../utils/json';
import { onceWarn } from '../utils/deprecation';
import type { VariableValue } from '../variables/variable';
import { readMap } from './map.read';
import { maxSlotIndex } from './map.ties';
import type { ConstructorSpec, MapNode, MapRecord } from './map.types';

/** Current bundle format. */
export const MAP_BUNDLE_FORMAT_VERSION = 1;

export interface ConstantJSON {
  kind: 'constant';
  /** Absent for `undefined`. */
  value?: string | boolean | null | EncodedNumber;
  /** `[real, imag]` for complex constants (then `value` is absent). */
  complex?: [EncodedNumber, EncodedNumber];
}

export interface SlotJSON {
  kind: 'slot';
  index: number;
}

export interface SequenceJSON {
  kind: 'sequence';
  items: MapJSON[];
}

export interface ApplyJSON {
  kind: 'apply';
  ctor: ConstructorSpec;
  args: MapJSON[];
}

export type MapJSON = ConstantJSON | SlotJSON | SequenceJSON | ApplyJSON;

/** Parameter value as stored in a bundle. */
export type ValueJSON = EncodedNumber | { complex: [EncodedNumber, EncodedNumber] };

export interface MapBundleJSON {
  formatVersion: number;
  names: string[];
  maps: Record<string, MapJSON>;
  values?: ValueJSON[];
}

/** In-memory bundle: named maps, slot names and an optional values vector. */
export interface MapBundle {
  names: string[];
  maps: MapRecord;
  values?: VariableValue[];
}

function constantToJSON(value: unknown): ConstantJSON {
  if (value === undefined) return { kind: 'constant' };
  if (value === null || typeof value === 'string' || typeof value === 'boolean')
    return { kind: 'constant', value };
  if (typeof value === 'number') return { kind: 'constant', value: encodeNumber(value) };
  if (value instanceof Complex)
    return { kind: 'constant', complex: [encodeNumber(value.real), encodeNumber(value.imag)] };
  throw new Error(`Cannot serialize constant of type ${describe(value)}.`);
}

function describe(value: unknown): string {
  if (typeof value !== 'object' || value === null) return typeof value;
  const ctor = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
}

/**
 * Serialize a map.
 * @throws Error for constants JSON cannot represent (functions, class instances, objects).
 */
export function mapToJSON(map: MapNode): MapJSON {
  switch (map.kind) {
    case 'constant':
      return constantToJSON(map.value);
    case 'slot':
      return { kind: 'slot', index: map.index };
    case 'sequence':
      return { kind: 'sequence', items: map.items.map(mapToJSON) };
    case 'apply':
      return { kind: 'apply', ctor: ctorToJSON(map.ctor), args: map.args.map(mapToJSON) };
  }
}

function ctorToJSON(spec: ConstructorSpec): ConstructorSpec {
  switch (spec.tag) {
    case 'dict':
      return { tag: 'dict', keys: [...spec.keys] };
    case 'labelled':
      return { tag: 'labelled', dim: spec.dim, coords: [...spec.coords] };
    case 'complex':
      return { tag: 'complex' };
  }
}

/**
 * Rebuild a map from {@link mapToJSON} output (typically after `JSON.parse`).
 * @throws Error on unknown node kinds, unknown constructor tags or malformed fields.
 */
export function mapFromJSON(json: unknown): MapNode {
  if (!isRecord(json)) throw new Error('Invalid JSON for map node.');
  switch (json.kind) {
    case 'constant':
      return { kind: 'constant', value: constantFromJSON(json) };
    case 'slot': {
      const index = json.index;
      if (typeof index !== 'number' || !Number.isInteger(index) || index < 0)
        throw new Error('Slot index must be a non-negative integer.');
      return { kind: 'slot', index };
    }
    case 'sequence':
      return { kind: 'sequence', items: childrenFromJSON(json.items, 'items') };
    case 'apply': {
      const ctor = ctorFromJSON(json.ctor);
      const args = childrenFromJSON(json.args, 'args');
      const expected = ctor.tag === 'dict' ? ctor.keys.length : ctor.tag === 'labelled' ? ctor.coords.length : 2;
      if (args.length !== expected)
        throw new Error(`Constructor '${ctor.tag}' expects ${expected} argument(s), found ${args.length}.`);
      return { kind: 'apply', ctor, args };
    }
    default:
      throw new Error(`Unknown map node kind '${String(json.kind)}'.`);
  }
}

function constantFromJSON(json: Record<string, unknown>): unknown {
  if (Array.isArray(json.complex)) {
    const [real, imag] = json.complex;
    return new Complex(decodeNumber(real, 'complex.real'), decodeNumber(imag, 'complex.imag'));
  }
  if (!('value' in json)) return undefined;
  const value = json.value;
  if (isBoxedNumber(value)) return decodeNumber(value);
  if (value === null || ['string', 'number', 'boolean'].includes(typeof value)) return value;
  throw new Error('Constant payload must be a JSON primitive.');
}

function childrenFromJSON(json: unknown, field: string): MapNode[] {
  if (!Array.isArray(json)) throw new Error(`Map node field '${field}' must be an array.`);
  return json.map(mapFromJSON);
}

function isLabel(value: unknown): value is Label {
  return typeof value === 'string' || typeof value === 'number';
}

function ctorFromJSON(json: unknown): ConstructorSpec {
  if (!isRecord(json)) throw new Error('Invalid constructor spec.');
  const tag = json.tag;
  if (!CONSTRUCTOR_TAGS.some((known) => known === tag))
    throw new Error(`Unknown constructor tag '${String(tag)}'.`);
  if (tag === 'dict') {
    const keys = json.keys;
    if (!Array.isArray(keys) || !keys.every((key): key is string => typeof key === 'string'))
      throw new Error("Constructor 'dict' requires string keys.");
    return { tag: 'dict', keys };
  }
  if (tag === 'labelled') {
    const { dim, coords } = json;
    if (typeof dim !== 'string' || !Array.isArray(coords) || !coords.every(isLabel))
      throw new Error("Constructor 'labelled' requires a dim and string or number coords.");
    return { tag: 'labelled', dim, coords };
  }
  return { tag: 'complex' };
}

function valueToJSON(value: VariableValue): ValueJSON {
  return typeof value === 'number'
    ? encodeNumber(value)
    : { complex: [encodeNumber(value.real), encodeNumber(value.imag)] };
}

function valueFromJSON(json: unknown): VariableValue {
  if (isRecord(json) && Array.isArray(json.complex)) {
    const [real, imag] = json.complex;
    return new Complex(decodeNumber(real, 'complex.real'), decodeNumber(imag, 'complex.imag'));
  }
  return decodeNumber(json, 'values');
}

/** Serialize a bundle (maps + slot names + optional values). */
export function exportMapBundle(bundle: MapBundle): MapBundleJSON {
  const maps: Record<string, MapJSON> = {};
  for (const [key, map] of Object.entries(bundle.maps)) maps[key] = mapToJSON(map);
  const json: MapBundleJSON = {
    formatVersion: MAP_BUNDLE_FORMAT_VERSION,
    names: [...bundle.names],
    maps,
  };
  if (bundle.values) json.values = bundle.values.map(valueToJSON);
  return json;
}

/**
 * Rebuild a bundle. Values are optional: a bundle without them is still a valid recipe that
 * {@link evaluateBundle} can evaluate once values are supplied.
 * @throws Error on malformed bundles, including slot references beyond the recorded names.
 */
export function importMapBundle(json: unknown): MapBundle {
  if (!isRecord(json)) throw new Error('Invalid JSON for map bundle.');
  if (json.formatVersion !== MAP_BUNDLE_FORMAT_VERSION)
    onceWarn(
      'map-bundle-format-version',
      `importMapBundle: unknown formatVersion ${String(json.formatVersion)}, attempting import.`
    );
  const { names: rawNames, maps: rawMaps, values: rawValues } = json;
  if (!Array.isArray(rawNames) || !rawNames.every((name): name is string => typeof name === 'string'))
    throw new Error('Map bundle names must be an array of strings.');
  if (!isRecord(rawMaps)) throw new Error('Map bundle maps must be an object.');
  const names = [...rawNames];
  const maps: MapRecord = {};
  for (const [key, rawMap] of Object.entries(rawMaps)) {
    const map = mapFromJSON(rawMap);
    if (maxSlotIndex(map) >= names.length)
      throw new Error(`Map '${key}' references a slot beyond the ${names.length} recorded name(s).`);
    maps[key] = map;
  }
  const bundle: MapBundle = { names, maps };
  if (rawValues !== undefined) {
    if (!Array.isArray(rawValues) || rawValues.length !== names.length)
      throw new Error('Map bundle values must align with its names.');
    bundle.values = rawValues.map(valueFromJSON);
  }
  return bundle;
}

/**
 * Evaluate one map of a bundle against `values` (or the values stored in the bundle).
 * @throws MissingParameterError when the map key is unknown, or when the map needs parameter
 *   values and none are available.
 */
export function evaluateBundle(
  bundle: MapBundle,
  key: string,
  values?: ReadonlyArray<unknown>
): unknown {
  if (!Object.prototype.hasOwnProperty.call(bundle.maps, key))
    throw new MissingParameterError(key, `Map bundle has no map named '${key}'.`);
  const map = bundle.maps[key];
  const resolved = values ?? bundle.values;
  if (resolved === undefined) {
    if (maxSlotIndex(map) >= 0)
      throw new MissingParameterError(
        key,
        `Map '${key}' needs parameter values (${bundle.names.join(', ')}) to be evaluated.`
      );
    return readMap(map, []);
  }
  return readMap(map, resolved);
}
