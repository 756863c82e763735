/**
 * Map recipe types.
 *
 * A Map is a small acyclic tree describing how to rebuild a nested configuration from a flat
 * vector of parameter values. It is plain data: no functions, no class instances besides opaque
 * constant payloads, so it can be cloned, frozen, posted to a worker or written to JSON.
 *
 *  - `constant`  fixed leaf, returned verbatim
 *  - `slot`      reference to registry slot `index`; the same index may appear many times (ties)
 *  - `sequence`  ordered collection of child maps
 *  - `apply`     deferred call of a constructor from the closed set in `methods/constructors`
 */
import type { Label } from '../structures/labelled';

/** Rebuild a string-keyed record; `keys` align with the `apply` arguments. */
export interface DictConstructorSpec {
  readonly tag: 'dict';
  readonly keys: readonly string[];
}

/** Rebuild a {@link LabelledArray} along axis `dim` with the given coordinate labels. */
export interface LabelledConstructorSpec {
  readonly tag: 'labelled';
  readonly dim: string;
  readonly coords: readonly Label[];
}

/** Rebuild a complex value from `[real, imag]` arguments. */
export interface ComplexConstructorSpec {
  readonly tag: 'complex';
}

export type ConstructorSpec =
  | DictConstructorSpec
  | LabelledConstructorSpec
  | ComplexConstructorSpec;

/** Discriminant of the closed constructor set. */
export type ConstructorTag = ConstructorSpec['tag'];

export interface ConstantNode {
  readonly kind: 'constant';
  readonly value: unknown;
}

export interface SlotNode {
  readonly kind: 'slot';
  readonly index: number;
}

export interface SequenceNode {
  readonly kind: 'sequence';
  readonly items: readonly MapNode[];
}

export interface ApplyNode {
  readonly kind: 'apply';
  readonly ctor: ConstructorSpec;
  readonly args: readonly MapNode[];
}

export type MapNode = ConstantNode | SlotNode | SequenceNode | ApplyNode;

/** Named maps owned by one model (`scatterer`, `optics`, ...). */
export type MapRecord = Record<string, MapNode>;

/**
 * Old slot index → new slot index, covering every index of the registry before a merge
 * (`renumbering[old]`).
 */
export type Renumbering = readonly number[];

export function constantNode(value: unknown): ConstantNode {
  return { kind: 'constant', value };
}

export function slotNode(index: number): SlotNode {
  return { kind: 'slot', index };
}

export function sequenceNode(items: readonly MapNode[]): SequenceNode {
  return { kind: 'sequence', items };
}

export function applyNode(ctor: ConstructorSpec, args: readonly MapNode[]): ApplyNode {
  return { kind: 'apply', ctor, args };
}

/**
 * True when the node is the omitted marker of an absent optional value (a constant `undefined` or
 * `null`). Mapping entries built to this marker are dropped.
 */
export function isOmitted(node: MapNode): boolean {
  return node.kind === 'constant' && (node.value === undefined || node.value === null);
}
