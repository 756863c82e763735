/**
 * Map builder: turns a nested configuration into a {@link MapNode} recipe while registering every
 * free Variable it meets.
 *
 * Dispatch order (first match wins):
 *  1. arrays, typed arrays  → `sequence` (read back as plain arrays)
 *  2. labelled arrays       → `apply(labelled)`
 *  3. complex priors        → `apply(complex)` when a part is free, otherwise a `Complex` constant
 *  4. Variables             → `slot`
 *  5. plain-object mappings → `apply(dict)`, omitting absent (`undefined` / `null`) entries
 *  6. anything else         → `constant`
 *
 * Names of nested parameters are the path to them joined by `config.pathSeparator`
 * (`center.0`, `n.real`, `illumPolarization.x`). The input is never mutated.
 */
import { config } from '../config';
import { Complex } from '../structures/complex';
import { Label, LabelledArray } from '../structures/labelled';
import { isPlainObject } from '../utils/json';
import { ComplexPrior } from '../variables/priors';
import { isVariable, Prior } from '../variables/variable';
import {
  applyNode,
  constantNode,
  isOmitted,
  MapNode,
  sequenceNode,
  slotNode,
} from './map.types';
import ParameterRegistry from './registry';

/** Join a name prefix and a path segment; an empty prefix yields the bare segment. */
export function childName(prefix: string, segment: Label): string {
  return prefix === '' ? String(segment) : `${prefix}${config.pathSeparator}${segment}`;
}

/** Numeric array views (`Float64Array`, `Int32Array`, ...); `DataView` has no elements. */
function isTypedArray(value: unknown): value is ArrayLike<number | bigint> {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

export class MapBuilder {
  /** Registry receiving every Variable discovered while building. */
  readonly registry: ParameterRegistry<Prior>;

  constructor(registry: ParameterRegistry<Prior> = new ParameterRegistry<Prior>()) {
    this.registry = registry;
  }

  /** Build the recipe for `value`; `namePrefix` is the path of `value` itself. */
  build(value: unknown, namePrefix: string = ''): MapNode {
    if (Array.isArray(value))
      return sequenceNode(value.map((item, index) => this.build(item, childName(namePrefix, index))));
    if (isTypedArray(value))
      return sequenceNode(
        Array.from(value, (item, index) => this.build(item, childName(namePrefix, index)))
      );
    if (value instanceof LabelledArray) return this.buildLabelled(value, namePrefix);
    if (value instanceof ComplexPrior) return this.buildComplex(value, namePrefix);
    if (isVariable(value)) return slotNode(this.registry.register(value, namePrefix));
    // Class instances (Complex, collaborator objects) stay opaque constants.
    if (isPlainObject(value)) return this.buildDict(value, namePrefix);
    return constantNode(value);
  }

  private buildLabelled(array: LabelledArray, namePrefix: string): MapNode {
    // One-dimensional arrays contribute their leaves; deeper ones their sub-array slices. Both are
    // the entries along the leading axis.
    const args = array.values.map((entry, position) =>
      this.build(entry, childName(namePrefix, array.coords[position]))
    );
    return applyNode({ tag: 'labelled', dim: array.dim, coords: [...array.coords] }, args);
  }

  private buildComplex(prior: ComplexPrior, namePrefix: string): MapNode {
    const { real, imag } = prior;
    if (typeof real === 'number' && typeof imag === 'number')
      return constantNode(new Complex(real, imag));
    return applyNode({ tag: 'complex' }, [
      this.build(real, childName(namePrefix, 'real')),
      this.build(imag, childName(namePrefix, 'imag')),
    ]);
  }

  private buildDict(mapping: Record<string, unknown>, namePrefix: string): MapNode {
    const keys: string[] = [];
    const args: MapNode[] = [];
    for (const key of Object.keys(mapping)) {
      const node = this.build(mapping[key], childName(namePrefix, key));
      if (isOmitted(node)) continue;
      keys.push(key);
      args.push(node);
    }
    return applyNode({ tag: 'dict', keys }, args);
  }
}

/** One-shot helper: build `value` into `registry`. */
export function buildMap(
  value: unknown,
  registry: ParameterRegistry<Prior>,
  namePrefix: string = ''
): MapNode {
  return new MapBuilder(registry).build(value, namePrefix);
}
