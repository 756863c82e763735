/**
 * ParameterRegistry
 * =================
 * Tracks the distinct free Variables discovered while building maps, assigns each a stable slot
 * index (first-discovery order) and a unique human-readable name.
 *
 * Invariants
 * - `slots.length === names.length`.
 * - A Variable is matched by identity; registering the same object again returns its existing
 *   slot. Two distinct objects with equal parameters occupy two slots.
 * - Names are unique at all times. Collisions get a numeric suffix: `x`, `x_0`, `x_1`, ...
 *
 * Merging (tying) slots is the only operation that shrinks the registry; it returns the
 * renumbering every map owning slot references must be retargeted with.
 */
import { config } from '../config';
import { OutOfRangeError, TieError } from '../errors';
import type { Variable } from '../variables/variable';
import type { Renumbering } from './map.types';

export default class ParameterRegistry<V extends Variable = Variable> {
  /** Registered Variables in slot order. */
  private readonly _slots: V[] = [];
  /** Slot names, parallel to `_slots`. */
  private readonly _names: string[] = [];
  /** Identity lookup (object reference → slot). Rebuilt after merges. */
  private _identity = new Map<V, number>();

  /** Number of slots. */
  get size(): number {
    return this._slots.length;
  }

  /** Copy of the slot names in slot order. */
  get names(): string[] {
    return [...this._names];
  }

  /** Copy of the registered Variables in slot order. */
  get slots(): V[] {
    return [...this._slots];
  }

  /**
   * Variable occupying slot `index`.
   * @throws OutOfRangeError for indices outside the registry.
   */
  get(index: number): V {
    this.assertIndex(index);
    return this._slots[index];
  }

  /**
   * Name of slot `index`.
   * @throws OutOfRangeError for indices outside the registry.
   */
  nameOf(index: number): string {
    this.assertIndex(index);
    return this._names[index];
  }

  /** `[name, variable]` pairs in slot order. */
  entries(): [string, V][] {
    return this._slots.map((variable, index): [string, V] => [this._names[index], variable]);
  }

  /** Slot of a Variable, by identity. `undefined` when it was never registered. */
  indexOf(variable: V): number | undefined {
    return this._identity.get(variable);
  }

  /** Slot carrying `name`, or `undefined`. */
  indexOfName(name: string): number | undefined {
    const index = this._names.indexOf(name);
    return index < 0 ? undefined : index;
  }

  /**
   * Register a Variable and return its slot.
   *
   * Known Variables (identity match) keep their slot. When the recorded name carries a
   * disambiguation prefix (`prefix:shared`) and the shared part is no longer taken, the prefix is
   * dropped. New Variables are appended under their own name when they have one, otherwise under
   * `suggestedName`, made unique.
   */
  register(variable: V, suggestedName: string): number {
    const existing = this._identity.get(variable);
    if (existing !== undefined) {
      this.simplifySharedName(existing);
      return existing;
    }
    const index = this._slots.length;
    this._slots.push(variable);
    this._names.push(this.uniqueName(variable.name ?? suggestedName));
    this._identity.set(variable, index);
    return index;
  }

  /**
   * Tie several slots into one.
   *
   * Every index must exist and every Variable must equal the first once names are stripped;
   * nothing is mutated unless both checks pass. The lowest index survives (renamed to `newName`
   * when given), the others are removed.
   *
   * @returns Renumbering covering every index of the registry before the merge.
   * @throws OutOfRangeError for unknown indices.
   * @throws TieError for an empty index set or unequal Variables.
   */
  merge(indices: Iterable<number>, newName?: string): Renumbering {
    const sorted = [...new Set(indices)].sort((a, b) => a - b);
    if (sorted.length === 0) throw new TieError('At least one parameter is required for a tie.');
    sorted.forEach((index) => this.assertIndex(index));
    const survivor = sorted[0];
    const reference = this._slots[survivor].renamed(undefined);
    for (const index of sorted.slice(1)) {
      if (!this._slots[index].renamed(undefined).equals(reference)) {
        const pair = [this._names[index], this._names[survivor]];
        throw new TieError(`Cannot tie unequal parameters ${pair[0]} and ${pair[1]}.`, pair);
      }
    }

    const removed = new Set(sorted.slice(1));
    const renumbering: number[] = [];
    let shift = 0;
    for (let old = 0; old < this._slots.length; old++) {
      if (removed.has(old)) {
        renumbering.push(survivor);
        shift++;
      } else {
        renumbering.push(old - shift);
      }
    }
    for (const index of [...removed].sort((a, b) => b - a)) {
      this._slots.splice(index, 1);
      this._names.splice(index, 1);
    }
    this.rebuildIdentity();
    if (newName !== undefined && newName !== this._names[survivor])
      this._names[survivor] = this.uniqueName(newName, survivor);
    return renumbering;
  }

  /**
   * Rename one slot.
   * @throws OutOfRangeError for unknown indices.
   * @throws Error when another slot already carries `name`.
   */
  rename(index: number, name: string): void {
    this.assertIndex(index);
    const holder = this.indexOfName(name);
    if (holder !== undefined && holder !== index)
      throw new Error(`Parameter name '${name}' is already used by slot ${holder}.`);
    this._names[index] = name;
  }

  /**
   * Replace every slot name at once (model state import).
   * @throws Error when the count differs from the slot count or names repeat.
   */
  restoreNames(names: readonly string[]): void {
    if (names.length !== this._slots.length)
      throw new Error(`Expected ${this._slots.length} parameter name(s), received ${names.length}.`);
    if (new Set(names).size !== names.length) throw new Error('Parameter names must be unique.');
    names.forEach((name, index) => {
      this._names[index] = name;
    });
  }

  /**
   * Candidate made unique against the current names: `x` → `x_0` → `x_1` ...
   * `ignore` excludes one slot's own name from the collision check.
   */
  private uniqueName(candidate: string, ignore?: number): string {
    const taken = (name: string) =>
      this._names.some((existing, index) => index !== ignore && existing === name);
    let name = candidate;
    if (taken(name)) name += '_0';
    while (taken(name)) {
      const cut = name.lastIndexOf('_');
      const counter = Number(name.slice(cut + 1));
      name = `${name.slice(0, cut)}_${counter + 1}`;
    }
    return name;
  }

  private simplifySharedName(index: number): void {
    const name = this._names[index];
    const delimiter = config.prefixDelimiter;
    const at = name.indexOf(delimiter);
    if (!delimiter || at < 0) return;
    const shared = name.slice(at + delimiter.length);
    if (shared && !this._names.includes(shared)) this._names[index] = shared;
  }

  private rebuildIdentity(): void {
    this._identity = new Map(this._slots.map((variable, index): [V, number] => [variable, index]));
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this._slots.length)
      throw new OutOfRangeError(index, this._slots.length);
  }
}
