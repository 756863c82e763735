/**
 * LabelledArray
 * =============
 * A minimal labelled N-dimensional array: one named leading axis (`dim`), one coordinate label per
 * entry along that axis (`coords`) and the entries themselves (`values`). Entries of a
 * multi-dimensional array are themselves `LabelledArray` slices sharing the same inner axes, so a
 * 3 x 2 polarization table is a `LabelledArray` over `vector` whose three values are `LabelledArray`s
 * over `channel`.
 *
 * Only the structure the mapping engine needs is modelled: construction, label lookup and shape
 * inspection. Arithmetic belongs to the collaborators that consume reconstructed configurations.
 */

/** Coordinate label along an axis. */
export type Label = string | number;

export class LabelledArray<T = unknown> {
  /** Name of the leading axis. */
  readonly dim: string;
  /** Coordinate labels along the leading axis (one per value). */
  readonly coords: readonly Label[];
  /** Entries along the leading axis; slices for multi-dimensional arrays. */
  readonly values: readonly T[];

  constructor(dim: string, coords: readonly Label[], values: readonly T[]) {
    if (coords.length !== values.length)
      throw new Error(
        `LabelledArray '${dim}' has ${coords.length} coordinate(s) but ${values.length} value(s).`
      );
    if (new Set(coords).size !== coords.length)
      throw new Error(`LabelledArray '${dim}' has duplicate coordinate labels.`);
    this.dim = dim;
    this.coords = [...coords];
    this.values = [...values];
  }

  /** Axis names, outermost first. */
  get dims(): string[] {
    const first = this.values[0];
    return first instanceof LabelledArray ? [this.dim, ...first.dims] : [this.dim];
  }

  /** Number of axes. */
  get ndim(): number {
    return this.dims.length;
  }

  /** Number of entries along the leading axis. */
  get length(): number {
    return this.values.length;
  }

  /**
   * Entry (or slice) for a coordinate label.
   * @throws Error when the label is not a coordinate of the leading axis.
   */
  sel(label: Label): T {
    const position = this.coords.indexOf(label);
    if (position < 0)
      throw new Error(`Label '${label}' not found on axis '${this.dim}'.`);
    return this.values[position];
  }
}

/**
 * Pack values into a labelled array along a new leading axis.
 *
 * When the values are themselves labelled arrays the result is one dimension deeper (a
 * concatenation along the new axis); otherwise the result is one-dimensional.
 */
export function makeLabelledArray<T>(
  dim: string,
  coords: readonly Label[],
  values: readonly T[]
): LabelledArray<T> {
  return new LabelledArray(dim, coords, values);
}
