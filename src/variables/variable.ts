import { Complex } from '../structures/complex';

/**
 * Variable contract
 * =================
 * A free quantity of a statistical model. The mapping engine only relies on identity (object
 * reference), `name` and `guess`; `lnprob` is consumed by the model layer when computing priors,
 * `renamed` / `equals` when validating ties.
 *
 * Identity matters: two Variables built with identical parameters are still two parameters unless
 * the same object is reused. Reuse is how a configuration declares a tie up front.
 */

/** Concrete value a Variable can take. */
export type VariableValue = number | Complex;

export interface Variable {
  /** Stable human-readable name, preferred over the path-derived one when registering. */
  readonly name: string | undefined;
  /** Initial value used to seed optimizers and samplers. */
  readonly guess: VariableValue;
  /** Log probability density of `value` (`-Infinity` outside the support). */
  lnprob(value: VariableValue): number;
  /** Copy with another name (`undefined` strips it); the original is untouched. */
  renamed(name: string | undefined): Variable;
  /** Value equality, name included. */
  equals(other: Variable): boolean;
}

/** Random number source returning floats in [0, 1). */
export type RandomSource = () => number;

/** Parameter record describing a prior without its name (used for equality & serialization). */
export interface PriorParameters {
  [key: string]: number | string | PriorParameters | undefined;
}

/**
 * Base class of every concrete prior. Subclasses describe their parameters once through
 * {@link Prior.parameters}; equality and naming are derived from that description.
 */
export abstract class Prior implements Variable {
  /** Discriminant used by the JSON codec. */
  abstract readonly kind: string;
  readonly name: string | undefined;

  protected constructor(name?: string) {
    this.name = name;
  }

  abstract get guess(): VariableValue;
  abstract lnprob(value: VariableValue): number;
  /** Draw one value from the distribution. */
  abstract sample(rng: RandomSource): VariableValue;
  /** Name-free parameter description. */
  abstract parameters(): PriorParameters;
  abstract renamed(name: string | undefined): Prior;

  equals(other: Variable): boolean {
    return (
      other instanceof Prior &&
      other.kind === this.kind &&
      other.name === this.name &&
      sameParameters(this.parameters(), other.parameters())
    );
  }
}

function sameParameters(a: PriorParameters, b: PriorParameters): boolean {
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const key of keys) {
    const left = a[key];
    const right = b[key];
    if (typeof left === 'object' && typeof right === 'object') {
      if (!sameParameters(left, right)) return false;
    } else if (!Object.is(left, right)) {
      return false;
    }
  }
  return true;
}

/** True for free parameters (any {@link Prior}). */
export function isVariable(value: unknown): value is Prior {
  return value instanceof Prior;
}
