/**
 * Closed set of constructors an `apply` map node can reference.
 *
 * A recipe names its constructor by tag instead of embedding a function, so it stays serializable
 * and cannot smuggle executable code through a saved file. New composite shapes extend this
 * enumeration (and {@link ConstructorSpec}); the dispatch mechanism itself never changes.
 *
 * Constructors are total over well-formed arguments and never touch registry state.
 */
import type {
  ConstructorSpec,
  DictConstructorSpec,
  LabelledConstructorSpec,
} from '../mapping/map.types';
import { Complex } from '../structures/complex';
import { LabelledArray, makeLabelledArray } from '../structures/labelled';
import { ComplexPart, ComplexPrior } from '../variables/priors';
import { isVariable } from '../variables/variable';

function checkArity(tag: string, expected: number, received: number): void {
  if (expected !== received)
    throw new Error(`Constructor '${tag}' expects ${expected} argument(s), received ${received}.`);
}

function complexPart(value: unknown, part: 'real' | 'imag'): ComplexPart {
  if (typeof value === 'number' || isVariable(value)) return value;
  throw new Error(`Complex ${part} part must be a number or a prior.`);
}

export const Constructors = {
  /** Zip recorded keys with the evaluated arguments into a plain record. */
  dict(spec: DictConstructorSpec, args: readonly unknown[]): Record<string, unknown> {
    checkArity('dict', spec.keys.length, args.length);
    // Own properties, so a `__proto__` key stays an entry.
    return Object.fromEntries(
      spec.keys.map((key, position): [string, unknown] => [key, args[position]])
    );
  },

  /** Pack evaluated entries (or slices) into a labelled array. */
  labelled(spec: LabelledConstructorSpec, args: readonly unknown[]): LabelledArray {
    checkArity('labelled', spec.coords.length, args.length);
    return makeLabelledArray(spec.dim, spec.coords, args);
  },

  /**
   * Complex number from `[real, imag]`. Reading a map against the model's own Variables (instead
   * of numbers) yields a {@link ComplexPrior}, so the symbolic configuration keeps its shape.
   */
  complex(args: readonly unknown[]): Complex | ComplexPrior {
    checkArity('complex', 2, args.length);
    const real = complexPart(args[0], 'real');
    const imag = complexPart(args[1], 'imag');
    if (typeof real === 'number' && typeof imag === 'number') return new Complex(real, imag);
    return new ComplexPrior(real, imag);
  },
};

/** Dispatch a constructor spec on its tag. */
export function construct(spec: ConstructorSpec, args: readonly unknown[]): unknown {
  switch (spec.tag) {
    case 'dict':
      return Constructors.dict(spec, args);
    case 'labelled':
      return Constructors.labelled(spec, args);
    case 'complex':
      return Constructors.complex(args);
    default: {
      const unknownSpec: never = spec;
      throw new Error(`Unknown constructor spec ${JSON.stringify(unknownSpec)}.`);
    }
  }
}

/** Tags of the closed constructor set, for validation of imported recipes. */
export const CONSTRUCTOR_TAGS: readonly ConstructorSpec['tag'][] = ['dict', 'labelled', 'complex'];
