/**
 * Concrete model variants.
 *
 * - {@link AlphaModel}: scattered field scaled by `alpha` (a number or a prior, default 1).
 * - {@link ExactModel}: no extra parameters; the forward calculation sees the scatterer and optics.
 * - {@link PerfectLensModel}: `alpha` plus the objective's acceptance angle `lensAngle`.
 *
 * Each variant delegates the physics to a {@link ForwardFunction} supplied at construction.
 */
import { InvalidScattererError } from '../errors';
import Model from '../model';
import type {
  DetectorLike,
  ForwardFunction,
  ForwardRequest,
  ModelKind,
  ModelOptions,
  ParameterVector,
  ScattererLike,
} from './model.types';

export interface AlphaModelOptions extends ModelOptions {
  alpha?: unknown;
}

export interface PerfectLensModelOptions extends AlphaModelOptions {
  lensAngle?: unknown;
}

/** Run the forward calculation; a scatterer the calculation rejects predicts nothing. */
function runForward(
  model: Model,
  calculate: ForwardFunction,
  vector: ReadonlyArray<unknown>,
  detector: DetectorLike,
  extra: Pick<ForwardRequest, 'scaling' | 'theoryOptions'>
): ArrayLike<number> | null {
  try {
    return calculate({
      detector,
      scatterer: model.scattererFromParameters(vector),
      theory: model.theory,
      optics: model.findOptics(vector, detector),
      ...extra,
    });
  } catch (error) {
    if (error instanceof InvalidScattererError) return null;
    throw error;
  }
}

function readAlpha(model: Model, vector: ReadonlyArray<unknown>): number {
  const alpha = model.readMapRecord('model', vector).alpha;
  if (typeof alpha !== 'number') throw new Error(`alpha must be a number, got ${typeof alpha}.`);
  return alpha;
}

export class AlphaModel extends Model {
  readonly kind: ModelKind = 'AlphaModel';
  private readonly calculate: ForwardFunction;

  constructor(scatterer: ScattererLike, calculate: ForwardFunction, options: AlphaModelOptions = {}) {
    super(scatterer, options);
    this.calculate = calculate;
    this.addMap('model', { alpha: options.alpha ?? 1 });
  }

  /** Field scaling with Variables in place. */
  get alpha(): unknown {
    return this.readMapRecord('model', this.parameterList).alpha;
  }

  forward(values: ParameterVector, detector: DetectorLike): ArrayLike<number> | null {
    const vector = this.ensureParametersAreListlike(values);
    return runForward(this, this.calculate, vector, detector, { scaling: readAlpha(this, vector) });
  }
}

export class ExactModel extends Model {
  readonly kind: ModelKind = 'ExactModel';
  private readonly calculate: ForwardFunction;

  constructor(scatterer: ScattererLike, calculate: ForwardFunction, options: ModelOptions = {}) {
    super(scatterer, options);
    this.calculate = calculate;
  }

  forward(values: ParameterVector, detector: DetectorLike): ArrayLike<number> | null {
    const vector = this.ensureParametersAreListlike(values);
    return runForward(this, this.calculate, vector, detector, {});
  }
}

export class PerfectLensModel extends Model {
  readonly kind: ModelKind = 'PerfectLensModel';
  private readonly calculate: ForwardFunction;

  constructor(scatterer: ScattererLike, calculate: ForwardFunction, options: PerfectLensModelOptions = {}) {
    super(scatterer, options);
    this.calculate = calculate;
    this.addMap('model', { alpha: options.alpha ?? 1.0 });
    this.addMap('theory', { lensAngle: options.lensAngle ?? 1.0 });
  }

  get alpha(): unknown {
    return this.readMapRecord('model', this.parameterList).alpha;
  }

  /** Acceptance angle of the objective with Variables in place. */
  get lensAngle(): unknown {
    return this.readMapRecord('theory', this.parameterList).lensAngle;
  }

  forward(values: ParameterVector, detector: DetectorLike): ArrayLike<number> | null {
    const vector = this.ensureParametersAreListlike(values);
    return runForward(this, this.calculate, vector, detector, {
      scaling: readAlpha(this, vector),
      theoryOptions: this.readMapRecord('theory', vector),
    });
  }
}
