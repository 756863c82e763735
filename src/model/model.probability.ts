/**
 * Probability helpers for {@link Model}: log-prior, Gaussian log-likelihood and log-posterior.
 *
 * Domain failures never escape as exceptions here. A scatterer the collaborators reject
 * (`InvalidScattererError`), a violated constraint or a failed forward calculation is a
 * zero-probability point, i.e. `-Infinity`, which optimizers and samplers handle natively.
 */
import { InvalidScattererError } from '../errors';
import type Model from '../model';
import { Complex } from '../structures/complex';
import type { VariableValue } from '../variables/variable';
import type { DetectorLike, ParameterVector, ScattererLike } from './model.types';

function asVariableValue(value: unknown, name: string): VariableValue {
  if (typeof value === 'number' || value instanceof Complex) return value;
  throw new Error(`Value of parameter '${name}' must be a number or a complex number.`);
}

/** Noise as a per-point accessor, validated against the data length. */
function noiseAccessor(noise: unknown, length: number): (index: number) => number {
  if (typeof noise === 'number') return () => noise;
  if (Array.isArray(noise) && noise.every((entry): entry is number => typeof entry === 'number')) {
    if (noise.length !== length)
      throw new Error(`noiseSd has ${noise.length} value(s) but the data has ${length} point(s).`);
    return (index) => noise[index];
  }
  throw new Error('noiseSd must be a number or an array of numbers.');
}

export function lnpriorImpl(this: Model, values: ParameterVector): number {
  const vector = this.ensureParametersAreListlike(values);
  let scatterer: ScattererLike;
  try {
    scatterer = this.scattererFromParameters(vector);
  } catch (error) {
    if (error instanceof InvalidScattererError) return -Infinity;
    throw error;
  }
  for (const constraint of this.constraints) {
    if (!constraint.check(scatterer)) return -Infinity;
  }
  const names = this.parameterNames;
  return this.parameterList.reduce(
    (total, prior, index) => total + prior.lnprob(asVariableValue(vector[index], names[index])),
    0
  );
}

/**
 * `-N/2·log(2π) - N·mean(log σ) - ½·Σ((forward - data)/σ)²`
 */
export function lnlikeImpl(this: Model, values: ParameterVector, detector: DetectorLike): number {
  const vector = this.ensureParametersAreListlike(values);
  const data = detector.values;
  const count = data.length;
  const noiseAt = noiseAccessor(this.findNoise(vector, detector), count);
  const predicted = this.forward(vector, detector);
  if (predicted === null) return -Infinity;
  if (predicted.length !== count)
    throw new Error(`Forward model produced ${predicted.length} value(s) for ${count} data point(s).`);
  let logNoiseSum = 0;
  let squaredResiduals = 0;
  for (let i = 0; i < count; i++) {
    const sd = noiseAt(i);
    const residual = (predicted[i] - data[i]) / sd;
    logNoiseSum += Math.log(sd);
    squaredResiduals += residual * residual;
  }
  // N·mean(log σ) over the data points equals Σ log σ_i.
  return (-count / 2) * Math.log(2 * Math.PI) - logNoiseSum - 0.5 * squaredResiduals;
}

export function lnposteriorImpl(this: Model, values: ParameterVector, detector: DetectorLike): number {
  const prior = this.lnprior(values);
  // The prior forbids points (negative radius, overlaps) the forward model cannot even compute.
  if (prior === -Infinity) return prior;
  return prior + this.lnlike(values, detector);
}
