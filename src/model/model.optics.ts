import { MissingParameterError } from '../errors';
import type Model from '../model';
import type { DetectorLike, Optics, OpticsKey, ParameterVector } from './model.types';

function present(value: unknown): boolean {
  return value !== undefined && value !== null;
}

/**
 * Resolve the optics for a forward calculation.
 *
 * Each quantity comes from the model's optics map when it is mapped there, otherwise from the
 * detector metadata.
 *
 * @throws MissingParameterError when a quantity is available from neither source.
 */
export function findOptics(this: Model, values: ParameterVector, detector?: DetectorLike): Optics {
  const mapped = this.readMapRecord('optics', values);
  const find = (key: Exclude<OpticsKey, 'noiseSd'>): unknown => {
    if (present(mapped[key])) return mapped[key];
    if (detector && present(detector[key])) return detector[key];
    throw new MissingParameterError(key);
  };
  return {
    mediumIndex: find('mediumIndex'),
    illumWavelen: find('illumWavelen'),
    illumPolarization: find('illumPolarization'),
  };
}

/**
 * Resolve the noise standard deviation used by the likelihood: the mapped value, else the
 * detector's, else whatever the model's noise policy decides.
 *
 * @throws MissingParameterError when the policy refuses.
 */
export function findNoise(this: Model, values: ParameterVector, detector?: DetectorLike): unknown {
  const mapped = this.readMapRecord('optics', values);
  if (present(mapped.noiseSd)) return mapped.noiseSd;
  if (detector && present(detector.noiseSd)) return detector.noiseSd;
  return this.noisePolicy({ parameters: this.parameterList });
}
