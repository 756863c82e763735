/**
 * Built-in noise fallback policies.
 *
 * A likelihood needs a noise level. When neither the model maps one nor the detector carries
 * one, the model asks its policy. The choice of default is domain policy, so it is injectable
 * rather than hard-wired into the model.
 */
import { config } from '../config';
import { MissingParameterError } from '../errors';
import type { NoiseContext, NoisePolicy, NoiseValue } from '../model/model.types';
import { Uniform } from '../variables/priors';

export const NoisePolicies = {
  /**
   * `config.uniformNoiseFallback` (default 1) when every free parameter has a uniform prior.
   * With uniform priors the noise level only rescales the likelihood, so best-fit results do not
   * depend on it. Any other prior makes the noise level matter and the policy refuses.
   */
  uniformFallback(context: NoiseContext): NoiseValue {
    if (context.parameters.every((parameter) => parameter instanceof Uniform))
      return config.uniformNoiseFallback;
    throw new MissingParameterError('noiseSd', 'noiseSd is required for non-uniform priors.');
  },

  /** Always refuse: the noise level must be mapped or supplied by the detector. */
  strict(): NoiseValue {
    throw new MissingParameterError('noiseSd');
  },
};

/** Resolve a policy option (name or function) to a function. */
export function resolveNoisePolicy(policy: NoisePolicy | keyof typeof NoisePolicies | undefined): NoisePolicy {
  if (typeof policy === 'function') return policy;
  return NoisePolicies[policy ?? 'uniformFallback'];
}
