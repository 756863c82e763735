/**
 * Collaborator contracts of the model layer.
 *
 * The model never computes physics itself: scatterers, detectors and forward calculations are
 * supplied by the caller through these small structural interfaces, so any implementation
 * (analytic, tabulated, a test double) plugs in.
 */
import type { Variable } from '../variables/variable';

/**
 * Scatterer description. `parameters` is the nested configuration the model maps (it may contain
 * Variables); `fromParameters` rebuilds a scatterer from a reconstructed configuration.
 * Implementations signal physically impossible configurations with `InvalidScattererError`.
 */
export interface ScattererLike {
  readonly parameters: Record<string, unknown>;
  fromParameters(parameters: Record<string, unknown>): ScattererLike;
}

/** Optics quantities resolved for every forward calculation. */
export const OPTICS_KEYS = ['mediumIndex', 'illumWavelen', 'illumPolarization', 'noiseSd'] as const;

export type OpticsKey = (typeof OPTICS_KEYS)[number];

/** Optics handed to the forward calculation (noise is resolved separately). */
export type Optics = Record<Exclude<OpticsKey, 'noiseSd'>, unknown>;

/**
 * Observed data plus optional metadata. Metadata fields serve as fallbacks for optics quantities
 * the model does not map itself.
 */
export interface DetectorLike {
  /** Observed values, one per data point. */
  readonly values: ArrayLike<number>;
  readonly mediumIndex?: unknown;
  readonly illumWavelen?: unknown;
  readonly illumPolarization?: unknown;
  readonly noiseSd?: unknown;
}

/** Everything a forward calculation receives. */
export interface ForwardRequest {
  detector: DetectorLike;
  scatterer: ScattererLike;
  theory: unknown;
  optics: Optics;
  /** Overall scaling of the scattered field (`alpha`), when the model maps one. */
  scaling?: number;
  /** Theory-specific reconstructed options (e.g. `{ lensAngle }`). */
  theoryOptions?: Record<string, unknown>;
}

/**
 * Forward calculation: predicted values aligned with `detector.values`. Throw
 * `InvalidScattererError` for configurations the calculation cannot handle.
 */
export type ForwardFunction = (request: ForwardRequest) => ArrayLike<number>;

/** Predicate over reconstructed scatterers; a failed check makes the prior probability zero. */
export interface Constraint {
  check(scatterer: ScattererLike): boolean;
}

/** Noise standard deviation: one value for all points or one per data point. */
export type NoiseValue = number | readonly number[];

/** Information available to a noise policy. */
export interface NoiseContext {
  /** Free parameters of the model, in slot order. */
  parameters: readonly Variable[];
}

/**
 * Decides the noise level when neither the model nor the detector provides one. Throw
 * `MissingParameterError` to refuse.
 */
export type NoisePolicy = (context: NoiseContext) => NoiseValue;

/** Parameter values: a vector in slot order, or (deprecated) a record keyed by parameter name. */
export type ParameterVector = ReadonlyArray<unknown> | Readonly<Record<string, unknown>>;

/** Model-level options shared by every variant. */
export interface ModelOptions {
  noiseSd?: unknown;
  mediumIndex?: unknown;
  illumWavelen?: unknown;
  illumPolarization?: unknown;
  /** Scattering theory selector passed through to the forward calculation. Default: 'auto'. */
  theory?: unknown;
  constraints?: Constraint | readonly Constraint[];
  /** Noise fallback policy, by name or as a function. Default: 'uniformFallback'. */
  noisePolicy?: NoisePolicy | 'uniformFallback' | 'strict';
}

/** Concrete model variants (serialization discriminant). */
export type ModelKind = 'AlphaModel' | 'ExactModel' | 'PerfectLensModel';
