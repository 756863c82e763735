/**
 * Model
 * =====
 * Base class of statistical models over nested scattering configurations.
 *
 * A model owns one {@link ParameterRegistry} and one map recipe per sub-configuration:
 *  - `scatterer` built from `scatterer.parameters`
 *  - `optics`    built from `{ mediumIndex, illumWavelen, illumPolarization, noiseSd }`
 *  - `model` / `theory` added by variants (`{ alpha }`, `{ lensAngle }`)
 *
 * The free parameters found while building form the flat vector optimizers and samplers work
 * on (`parameterNames`, `initialGuess`). Every evaluation reads the recipes back against a
 * candidate vector. Ties shrink the vector and retarget every recipe in one step.
 *
 * @example
 * ```ts
 * const r = new Uniform(0.4, 0.6, undefined, 'r');
 * const model = new AlphaModel(scatterer, calculate, { alpha: new Uniform(0.1, 1), noiseSd: 0.05 });
 * model.parameterNames;                 // ['center.0', 'center.1', 'center.2', 'r', 'alpha']
 * model.lnposterior(model.initialGuess, detector);
 * ```
 */
import { MissingParameterError, UnknownParameterError } from './errors';
import { MapBuilder } from './mapping/map.build';
import { readMap as readMapNode, readRecord } from './mapping/map.read';
import type { MapBundle } from './mapping/map.serialize';
import type { MapRecord } from './mapping/map.types';
import ParameterRegistry from './mapping/registry';
import { resolveNoisePolicy } from './methods/noise';
import { findNoise as _findNoise, findOptics as _findOptics } from './model/model.optics';
import {
  lnlikeImpl as _lnlike,
  lnposteriorImpl as _lnposterior,
  lnpriorImpl as _lnprior,
} from './model/model.probability';
import { toJSONImpl as _toJSON, type ModelStateJSON } from './model/model.export';
import {
  createSnapshot,
  type ModelSnapshot,
  resolveTieIndices,
  retargetMaps,
} from './model/model.ties';
import type {
  Constraint,
  DetectorLike,
  ModelKind,
  ModelOptions,
  NoisePolicy,
  Optics,
  ParameterVector,
  ScattererLike,
} from './model/model.types';
import { onceWarn } from './utils/deprecation';
import { generateGuess } from './variables/guess';
import type { Prior, VariableValue } from './variables/variable';

function isVector(values: ParameterVector): values is ReadonlyArray<unknown> {
  return Array.isArray(values);
}

function toConstraintList(constraints: Constraint | readonly Constraint[]): Constraint[] {
  return 'check' in constraints ? [constraints] : [...constraints];
}

export default abstract class Model {
  /** Variant discriminant used by serialization. */
  abstract readonly kind: ModelKind;
  /** Scattering theory selector handed to the forward calculation. */
  readonly theory: unknown;
  /** Constraints checked against every reconstructed scatterer. */
  readonly constraints: readonly Constraint[];
  /** Fallback deciding the noise level when none is mapped or supplied. */
  readonly noisePolicy: NoisePolicy;
  /** Scatterer the configuration came from; rebuilds scatterers from reconstructed parameters. */
  protected readonly template: ScattererLike;
  private readonly _registry = new ParameterRegistry<Prior>();
  private readonly _builder = new MapBuilder(this._registry);
  private _maps: MapRecord;
  private _version = 0;

  constructor(scatterer: ScattererLike, options: ModelOptions = {}) {
    this.template = scatterer;
    this.theory = options.theory ?? 'auto';
    this.constraints = toConstraintList(options.constraints ?? []);
    this.noisePolicy = resolveNoisePolicy(options.noisePolicy);
    this._maps = {
      scatterer: this._builder.build(scatterer.parameters),
      optics: this._builder.build({
        mediumIndex: options.mediumIndex,
        illumWavelen: options.illumWavelen,
        illumPolarization: options.illumPolarization,
        noiseSd: options.noiseSd,
      }),
    };
  }

  /**
   * Build an additional recipe from `value` into the shared registry (variants use this for their
   * own sub-configurations).
   */
  protected addMap(key: string, value: unknown): void {
    this._maps = { ...this._maps, [key]: this._builder.build(value) };
  }

  /** Recipes keyed by sub-configuration. Replaced wholesale on every tie. */
  get maps(): Readonly<MapRecord> {
    return this._maps;
  }

  /** Parameter names in slot order. Re-query after a tie. */
  get parameterNames(): string[] {
    return this._registry.names;
  }

  /** Free parameters (priors) in slot order. */
  get parameterList(): Prior[] {
    return this._registry.slots;
  }

  /** Free parameters keyed by name. */
  get parameters(): Record<string, Prior> {
    return Object.fromEntries(this._registry.entries());
  }

  /** Initial guess of every parameter, in slot order. */
  get initialGuess(): VariableValue[] {
    return this.parameterList.map((prior) => prior.guess);
  }

  /** Number of ties applied so far. */
  get version(): number {
    return this._version;
  }

  /**
   * Normalize a parameter vector. Name-keyed records are still accepted (with a one-time warning)
   * and reordered into slot order.
   * @throws MissingParameterError when a record lacks a parameter.
   */
  ensureParametersAreListlike(values: ParameterVector): ReadonlyArray<unknown> {
    if (isVector(values)) return values;
    onceWarn(
      'parameters-as-record',
      'Passing parameters as a record is deprecated; pass a list ordered like model.parameterNames.'
    );
    return this.parameterNames.map((name) => {
      if (!Object.prototype.hasOwnProperty.call(values, name)) throw new MissingParameterError(name);
      return values[name];
    });
  }

  /**
   * Evaluate the recipe stored under `key`.
   * @throws MissingParameterError when the model has no such recipe.
   */
  readMap(key: string, values: ParameterVector): unknown {
    if (!Object.prototype.hasOwnProperty.call(this._maps, key))
      throw new MissingParameterError(key, `Model has no '${key}' map.`);
    return readMapNode(this._maps[key], this.ensureParametersAreListlike(values));
  }

  /** {@link readMap} for recipes built from mappings. */
  readMapRecord(key: string, values: ParameterVector): Record<string, unknown> {
    if (!Object.prototype.hasOwnProperty.call(this._maps, key))
      throw new MissingParameterError(key, `Model has no '${key}' map.`);
    return readRecord(this._maps[key], this.ensureParametersAreListlike(values));
  }

  /** Scatterer with Variables in place (reconstructed against the parameters themselves). */
  get scatterer(): ScattererLike {
    return this.scattererFromParameters(this.parameterList);
  }

  /** Scatterer for one concrete parameter vector. */
  scattererFromParameters(values: ParameterVector): ScattererLike {
    return this.template.fromParameters(this.readMapRecord('scatterer', values));
  }

  /** Optics with Variables in place. @throws MissingParameterError */
  get mediumIndex(): unknown {
    return this.findOptics(this.parameterList).mediumIndex;
  }

  /** @throws MissingParameterError */
  get illumWavelen(): unknown {
    return this.findOptics(this.parameterList).illumWavelen;
  }

  /** @throws MissingParameterError */
  get illumPolarization(): unknown {
    return this.findOptics(this.parameterList).illumPolarization;
  }

  /** Noise level with Variables in place. @throws MissingParameterError */
  get noiseSd(): unknown {
    return this.findNoise(this.parameterList);
  }

  findOptics(values: ParameterVector, detector?: DetectorLike): Optics {
    return _findOptics.call(this, values, detector);
  }

  findNoise(values: ParameterVector, detector?: DetectorLike): unknown {
    return _findNoise.call(this, values, detector);
  }

  /** Starting points scattered around the guesses (see `generateGuess`). */
  generateGuess(n: number = 1, scaling: number = 1, seed?: number | string): VariableValue[][] {
    return generateGuess(this.parameterList, n, scaling, seed);
  }

  /** Log prior probability of a parameter vector (`-Infinity` for forbidden points). */
  lnprior(values: ParameterVector): number {
    return _lnprior.call(this, values);
  }

  /** Gaussian log-likelihood of `detector.values` given a parameter vector. */
  lnlike(values: ParameterVector, detector: DetectorLike): number {
    return _lnlike.call(this, values, detector);
  }

  /** Log posterior probability (unnormalized). */
  lnposterior(values: ParameterVector, detector: DetectorLike): number {
    return _lnposterior.call(this, values, detector);
  }

  /**
   * Predicted data for a parameter vector; `null` when the configuration cannot be computed.
   */
  abstract forward(values: ParameterVector, detector: DetectorLike): ArrayLike<number> | null;

  /**
   * Declare parameters equal: they collapse into one slot (the lowest), optionally renamed.
   *
   * @throws UnknownParameterError for an empty list or unknown names (nothing changes).
   * @throws TieError when the priors differ (nothing changes).
   */
  addTie(names: readonly string[], newName?: string): void {
    const indices = resolveTieIndices(names, this._registry.names);
    const renumbering = this._registry.merge(indices, newName);
    this._maps = retargetMaps(this._maps, renumbering);
    this._version++;
  }

  /** Rename one parameter. @throws UnknownParameterError for unknown names. */
  renameParameter(name: string, newName: string): void {
    const index = this._registry.indexOfName(name);
    if (index === undefined) throw new UnknownParameterError(`Unknown parameter ${name}.`, name);
    this._registry.rename(index, newName);
  }

  /** Replace every parameter name at once (state import). */
  restoreParameterNames(names: readonly string[]): void {
    this._registry.restoreNames(names);
  }

  /** Frozen names + recipes at the current tie version, for concurrent readers. */
  snapshot(): ModelSnapshot {
    return createSnapshot(this._version, this._registry.names, this._maps);
  }

  /** Recipes and names (plus optional values) as a standalone bundle. */
  toBundle(values?: readonly VariableValue[]): MapBundle {
    const bundle: MapBundle = { names: this.parameterNames, maps: { ...this._maps } };
    if (values) bundle.values = [...values];
    return bundle;
  }

  /** Serializable state; see `importModel` for the inverse. */
  toJSON(): ModelStateJSON {
    return _toJSON.call(this);
  }
}
