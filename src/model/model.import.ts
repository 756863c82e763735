/**
 * Rebuild a model from {@link ModelStateJSON}.
 *
 * The stored recipes are read against the decoded priors themselves, which restores the original
 * configuration with every prior in place. A prior shared by several positions (a tie) comes back
 * as one object, so re-registration reproduces the same slots. Collaborators that cannot be
 * serialized (the scatterer class, the forward calculation, constraints, the noise policy) come
 * from `context`.
 */
import type Model from '../model';
import { mapFromJSON } from '../mapping/map.serialize';
import { readMap, readRecord } from '../mapping/map.read';
import { maxSlotIndex } from '../mapping/map.ties';
import type { MapNode, MapRecord } from '../mapping/map.types';
import { onceWarn } from '../utils/deprecation';
import { isRecord } from '../utils/json';
import { priorFromJSON } from '../variables/priors.serialize';
import type { Prior } from '../variables/variable';
import { MODEL_FORMAT_VERSION } from './model.export';
import type { Constraint, ForwardFunction, ModelKind, ModelOptions, ScattererLike } from './model.types';
import { AlphaModel, ExactModel, PerfectLensModel } from './model.variants';

const MODEL_KINDS: readonly ModelKind[] = ['AlphaModel', 'ExactModel', 'PerfectLensModel'];

function isModelKind(value: unknown): value is ModelKind {
  return MODEL_KINDS.some((kind) => kind === value);
}

export interface ModelImportContext {
  /** Scatterer whose `fromParameters` rebuilds the stored configuration. */
  scatterer: ScattererLike;
  forward: ForwardFunction;
  constraints?: Constraint | readonly Constraint[];
  noisePolicy?: ModelOptions['noisePolicy'];
}

/**
 * @throws Error on malformed state (unknown kind, missing scatterer map, slots beyond the priors).
 */
export function importModel(json: unknown, context: ModelImportContext): Model {
  if (!isRecord(json)) throw new Error('Invalid JSON for model.');
  if (json.formatVersion !== MODEL_FORMAT_VERSION)
    onceWarn(
      'model-format-version',
      `importModel: unknown formatVersion ${String(json.formatVersion)}, attempting import.`
    );
  const { kind, parameters: rawParameters, parameterNames, maps: rawMaps } = json;
  if (!isModelKind(kind)) throw new Error(`Unknown model kind: ${String(kind)}`);
  if (!Array.isArray(rawParameters)) throw new Error('Model parameters must be an array.');
  if (!isRecord(rawMaps)) throw new Error('Model maps must be an object.');

  const priors: Prior[] = rawParameters.map(priorFromJSON);
  const maps: MapRecord = {};
  for (const [key, rawMap] of Object.entries(rawMaps)) {
    const map = mapFromJSON(rawMap);
    if (maxSlotIndex(map) >= priors.length)
      throw new Error(`Map '${key}' references a slot beyond the ${priors.length} stored parameter(s).`);
    maps[key] = map;
  }
  const section = (key: string): Record<string, unknown> => {
    const map: MapNode | undefined = maps[key];
    return map === undefined ? {} : readRecord(map, priors);
  };
  if (maps.scatterer === undefined) throw new Error("Model state has no 'scatterer' map.");
  const scattererParameters = readMap(maps.scatterer, priors);
  if (!isRecord(scattererParameters)) throw new Error("Model 'scatterer' map must describe a mapping.");

  const scatterer = context.scatterer.fromParameters(scattererParameters);
  const optics = section('optics');
  const options: ModelOptions = {
    mediumIndex: optics.mediumIndex,
    illumWavelen: optics.illumWavelen,
    illumPolarization: optics.illumPolarization,
    noiseSd: optics.noiseSd,
    theory: json.theory,
    constraints: context.constraints,
    noisePolicy: context.noisePolicy,
  };
  const model = createVariant(kind, scatterer, context.forward, options, section('model'), section('theory'));

  if (
    Array.isArray(parameterNames) &&
    parameterNames.every((name): name is string => typeof name === 'string') &&
    parameterNames.length === model.parameterNames.length
  ) {
    model.restoreParameterNames(parameterNames);
  } else {
    onceWarn('model-parameter-names', 'importModel: stored parameter names do not match, keeping generated names.');
  }
  return model;
}

function createVariant(
  kind: ModelKind,
  scatterer: ScattererLike,
  forward: ForwardFunction,
  options: ModelOptions,
  modelSection: Record<string, unknown>,
  theorySection: Record<string, unknown>
): Model {
  switch (kind) {
    case 'AlphaModel':
      return new AlphaModel(scatterer, forward, { ...options, alpha: modelSection.alpha });
    case 'ExactModel':
      return new ExactModel(scatterer, forward, options);
    case 'PerfectLensModel':
      return new PerfectLensModel(scatterer, forward, {
        ...options,
        alpha: modelSection.alpha,
        lensAngle: theorySection.lensAngle,
      });
  }
}
