// Public entry point.
import Model from './model';
import ParameterRegistry from './mapping/registry';

export { Model, ParameterRegistry };
export { config } from './config';
export type { ParamMapConfig } from './config';
export * from './errors';

export { Complex, isComplex } from './structures/complex';
export { LabelledArray, makeLabelledArray } from './structures/labelled';
export type { Label } from './structures/labelled';

export { Prior, isVariable } from './variables/variable';
export type { PriorParameters, RandomSource, Variable, VariableValue } from './variables/variable';
export { BoundedGaussian, ComplexPrior, Gaussian, Uniform } from './variables/priors';
export type { ComplexPart } from './variables/priors';
export { priorFromJSON, priorToJSON } from './variables/priors.serialize';
export type { PriorJSON } from './variables/priors.serialize';
export { createRandomSource, generateGuess } from './variables/guess';

export * from './mapping/map.types';
export { MapBuilder, buildMap, childName } from './mapping/map.build';
export { readMap, readRecord } from './mapping/map.read';
export { maxSlotIndex, retargetMap, slotIndices } from './mapping/map.ties';
export {
  MAP_BUNDLE_FORMAT_VERSION,
  evaluateBundle,
  exportMapBundle,
  importMapBundle,
  mapFromJSON,
  mapToJSON,
} from './mapping/map.serialize';
export type { MapBundle, MapBundleJSON, MapJSON } from './mapping/map.serialize';

export * as methods from './methods/methods';

export * from './model/model.types';
export { LimitOverlaps } from './model/constraints';
export type { OverlapAware } from './model/constraints';
export { AlphaModel, ExactModel, PerfectLensModel } from './model/model.variants';
export type { AlphaModelOptions, PerfectLensModelOptions } from './model/model.variants';
export { MODEL_FORMAT_VERSION } from './model/model.export';
export type { ModelStateJSON } from './model/model.export';
export { importModel } from './model/model.import';
export type { ModelImportContext } from './model/model.import';
export { readSnapshot } from './model/model.ties';
export type { ModelSnapshot } from './model/model.ties';
export { onceWarn, resetWarnings } from './utils/deprecation';
