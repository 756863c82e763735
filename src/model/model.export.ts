/**
 * Model state export.
 *
 * The state keeps everything needed to rebuild an equivalent model given the same collaborators:
 * the serialized priors (one per slot, in slot order), their names and the map recipes. Scatterer
 * and forward calculation are collaborators and are supplied again on import (see
 * `model.import.ts`).
 *
 * Layout (formatVersion = 1):
 *  { formatVersion, kind, theory, parameters: PriorJSON[], parameterNames: string[],
 *    maps: { scatterer, optics, model?, theory? } }
 */
import type Model from '../model';
import { MapJSON, mapToJSON } from '../mapping/map.serialize';
import { PriorJSON, priorToJSON } from '../variables/priors.serialize';
import type { ModelKind } from './model.types';

export const MODEL_FORMAT_VERSION = 1;

export interface ModelStateJSON {
  formatVersion: number;
  kind: ModelKind;
  /** Theory selector, stored as given; it must be JSON-serializable to survive a round-trip. */
  theory: unknown;
  parameters: PriorJSON[];
  parameterNames: string[];
  maps: Record<string, MapJSON>;
}

export function toJSONImpl(this: Model): ModelStateJSON {
  const maps: Record<string, MapJSON> = {};
  for (const [key, map] of Object.entries(this.maps)) maps[key] = mapToJSON(map);
  return {
    formatVersion: MODEL_FORMAT_VERSION,
    kind: this.kind,
    theory: this.theory,
    parameters: this.parameterList.map(priorToJSON),
    parameterNames: this.parameterNames,
    maps,
  };
}
