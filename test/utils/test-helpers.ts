import { InvalidScattererError } from '../../src/errors';
import type { OverlapAware } from '../../src/model/constraints';
import type { ForwardFunction, ForwardRequest, ScattererLike } from '../../src/model/model.types';

/**
 * Minimal sphere description: `{ center, r }`. Rejects non-positive numeric radii the way a real
 * scatterer factory would.
 */
export class TestSphere implements ScattererLike {
  readonly parameters: Record<string, unknown>;

  constructor(parameters: Record<string, unknown>) {
    this.parameters = parameters;
  }

  fromParameters(parameters: Record<string, unknown>): TestSphere {
    const r = parameters.r;
    if (typeof r === 'number' && r <= 0) throw new InvalidScattererError('Sphere radius must be positive.');
    return new TestSphere(parameters);
  }
}

/** Two spheres with a fixed worst overlap, for overlap constraints. */
export class TestCluster implements OverlapAware {
  readonly parameters: Record<string, unknown>;
  readonly radii: readonly number[];
  private readonly overlap: number;

  constructor(radii: readonly number[], overlap: number) {
    this.parameters = { radii: [...radii] };
    this.radii = radii;
    this.overlap = overlap;
  }

  fromParameters(): TestCluster {
    return this;
  }

  largestOverlap(): number {
    return this.overlap;
  }
}

function radiusOf(scatterer: ScattererLike): number {
  const r = scatterer.parameters.r;
  if (typeof r !== 'number') throw new Error('Test forward model needs a numeric radius.');
  return r;
}

/** Predicts `scaling * r` at every data point. */
export const scaledRadius: ForwardFunction = ({ detector, scatterer, scaling }) =>
  Array.from({ length: detector.values.length }, () => (scaling ?? 1) * radiusOf(scatterer));

/** Forward function recording every request it receives. */
export function recordingForward(): { forward: ForwardFunction; requests: ForwardRequest[] } {
  const requests: ForwardRequest[] = [];
  const forward: ForwardFunction = (request) => {
    requests.push(request);
    return scaledRadius(request);
  };
  return { forward, requests };
}
