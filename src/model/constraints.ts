import type { Constraint, ScattererLike } from './model.types';

/** Scatterer able to report sphere radii and its worst pairwise overlap. */
export interface OverlapAware extends ScattererLike {
  readonly radii: readonly number[];
  /** Largest overlap distance between any two spheres (≤ 0 when none overlap). */
  largestOverlap(): number;
}

function isOverlapAware(scatterer: ScattererLike): scatterer is OverlapAware {
  return 'radii' in scatterer && 'largestOverlap' in scatterer && typeof scatterer.largestOverlap === 'function';
}

/**
 * Constraint prohibiting overlaps beyond a tolerance. `fraction` is the largest overlap allowed,
 * as a fraction of the smallest sphere diameter.
 */
export class LimitOverlaps implements Constraint {
  readonly fraction: number;

  constructor(fraction: number = 0.1) {
    this.fraction = fraction;
  }

  check(scatterer: ScattererLike): boolean {
    if (!isOverlapAware(scatterer))
      throw new Error('LimitOverlaps requires a scatterer exposing radii and largestOverlap().');
    const smallestDiameter = Math.min(...scatterer.radii) * 2;
    return scatterer.largestOverlap() <= smallestDiameter * this.fraction;
  }
}
