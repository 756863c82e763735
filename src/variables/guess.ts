import seedrandom from 'seedrandom';
import { Complex } from '../structures/complex';
import { Prior, RandomSource, VariableValue } from './variable';

/**
 * Build the random source used for guess generation. A seed makes every draw reproducible;
 * without one seedrandom auto-seeds from the environment.
 */
export function createRandomSource(seed?: number | string): RandomSource {
  return seed === undefined ? seedrandom() : seedrandom(String(seed));
}

function blend(guess: number, drawn: number, scaling: number): number {
  return guess + scaling * (drawn - guess);
}

/**
 * Generate `n` starting points scattered around the priors' guesses.
 *
 * Each row holds one value per prior, in prior order: `guess + scaling * (sample - guess)`.
 * `scaling = 0` repeats the guesses, `scaling = 1` draws straight from the priors, anything in
 * between shrinks the draws towards the guesses (and stays inside bounded supports).
 *
 * @example
 * ```ts
 * const rows = generateGuess(model.parameterList, 10, 0.5, 42); // 10 walkers for a sampler
 * ```
 */
export function generateGuess(
  priors: readonly Prior[],
  n: number = 1,
  scaling: number = 1,
  seed?: number | string
): VariableValue[][] {
  if (!Number.isInteger(n) || n < 1) throw new Error(`Number of guesses must be a positive integer, got ${n}.`);
  const rng = createRandomSource(seed);
  const rows: VariableValue[][] = [];
  for (let row = 0; row < n; row++) {
    rows.push(
      priors.map((prior) => {
        const guess = prior.guess;
        const drawn = prior.sample(rng);
        if (typeof guess === 'number' && typeof drawn === 'number')
          return blend(guess, drawn, scaling);
        const g = typeof guess === 'number' ? new Complex(guess) : guess;
        const d = typeof drawn === 'number' ? new Complex(drawn) : drawn;
        return new Complex(blend(g.real, d.real, scaling), blend(g.imag, d.imag, scaling));
      })
    );
  }
  return rows;
}
