/**
 * Concrete prior family.
 *
 * The set is intentionally small: it covers what model configurations need to declare bounded,
 * normal and complex-valued free parameters. Each class validates its arguments eagerly so a bad
 * prior fails at configuration time rather than deep inside an optimizer.
 */
import { Complex } from '../structures/complex';
import { Prior, PriorParameters, RandomSource, VariableValue } from './variable';

/** log(sqrt(2π)), shared by the normal densities. */
const LOG_SQRT_2PI = 0.5 * Math.log(2 * Math.PI);

/** Upper bound on rejection-sampling attempts for truncated distributions. */
const MAX_REJECTION_DRAWS = 1000;

function standardNormal(rng: RandomSource): number {
  // Box–Muller; 1 - u keeps the logarithm argument in (0, 1].
  const u1 = 1 - rng();
  const u2 = rng();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * Uniform prior over [lower, upper]. Either bound may be infinite (improper prior).
 */
export class Uniform extends Prior {
  readonly kind = 'Uniform';
  readonly lower: number;
  readonly upper: number;
  private readonly _guess: number;

  constructor(lower: number, upper: number, guess?: number, name?: string) {
    super(name);
    if (!(lower < upper))
      throw new Error(`Uniform lower bound ${lower} must be below upper bound ${upper}.`);
    this.lower = lower;
    this.upper = upper;
    this._guess = guess ?? Uniform.defaultGuess(lower, upper);
    if (this._guess < lower || this._guess > upper)
      throw new Error(`Guess ${this._guess} is outside [${lower}, ${upper}].`);
  }

  private static defaultGuess(lower: number, upper: number): number {
    if (Number.isFinite(lower) && Number.isFinite(upper)) return (lower + upper) / 2;
    if (Number.isFinite(lower)) return lower;
    if (Number.isFinite(upper)) return upper;
    return 0;
  }

  get guess(): number {
    return this._guess;
  }

  /** Interval width; infinite for improper priors. */
  get interval(): number {
    return this.upper - this.lower;
  }

  lnprob(value: VariableValue): number {
    if (typeof value !== 'number' || value < this.lower || value > this.upper) return -Infinity;
    return Number.isFinite(this.interval) ? -Math.log(this.interval) : 0;
  }

  sample(rng: RandomSource): number {
    if (!Number.isFinite(this.interval)) return this._guess;
    return this.lower + rng() * this.interval;
  }

  parameters(): PriorParameters {
    return { lower: this.lower, upper: this.upper, guess: this._guess };
  }

  renamed(name: string | undefined): Uniform {
    return new Uniform(this.lower, this.upper, this._guess, name);
  }
}

/**
 * Normal prior with mean `mu` and standard deviation `sd`.
 */
export class Gaussian extends Prior {
  readonly kind: string = 'Gaussian';
  readonly mu: number;
  readonly sd: number;

  constructor(mu: number, sd: number, name?: string) {
    super(name);
    if (!(sd > 0)) throw new Error(`Gaussian standard deviation must be positive, got ${sd}.`);
    this.mu = mu;
    this.sd = sd;
  }

  get guess(): number {
    return this.mu;
  }

  /** Variance (sd²). */
  get variance(): number {
    return this.sd * this.sd;
  }

  lnprob(value: VariableValue): number {
    if (typeof value !== 'number') return -Infinity;
    const z = (value - this.mu) / this.sd;
    return -0.5 * z * z - Math.log(this.sd) - LOG_SQRT_2PI;
  }

  sample(rng: RandomSource): number {
    return this.mu + this.sd * standardNormal(rng);
  }

  parameters(): PriorParameters {
    return { mu: this.mu, sd: this.sd };
  }

  renamed(name: string | undefined): Gaussian {
    return new Gaussian(this.mu, this.sd, name);
  }
}

/**
 * Normal prior truncated to [lower, upper]. Inside the bounds the density is the unnormalized
 * Gaussian one; outside it is zero.
 */
export class BoundedGaussian extends Gaussian {
  readonly kind: string = 'BoundedGaussian';
  readonly lower: number;
  readonly upper: number;

  constructor(mu: number, sd: number, lower: number, upper: number, name?: string) {
    super(mu, sd, name);
    if (!(lower < upper))
      throw new Error(`BoundedGaussian lower bound ${lower} must be below upper bound ${upper}.`);
    this.lower = lower;
    this.upper = upper;
  }

  get guess(): number {
    return Math.min(Math.max(this.mu, this.lower), this.upper);
  }

  lnprob(value: VariableValue): number {
    if (typeof value !== 'number' || value < this.lower || value > this.upper) return -Infinity;
    return super.lnprob(value);
  }

  sample(rng: RandomSource): number {
    for (let draw = 0; draw < MAX_REJECTION_DRAWS; draw++) {
      const candidate = super.sample(rng);
      if (candidate >= this.lower && candidate <= this.upper) return candidate;
    }
    return this.guess;
  }

  parameters(): PriorParameters {
    return { mu: this.mu, sd: this.sd, lower: this.lower, upper: this.upper };
  }

  renamed(name: string | undefined): BoundedGaussian {
    return new BoundedGaussian(this.mu, this.sd, this.lower, this.upper, name);
  }
}

/** Part of a complex prior: a fixed number or a real-valued prior. */
export type ComplexPart = number | Prior;

/**
 * Complex-valued prior assembled from independent real and imaginary parts. Either part may be
 * fixed. The map builder splits it so each free part gets its own slot.
 */
export class ComplexPrior extends Prior {
  readonly kind = 'ComplexPrior';
  readonly real: ComplexPart;
  readonly imag: ComplexPart;

  constructor(real: ComplexPart, imag: ComplexPart, name?: string) {
    super(name);
    this.real = real;
    this.imag = imag;
  }

  get guess(): Complex {
    return new Complex(partGuess(this.real), partGuess(this.imag));
  }

  lnprob(value: VariableValue): number {
    const complex = typeof value === 'number' ? new Complex(value, 0) : value;
    return partLnprob(this.real, complex.real) + partLnprob(this.imag, complex.imag);
  }

  sample(rng: RandomSource): Complex {
    return new Complex(partSample(this.real, rng), partSample(this.imag, rng));
  }

  parameters(): PriorParameters {
    return { real: partParameters(this.real), imag: partParameters(this.imag) };
  }

  renamed(name: string | undefined): ComplexPrior {
    return new ComplexPrior(this.real, this.imag, name);
  }
}

function partGuess(part: ComplexPart): number {
  if (typeof part === 'number') return part;
  const guess = part.guess;
  return typeof guess === 'number' ? guess : guess.real;
}

function partLnprob(part: ComplexPart, value: number): number {
  if (typeof part === 'number') return 0;
  return part.lnprob(value);
}

function partSample(part: ComplexPart, rng: RandomSource): number {
  if (typeof part === 'number') return part;
  const drawn = part.sample(rng);
  return typeof drawn === 'number' ? drawn : drawn.real;
}

function partParameters(part: ComplexPart): number | PriorParameters {
  if (typeof part === 'number') return part;
  return { kind: part.kind, ...part.parameters() };
}
