/**
 * JSON codec for the prior family.
 *
 * Priors are written with a `type` discriminant and rebuilt through a closed lookup, the same way
 * map constructors are: no executable reference ever lands in the serialized form.
 */
import { decodeNumber, EncodedNumber, encodeNumber, isRecord } from '../utils/json';
import { BoundedGaussian, ComplexPart, ComplexPrior, Gaussian, Uniform } from './priors';
import { Prior } from './variable';

export interface UniformJSON {
  type: 'Uniform';
  lower: EncodedNumber;
  upper: EncodedNumber;
  guess: EncodedNumber;
  name?: string;
}

export interface GaussianJSON {
  type: 'Gaussian';
  mu: EncodedNumber;
  sd: EncodedNumber;
  name?: string;
}

export interface BoundedGaussianJSON {
  type: 'BoundedGaussian';
  mu: EncodedNumber;
  sd: EncodedNumber;
  lower: EncodedNumber;
  upper: EncodedNumber;
  name?: string;
}

export interface ComplexPriorJSON {
  type: 'ComplexPrior';
  real: EncodedNumber | PriorJSON;
  imag: EncodedNumber | PriorJSON;
  name?: string;
}

export type PriorJSON = UniformJSON | GaussianJSON | BoundedGaussianJSON | ComplexPriorJSON;

function withName<T extends object>(json: T, name: string | undefined): T & { name?: string } {
  const extra: { name?: string } = name === undefined ? {} : { name };
  return { ...json, ...extra };
}

/**
 * Serialize a prior.
 * @throws Error for priors outside the built-in family.
 */
export function priorToJSON(prior: Prior): PriorJSON {
  if (prior instanceof Uniform)
    return withName(
      {
        type: 'Uniform' as const,
        lower: encodeNumber(prior.lower),
        upper: encodeNumber(prior.upper),
        guess: encodeNumber(prior.guess),
      },
      prior.name
    );
  // BoundedGaussian before Gaussian: it is a subclass.
  if (prior instanceof BoundedGaussian)
    return withName(
      {
        type: 'BoundedGaussian' as const,
        mu: encodeNumber(prior.mu),
        sd: encodeNumber(prior.sd),
        lower: encodeNumber(prior.lower),
        upper: encodeNumber(prior.upper),
      },
      prior.name
    );
  if (prior instanceof Gaussian)
    return withName(
      { type: 'Gaussian' as const, mu: encodeNumber(prior.mu), sd: encodeNumber(prior.sd) },
      prior.name
    );
  if (prior instanceof ComplexPrior)
    return withName(
      {
        type: 'ComplexPrior' as const,
        real: partToJSON(prior.real),
        imag: partToJSON(prior.imag),
      },
      prior.name
    );
  throw new Error(`Cannot serialize prior of kind '${prior.kind}'.`);
}

function partToJSON(part: ComplexPart): EncodedNumber | PriorJSON {
  return typeof part === 'number' ? encodeNumber(part) : priorToJSON(part);
}

function optionalName(json: Record<string, unknown>): string | undefined {
  const name = json.name;
  if (name === undefined || name === null) return undefined;
  if (typeof name !== 'string') throw new Error('Prior name must be a string.');
  return name;
}

/**
 * Rebuild a prior from {@link priorToJSON} output (or any structurally equivalent object, such as
 * the result of `JSON.parse`).
 * @throws Error on unknown `type` values or malformed fields.
 */
export function priorFromJSON(json: unknown): Prior {
  if (!isRecord(json)) throw new Error('Invalid JSON for prior.');
  const name = optionalName(json);
  switch (json.type) {
    case 'Uniform':
      return new Uniform(
        decodeNumber(json.lower, 'lower'),
        decodeNumber(json.upper, 'upper'),
        decodeNumber(json.guess, 'guess'),
        name
      );
    case 'Gaussian':
      return new Gaussian(decodeNumber(json.mu, 'mu'), decodeNumber(json.sd, 'sd'), name);
    case 'BoundedGaussian':
      return new BoundedGaussian(
        decodeNumber(json.mu, 'mu'),
        decodeNumber(json.sd, 'sd'),
        decodeNumber(json.lower, 'lower'),
        decodeNumber(json.upper, 'upper'),
        name
      );
    case 'ComplexPrior':
      return new ComplexPrior(partFromJSON(json.real), partFromJSON(json.imag), name);
    default:
      throw new Error(`Unknown prior type '${String(json.type)}'.`);
  }
}

function partFromJSON(json: unknown): ComplexPart {
  if (isRecord(json) && 'type' in json) return priorFromJSON(json);
  return decodeNumber(json, 'complex part');
}
