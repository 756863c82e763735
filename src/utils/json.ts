/**
 * JSON helpers shared by the codecs.
 *
 * JSON cannot carry non-finite numbers (`JSON.stringify(Infinity) === 'null'`) and writes `-0` as
 * `0`. Unbounded prior limits and `-Infinity` constants are common in model configurations, so the
 * codecs box these values.
 */
export type BoxedNumberTag = 'Infinity' | '-Infinity' | 'NaN' | '-0';

/** Number as stored in JSON: plain when finite and not `-0`, boxed otherwise. */
export type EncodedNumber = number | { $number: BoxedNumberTag };

export function encodeNumber(value: number): EncodedNumber {
  if (Object.is(value, -0)) return { $number: '-0' };
  if (Number.isFinite(value)) return value;
  if (Number.isNaN(value)) return { $number: 'NaN' };
  return { $number: value > 0 ? 'Infinity' : '-Infinity' };
}

export function isBoxedNumber(value: unknown): value is { $number: BoxedNumberTag } {
  if (typeof value !== 'object' || value === null || !('$number' in value)) return false;
  const tag = value.$number;
  return tag === 'Infinity' || tag === '-Infinity' || tag === 'NaN' || tag === '-0';
}

/**
 * Inverse of {@link encodeNumber}.
 * @throws Error when the value is neither a number nor a boxed number.
 */
export function decodeNumber(value: unknown, field: string = 'value'): number {
  if (typeof value === 'number') return value;
  if (isBoxedNumber(value)) {
    if (value.$number === '-0') return -0;
    if (value.$number === 'NaN') return NaN;
    return value.$number === 'Infinity' ? Infinity : -Infinity;
  }
  throw new Error(`Expected a number for '${field}'.`);
}

/** Narrow an unknown value to a plain string-keyed record (arrays excluded). */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Plain object literal (or `Object.create(null)`), as opposed to class instances. */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}
