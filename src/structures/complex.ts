/**
 * Immutable complex number used for refractive indices and other complex-valued constants.
 */
export class Complex {
  /** Real part. */
  readonly real: number;
  /** Imaginary part. */
  readonly imag: number;

  constructor(real: number, imag: number = 0) {
    this.real = real;
    this.imag = imag;
  }

  /** Structural equality (both parts strictly equal). */
  equals(other: Complex): boolean {
    return this.real === other.real && this.imag === other.imag;
  }

  toString(): string {
    const sign = this.imag < 0 || Object.is(this.imag, -0) ? '-' : '+';
    return `${this.real}${sign}${Math.abs(this.imag)}j`;
  }
}

export function isComplex(value: unknown): value is Complex {
  return value instanceof Complex;
}
