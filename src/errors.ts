/**
 * Error taxonomy of the mapping engine and its model layer.
 *
 * Every class sets a stable `name` so callers can branch on `error.name` after errors cross a
 * structured-clone or logging boundary where `instanceof` no longer works.
 */

/** A tie referenced a parameter name the registry does not hold (or no name at all). */
export class UnknownParameterError extends Error {
  readonly parameter: string | undefined;

  constructor(message: string, parameter?: string) {
    super(message);
    this.name = 'UnknownParameterError';
    this.parameter = parameter;
  }
}

/** A tie was requested between Variables whose distributions differ. */
export class TieError extends Error {
  readonly parameters: string[];

  constructor(message: string, parameters: string[] = []) {
    super(message);
    this.name = 'TieError';
    this.parameters = parameters;
  }
}

/** A named quantity is neither mapped nor available from a fallback source. */
export class MissingParameterError extends Error {
  readonly parameter: string;

  constructor(parameter: string, message?: string) {
    super(message ?? `Missing parameter: ${parameter}`);
    this.name = 'MissingParameterError';
    this.parameter = parameter;
  }
}

/** A slot index points past the end of the values vector or the registry. */
export class OutOfRangeError extends RangeError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number) {
    super(`Slot index ${index} is out of range for ${length} value(s)`);
    this.name = 'OutOfRangeError';
    this.index = index;
    this.length = length;
  }
}

/**
 * Raised by scatterer factories and forward-model collaborators when a reconstructed
 * configuration is physically invalid (overlapping spheres, negative radius...). The model layer
 * turns it into a zero probability.
 */
export class InvalidScattererError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidScattererError';
  }
}
