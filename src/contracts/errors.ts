// ─── Engine errors ────────────────────────────────────────────────────────────
//
// Two kinds of failure leave the engine:
//   NetworkConstructionError – a builder phase was called out of order or a
//                              calculator was handed a network missing a node.
//   InvalidInputError        – a value outside its physical domain, or a name
//                              that is not in a catalogue.

export class NetworkConstructionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NetworkConstructionError';
  }
}

export class InvalidInputError extends Error {
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    super(`Invalid ${field} (${String(value)}): ${reason}`);
    this.name = 'InvalidInputError';
    this.field = field;
    this.value = value;
  }
}

/** Throws InvalidInputError unless `value` is a finite number strictly above zero. */
export function requirePositive(field: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(field, value, 'must be a finite number greater than zero');
  }
  return value;
}

/** Throws InvalidInputError unless `value` is a finite number at or above zero. */
export function requireNonNegative(field: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new InvalidInputError(field, value, 'must be a finite number of zero or more');
  }
  return value;
}
