/**
 * Base class for every error raised by the language model packages.
 */
export class LanguageModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LanguageModelError";
  }
}

/**
 * Thrown when a public operation receives an argument outside its domain,
 * e.g. a model order that is not a positive integer.
 */
export class InvalidArgumentError extends LanguageModelError {
  public readonly field: string;
  public readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    super(`Invalid ${field} (${String(value)}): ${reason}`);
    this.name = "InvalidArgumentError";
    this.field = field;
    this.value = value;
  }
}

/**
 * Thrown when count tables disagree with each other. Counts built by
 * extractCounts never trigger it; this signals a programming error.
 */
export class ModelInvariantError extends LanguageModelError {
  constructor(message: string) {
    super(message);
    this.name = "ModelInvariantError";
  }
}

export function assertPositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(field, value, "must be a positive integer");
  }
}
