import { ConfigurationError } from './config.js';
import { FoodDataCentralError } from './usdaClient.js';

/** Raised when a profile with zero (or missing) energy is normalized per kcal. */
export class UndefinedNormalizationError extends Error {
  readonly fdcId: number;

  constructor(fdcId: number, energy: number) {
    super(`Cannot normalize FDC ${fdcId} per kcal: energy is ${energy}.`);
    this.name = 'UndefinedNormalizationError';
    this.fdcId = fdcId;
  }
}

export class NormalizationStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NormalizationStateError';
  }
}

export class InvalidPortionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidPortionError';
  }
}

/**
 * Errors that mean no item in a batch can succeed: missing configuration or
 * credentials the upstream service refuses.
 */
export function isFatalLookupError(error: unknown): boolean {
  if (error instanceof ConfigurationError) {
    return true;
  }
  if (error instanceof FoodDataCentralError) {
    return error.status === 401 || error.status === 403;
  }
  return false;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
