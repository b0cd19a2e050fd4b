/***
 * Assertions — Dev-only validation and branded casting.
 *
 * validate_and_cast creates branded IDs from raw numbers: the check
 * runs under __DEV__ and is stripped from production bundles.
 * unsafe_cast skips every check and is reserved for values the caller
 * has already proven valid (bit-packed IDs, sentinels).
 *
 ***/

import { VALIDATION_ERROR, ValidationError } from "./error";

export const is_non_negative_integer = (v: number): boolean =>
  Number.isInteger(v) && v >= 0;

export function validate_and_cast<T, Result extends T = T>(
  value: T,
  validator: (v: T) => boolean,
  err_message: string,
): Result {
  if (__DEV__ && !validator(value)) {
    throw new ValidationError(
      VALIDATION_ERROR.INVALID_BRANDED_VALUE,
      `Expected value to meet validation: ${err_message}`,
      { value },
    );
  }
  return value as Result;
}

export function unsafe_cast<T>(value: unknown): T {
  return value as T;
}
