/***
 * ValidationError — Raised when a raw value fails a branded-type check.
 *
 * Kept apart from ECSError so the primitives don't depend on the
 * registry's error categories.
 *
 ***/

import { AppError } from "utils/error";

export enum VALIDATION_ERROR {
  INVALID_BRANDED_VALUE = "INVALID_BRANDED_VALUE",
}

export class ValidationError extends AppError {
  constructor(
    public readonly category: VALIDATION_ERROR,
    message: string,
    context?: Record<string, unknown>,
  ) {
    super(message, false, context);
  }
}
