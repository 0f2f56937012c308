/**
 * @module codec/dto
 * @description Conversion between native Results and DTO OperationResults.
 */

import type { Result } from "../types/result.js";
import { err, mapResult, ok } from "../types/result.js";
import type { OperationResult } from "../types/dto.js";
import { operationFailure, operationSuccess } from "../types/dto.js";
import { fromDTO, toDTO } from "./error-codes.js";

export function toOperationResult<T>(result: Result<T>): OperationResult<T> {
  if (result.ok) return operationSuccess(result.value);
  const dto = toDTO(result.error);
  return operationFailure(dto.errorCode, dto.errorMessage, dto.details);
}

export function fromOperationResult<T>(result: OperationResult<T>): Result<T> {
  if (result.status === "success") return ok(result.value);
  return err(fromDTO(result));
}

/** Convert a native Result while transforming its success value. */
export function toOperationResultWith<T, U>(
  result: Result<T>,
  transform: (value: T) => U
): OperationResult<U> {
  return toOperationResult(mapResult(result, transform));
}

export function isOperationSuccess<T>(
  result: OperationResult<T>
): result is Extract<OperationResult<T>, { status: "success" }> {
  return result.status === "success";
}
