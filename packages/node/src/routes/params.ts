/**
 * Path and query parameter helpers shared by the route modules.
 */

import type { z } from "zod";
import { IdParamSchema } from "../types/dto.js";
import { ApiError } from "../types/error.js";

/**
 * Parse a numeric id path parameter.
 *
 * @throws {ApiError} VALIDATION_ERROR (400) for anything but a positive integer
 */
export function parseId(raw: string, name: string): number {
  const result = IdParamSchema.safeParse(raw);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", `Invalid ${name}: "${raw}"`, 400);
  }
  return result.data;
}

/**
 * Parse query parameters against a schema.
 *
 * @throws {ApiError} VALIDATION_ERROR (400)
 */
export function parseQuery<S extends z.ZodTypeAny>(
  schema: S,
  query: Record<string, string>,
): z.output<S> {
  const result = schema.safeParse(query);
  if (!result.success) {
    throw new ApiError("VALIDATION_ERROR", "Invalid query parameters", 400);
  }
  return result.data;
}

/**
 * Unwrap an optional lookup or answer 404.
 */
export function found<T>(value: T | undefined, what: string): T {
  if (value === undefined) {
    throw new ApiError("NOT_FOUND", `${what} not found`, 404);
  }
  return value;
}
