/**
 * JSON responses that may carry bigint amounts.
 *
 * Engine records hold bigints; the wire carries them as decimal strings.
 */

import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";

export function toJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) =>
    typeof v === "bigint" ? v.toString() : v,
  );
}

/**
 * Respond with `{ data }`, rendering bigints as strings.
 */
export function respond(
  c: Context,
  data: unknown,
  status: ContentfulStatusCode = 200,
): Response {
  return c.body(toJson({ data }), status, {
    "Content-Type": "application/json; charset=UTF-8",
  });
}
