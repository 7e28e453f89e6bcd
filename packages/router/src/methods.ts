import type { HttpMethod } from "~/types.ts";

/**
 * Supported methods, in the order route tables are reported.
 */
export const HTTP_METHODS = [
  "GET",
  "POST",
  "PUT",
  "PATCH",
  "DELETE",
  "OPTIONS",
] as const satisfies readonly HttpMethod[];

export function isHttpMethod(value: unknown): value is HttpMethod {
  return typeof value === "string" &&
    HTTP_METHODS.some((method) => method === value);
}
