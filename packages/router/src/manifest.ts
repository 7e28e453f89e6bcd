/**
 * Serializable description of a router's route tables.
 */

import { type Static, Type } from "@sinclair/typebox";
import { ValueErrorType } from "@sinclair/typebox/errors";
import { Value } from "@sinclair/typebox/value";
import type { ValidationIssue } from "~/errors/mod.ts";

export const HttpMethodSchema = Type.Union([
  Type.Literal("GET"),
  Type.Literal("POST"),
  Type.Literal("PUT"),
  Type.Literal("PATCH"),
  Type.Literal("DELETE"),
  Type.Literal("OPTIONS"),
]);

export const RouteManifestEntrySchema = Type.Object({
  method: HttpMethodSchema,
  path: Type.String({ minLength: 1 }),
  controller: Type.String(),
});

export const RouteManifestSchema = Type.Object({
  basePath: Type.Union([Type.String(), Type.Null()]),
  routes: Type.Array(RouteManifestEntrySchema),
});

export type RouteManifestEntry = Static<typeof RouteManifestEntrySchema>;
export type RouteManifest = Static<typeof RouteManifestSchema>;

export function isRouteManifest(value: unknown): value is RouteManifest {
  return Value.Check(RouteManifestSchema, value);
}

/**
 * List why a value is not a route manifest. Empty when it is one.
 */
export function manifestIssues(value: unknown): ValidationIssue[] {
  return [...Value.Errors(RouteManifestSchema, value)].map((err) => ({
    field: err.path.replace(/^\//, "").replace(/\//g, ".") || "(root)",
    message: err.message,
    code: ValueErrorType[err.type],
  }));
}

/**
 * Display name for a controller: its own `name` string, a function's name,
 * or its constructor's name.
 */
export function controllerName(controller: object): string {
  if (
    "name" in controller &&
    typeof controller.name === "string" &&
    controller.name.length > 0
  ) {
    return controller.name;
  }

  const ctor: unknown = Object.getPrototypeOf(controller)?.constructor;
  if (
    typeof ctor === "function" &&
    ctor !== Object &&
    ctor !== Function &&
    ctor.name.length > 0
  ) {
    return ctor.name;
  }

  return "anonymous";
}
