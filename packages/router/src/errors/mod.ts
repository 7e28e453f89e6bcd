/**
 * Errors module - structured error handling.
 */

export { isWaymarkError, WaymarkError } from "~/errors/base.ts";
export { ConfigError, InvalidRouteError } from "~/errors/route.ts";
export type { InvalidRouteDetails } from "~/errors/route.ts";
export type { ErrorPayload, ValidationIssue } from "~/errors/types.ts";
