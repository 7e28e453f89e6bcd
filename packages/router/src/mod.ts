/**
 * Route registration tables for HTTP servers.
 *
 * @module
 */

export { Router } from "~/router.ts";
export { RouteEntry } from "~/route_table.ts";
export type { ReadonlyRouteTable } from "~/route_table.ts";
export { isValidPath, normalizePath, toBasePath } from "~/path.ts";
export { HTTP_METHODS, isHttpMethod } from "~/methods.ts";
export {
  controllerName,
  isRouteManifest,
  manifestIssues,
  RouteManifestSchema,
} from "~/manifest.ts";
export type { RouteManifest, RouteManifestEntry } from "~/manifest.ts";
export { configFromEnv, parseRouterOptions } from "~/config.ts";
export type { EnvConfig, RouterOptions } from "~/config.ts";
export { createLogger, isLogger } from "~/logger.ts";
export type { Logger, LoggerConfig, LogLevel, LogWriter } from "~/logger.ts";
export {
  ConfigError,
  InvalidRouteError,
  isWaymarkError,
  WaymarkError,
} from "~/errors/mod.ts";
export type {
  ErrorPayload,
  InvalidRouteDetails,
  ValidationIssue,
} from "~/errors/mod.ts";
export type { Action, HttpMethod, RegisteredRoute } from "~/types.ts";
