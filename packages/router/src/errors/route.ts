/**
 * Route registration errors.
 */

import { WaymarkError } from "~/errors/base.ts";
import type { HttpMethod } from "~/types.ts";
import type { ValidationIssue } from "~/errors/types.ts";

export interface InvalidRouteDetails {
  path?: string;
  method?: HttpMethod;
}

/**
 * Raised when a route, base path or controller mount is rejected.
 */
export class InvalidRouteError extends WaymarkError {
  declare readonly details: InvalidRouteDetails;

  constructor(message: string, details: InvalidRouteDetails = {}) {
    super(message, "INVALID_ROUTE", details);
    this.name = "InvalidRouteError";
  }

  static invalidPath(path: string): InvalidRouteError {
    return new InvalidRouteError(
      `The path '${path}' is an invalid route path`,
      { path },
    );
  }
}

/**
 * Raised when router options fail validation.
 */
export class ConfigError extends WaymarkError {
  declare readonly details: ValidationIssue[];

  constructor(issues: ValidationIssue[], message = "Invalid router options") {
    super(message, "INVALID_CONFIG", issues);
    this.name = "ConfigError";
  }

  get issues(): ValidationIssue[] {
    return this.details;
  }
}
