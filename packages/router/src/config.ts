/**
 * Router options and environment configuration.
 */

import { z } from "zod";
import { ConfigError } from "~/errors/mod.ts";
import type { ValidationIssue } from "~/errors/mod.ts";
import { isLogger, LOG_LEVEL_NAMES } from "~/logger.ts";
import type { Logger, LogLevel } from "~/logger.ts";

export interface RouterOptions<TController extends object = object> {
  /** Base path applied to every route registered afterwards */
  basePath?: string;
  /** Default controller for routes registered without one */
  controller?: TController;
  /** Logger to report through; one is created when omitted */
  logger?: Logger;
  /** Level of the created logger (ignored when `logger` is given) */
  logLevel?: LogLevel;
}

export type EnvConfig = Pick<RouterOptions, "basePath" | "logLevel">;

const routerOptionsSchema = z
  .object({
    basePath: z.string().optional(),
    controller: z
      .custom<object>(
        (value) =>
          (typeof value === "object" && value !== null) ||
          typeof value === "function",
        { message: "Controller must be an object or a function" },
      )
      .optional(),
    logger: z
      .custom<Logger>(isLogger, { message: "Expected a logger" })
      .optional(),
    logLevel: z.enum(LOG_LEVEL_NAMES).optional(),
  })
  .strict();

const envSchema = z.object({
  WAYMARK_BASE_PATH: z.string().optional(),
  WAYMARK_LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional(),
});

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate router options, throwing {@link ConfigError} that lists every
 * issue found.
 */
export function parseRouterOptions<TController extends object>(
  options: RouterOptions<TController>,
): RouterOptions<TController> {
  const result = routerOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigError(toIssues(result.error));
  }
  return options;
}

/**
 * Read router options from the environment.
 *
 * - `WAYMARK_BASE_PATH`: base path for the router
 * - `WAYMARK_LOG_LEVEL`: level of the router's logger
 *
 * Empty variables count as unset.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): EnvConfig {
  const result = envSchema.safeParse({
    WAYMARK_BASE_PATH: env.WAYMARK_BASE_PATH || undefined,
    WAYMARK_LOG_LEVEL: env.WAYMARK_LOG_LEVEL || undefined,
  });

  if (!result.success) {
    throw new ConfigError(toIssues(result.error), "Invalid environment");
  }

  const config: EnvConfig = {};
  if (result.data.WAYMARK_BASE_PATH !== undefined) {
    config.basePath = result.data.WAYMARK_BASE_PATH;
  }
  if (result.data.WAYMARK_LOG_LEVEL !== undefined) {
    config.logLevel = result.data.WAYMARK_LOG_LEVEL;
  }
  return config;
}
