/**
 * Waymark router: per-method route tables with base-path and controller
 * scoping.
 *
 * @example
 * ```typescript
 * import { Router } from "@waymark/router";
 *
 * const router = new Router({ basePath: "api", controller: apiController })
 *   .get("status", showStatus)
 *   .post("jobs", createJob, jobsController);
 * ```
 *
 * @module
 */

export * from "./src/mod.ts";
