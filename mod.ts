/**
 * Waymark - route registration tables for HTTP servers.
 *
 * @example
 * ```typescript
 * import { Router } from "waymark";
 *
 * const router = new Router({ controller: pages })
 *   .get("home", showHome)
 *   .on("admin")
 *   .use(admin)
 *   .get("dashboard", showDashboard);
 * ```
 *
 * @module
 */

export * from "@waymark/router";
