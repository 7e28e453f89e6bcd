/**
 * Route registration tables.
 *
 * Design:
 * - One RouteTable per HTTP method, kept in a Map
 * - Routes stored in registration order; duplicates kept
 * - Base path and default controller apply to routes registered after
 *   they are set, never to earlier ones
 */

import type { Action, HttpMethod, RegisteredRoute } from "~/types.ts";
import { HTTP_METHODS } from "~/methods.ts";
import { isValidPath, normalizePath, toBasePath } from "~/path.ts";
import { RouteEntry, RouteTable } from "~/route_table.ts";
import type { ReadonlyRouteTable } from "~/route_table.ts";
import { InvalidRouteError, WaymarkError } from "~/errors/mod.ts";
import { createLogger } from "~/logger.ts";
import type { Logger } from "~/logger.ts";
import { parseRouterOptions } from "~/config.ts";
import type { RouterOptions } from "~/config.ts";
import { controllerName } from "~/manifest.ts";
import type { RouteManifest } from "~/manifest.ts";

/**
 * Router class for registering HTTP routes against controllers.
 *
 * @example
 * ```typescript
 * const router = new Router<Controller>();
 *
 * router
 *   .on("users")
 *   .use(usersController)
 *   .get("list", listUsers)
 *   .post("create", createUser);
 *
 * for (const entry of router.table("GET")) {
 *   console.log(entry.path); // "/users/list/"
 * }
 * ```
 */
export class Router<
  TController extends object = object,
  TRequest = unknown,
  TResponse = unknown,
> {
  private readonly tables: Map<
    HttpMethod,
    RouteTable<TController, TRequest, TResponse>
  >;
  private readonly logger: Logger;
  private _basePath: string | undefined;
  private _controller: TController | undefined;

  /**
   * @throws {ConfigError} If options fail validation
   * @throws {InvalidRouteError} If the seeded base path is rejected
   */
  constructor(options: RouterOptions<TController> = {}) {
    const { basePath, controller, logger, logLevel } = parseRouterOptions(
      options,
    );

    this.logger = logger ??
      createLogger({ name: "router", level: logLevel ?? "info" });
    this.tables = new Map(
      HTTP_METHODS.map((
        method,
      ): [HttpMethod, RouteTable<TController, TRequest, TResponse>] => [
        method,
        new RouteTable(),
      ]),
    );

    if (basePath !== undefined) {
      this.on(basePath);
    }
    this._controller = controller;
  }

  /**
   * Base path applied to routes registered from now on.
   */
  get basePath(): string | undefined {
    return this._basePath;
  }

  /**
   * Controller used by routes registered without one.
   */
  get controller(): TController | undefined {
    return this._controller;
  }

  /**
   * Total number of routes across all methods.
   */
  get size(): number {
    let total = 0;
    for (const table of this.tables.values()) {
      total += table.size;
    }
    return total;
  }

  get(
    path: string,
    action: Action<TRequest, TResponse>,
    controller?: TController | null,
  ): this {
    return this.add("GET", path, action, controller);
  }

  post(
    path: string,
    action: Action<TRequest, TResponse>,
    controller?: TController | null,
  ): this {
    return this.add("POST", path, action, controller);
  }

  put(
    path: string,
    action: Action<TRequest, TResponse>,
    controller?: TController | null,
  ): this {
    return this.add("PUT", path, action, controller);
  }

  patch(
    path: string,
    action: Action<TRequest, TResponse>,
    controller?: TController | null,
  ): this {
    return this.add("PATCH", path, action, controller);
  }

  delete(
    path: string,
    action: Action<TRequest, TResponse>,
    controller?: TController | null,
  ): this {
    return this.add("DELETE", path, action, controller);
  }

  options(
    path: string,
    action: Action<TRequest, TResponse>,
    controller?: TController | null,
  ): this {
    return this.add("OPTIONS", path, action, controller);
  }

  /**
   * Register a route under the given method.
   *
   * An explicit controller is bound to this route and also becomes the
   * default for every later registration.
   *
   * @throws {InvalidRouteError} If the path is invalid or no controller
   * is given and none is set
   */
  add(
    method: HttpMethod,
    path: string,
    action: Action<TRequest, TResponse>,
    controller?: TController | null,
  ): this {
    if (!isValidPath(path)) {
      throw InvalidRouteError.invalidPath(path);
    }

    const normalized = normalizePath(path);
    const resolved = controller ?? this._controller;
    if (resolved === undefined) {
      throw new InvalidRouteError(
        `Missing controller for route '${method} ${normalized}'`,
        { method, path: normalized },
      );
    }

    this._controller = resolved;
    this.enqueue(
      method,
      new RouteEntry(this.prependBasePath(normalized), resolved, action),
    );
    return this;
  }

  /**
   * Set the base path for routes registered from now on.
   *
   * Stored as `/<path>/`. Replaces any previous base path.
   *
   * @throws {InvalidRouteError} For "/" or an invalid path
   */
  on(path: string): this {
    const basePath = toBasePath(path);
    if (basePath === null) {
      throw InvalidRouteError.invalidPath(path);
    }

    this._basePath = basePath;
    this.logger.debug("Base path set", { basePath });
    return this;
  }

  /**
   * Mount a controller under the current base path.
   *
   * @throws {InvalidRouteError} If no base path is set
   */
  use(controller: TController): this {
    if (this._basePath === undefined) {
      throw new InvalidRouteError(
        "Controller mount attempted without a set base path",
      );
    }

    this._controller = controller;
    this.logger.debug("Controller mounted", {
      basePath: this._basePath,
      controller: controllerName(controller),
    });
    return this;
  }

  /**
   * Prefix a normalized path with the current base path, if any.
   */
  prependBasePath(path: string): string {
    return this._basePath === undefined ? path : `${this._basePath}${path}`;
  }

  /**
   * Routes registered under a method. Read-only: routes are only added
   * through the router.
   */
  table(
    method: HttpMethod,
  ): ReadonlyRouteTable<TController, TRequest, TResponse> {
    const table = this.tables.get(method);
    if (!table) {
      throw new WaymarkError(
        `No route table for method '${method}'`,
        "INTERNAL_ERROR",
        { method },
        false,
      );
    }
    return table.asReadonly();
  }

  /**
   * Every route, grouped by method then in registration order.
   */
  routes(): RegisteredRoute<TController, TRequest, TResponse>[] {
    return HTTP_METHODS.flatMap((method) =>
      this.table(method).entries().map((entry) => ({
        method,
        path: entry.path,
        controller: entry.controller,
        action: entry.action,
      }))
    );
  }

  toManifest(): RouteManifest {
    return {
      basePath: this._basePath ?? null,
      routes: this.routes().map((route) => ({
        method: route.method,
        path: route.path,
        controller: controllerName(route.controller),
      })),
    };
  }

  private enqueue(
    method: HttpMethod,
    entry: RouteEntry<TController, TRequest, TResponse>,
  ): void {
    const table = this.tables.get(method);
    if (!table) {
      // Only reachable from untyped callers; nothing is stored.
      this.logger.error("Unrecognized HTTP method", {
        method,
        path: entry.path,
      });
      return;
    }

    table.add(entry);
    this.logger.debug("Route registered", { method, path: entry.path });
  }
}
