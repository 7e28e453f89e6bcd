import type { Action } from "~/types.ts";

/**
 * A registered route. Frozen on construction.
 */
export class RouteEntry<
  TController extends object = object,
  TRequest = unknown,
  TResponse = unknown,
> {
  constructor(
    readonly path: string,
    readonly controller: TController,
    readonly action: Action<TRequest, TResponse>,
  ) {
    Object.freeze(this);
  }
}

/**
 * Read side of a route table, as handed out by the router.
 */
export interface ReadonlyRouteTable<
  TController extends object = object,
  TRequest = unknown,
  TResponse = unknown,
> extends Iterable<RouteEntry<TController, TRequest, TResponse>> {
  readonly size: number;
  at(index: number): RouteEntry<TController, TRequest, TResponse> | undefined;
  /**
   * Snapshot of the entries. Later registrations do not show up in it.
   */
  entries(): readonly RouteEntry<TController, TRequest, TResponse>[];
  /**
   * Entries bound to the given controller, compared by identity.
   */
  forController(
    controller: TController,
  ): RouteEntry<TController, TRequest, TResponse>[];
}

/**
 * Routes registered under one HTTP method, in registration order.
 *
 * Duplicate paths are kept; which one wins is up to the dispatcher.
 * Only the router holds the table itself; everyone else gets the view
 * from {@link RouteTable.asReadonly}, which has no `add`.
 */
export class RouteTable<
  TController extends object = object,
  TRequest = unknown,
  TResponse = unknown,
> implements ReadonlyRouteTable<TController, TRequest, TResponse> {
  private readonly list: RouteEntry<TController, TRequest, TResponse>[] = [];
  private view?: ReadonlyRouteTable<TController, TRequest, TResponse>;

  add(entry: RouteEntry<TController, TRequest, TResponse>): void {
    this.list.push(entry);
  }

  get size(): number {
    return this.list.length;
  }

  at(index: number): RouteEntry<TController, TRequest, TResponse> | undefined {
    return this.list.at(index);
  }

  entries(): readonly RouteEntry<TController, TRequest, TResponse>[] {
    return [...this.list];
  }

  forController(
    controller: TController,
  ): RouteEntry<TController, TRequest, TResponse>[] {
    return this.list.filter((entry) => entry.controller === controller);
  }

  [Symbol.iterator](): Iterator<RouteEntry<TController, TRequest, TResponse>> {
    return this.list[Symbol.iterator]();
  }

  /**
   * Frozen view that follows the table as it grows.
   */
  asReadonly(): ReadonlyRouteTable<TController, TRequest, TResponse> {
    if (!this.view) {
      const list = this.list;
      this.view = Object.freeze({
        get size() {
          return list.length;
        },
        at: (index: number) => this.at(index),
        entries: () => this.entries(),
        forController: (controller: TController) =>
          this.forController(controller),
        [Symbol.iterator]: () => this[Symbol.iterator](),
      });
    }
    return this.view;
  }
}
