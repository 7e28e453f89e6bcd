/**
 * Type definitions for the router module.
 */

/**
 * HTTP methods a router keeps a route table for.
 */
export type HttpMethod =
  | "GET"
  | "POST"
  | "PUT"
  | "PATCH"
  | "DELETE"
  | "OPTIONS";

/**
 * Request handler stored on a route.
 *
 * The router never calls it; the dispatcher invokes it with the transport
 * request and response handles.
 */
export type Action<TRequest = unknown, TResponse = unknown> = (
  request: TRequest,
  response: TResponse,
) => unknown;

/**
 * Route entry paired with the method it was registered under.
 */
export interface RegisteredRoute<
  TController extends object = object,
  TRequest = unknown,
  TResponse = unknown,
> {
  method: HttpMethod;
  path: string;
  controller: TController;
  action: Action<TRequest, TResponse>;
}
