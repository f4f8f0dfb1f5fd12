import type { RequestHandler } from 'express';

export const HTTP_METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const;
export type HttpMethod = (typeof HTTP_METHODS)[number];

/**
 * Binding of (method, path) to handler logic. Several handlers run in order,
 * Express-style, each calling `next()` to pass control on.
 */
export interface Route {
  readonly method: HttpMethod;
  readonly path: string;
  readonly handler: RequestHandler | RequestHandler[];
}

export class DuplicateRouteError extends Error {
  constructor(method: string, path: string) {
    super(`Route ${method} ${path} is already registered`);
    this.name = 'DuplicateRouteError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class RouteTableSealedError extends Error {
  constructor(method: string, path: string) {
    super(`Cannot register ${method} ${path}: routes are fixed once the server starts`);
    this.name = 'RouteTableSealedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function routeKey(method: string, path: string): string {
  return `${method.toUpperCase()} ${path}`;
}

/**
 * Exact-match (method, path) lookup, filled during startup and read-only after `seal()`.
 */
export class RouteTable {
  private readonly entries = new Map<string, Route>();
  private sealed = false;

  register(route: Route): void {
    if (this.sealed) {
      throw new RouteTableSealedError(route.method, route.path);
    }
    const key = routeKey(route.method, route.path);
    if (this.entries.has(key)) {
      throw new DuplicateRouteError(route.method, route.path);
    }
    this.entries.set(key, route);
  }

  seal(): void {
    this.sealed = true;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  /**
   * Route registered for this method and path, or null when there is none.
   * The method is matched case-insensitively, the path exactly.
   */
  dispatch(method: string, path: string): Route | null {
    return this.entries.get(routeKey(method, path)) ?? null;
  }

  routes(): Route[] {
    return [...this.entries.values()];
  }
}
