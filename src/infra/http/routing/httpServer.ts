import express, { type Application, type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import type { Server } from 'http';
import type { AddressInfo } from 'net';
import type { Logger } from '../../logging/logger.js';
import { createErrorHandler } from '../middleware/errorHandler.js';
import { notFoundHandler } from '../middleware/notFound.js';
import { requestLogger } from '../middleware/requestLogger.js';
import { abortOnDisconnect } from '../middleware/requestSignal.js';
import { RouteTable, type Route } from './routeTable.js';

export const DEFAULT_PORT = 8081;

/**
 * Run a route's handlers in order. `next()` moves to the following handler,
 * `next(err)` or the end of the chain hands control back to Express.
 */
function runHandlers(
  handlers: RequestHandler[],
  req: Request,
  res: Response,
  done: NextFunction
): void {
  let index = 0;
  const next = (err?: unknown): void => {
    if (err === 'route' || err === 'router') {
      done();
      return;
    }
    if (err) {
      done(err);
      return;
    }
    const handler = handlers[index++];
    if (!handler) {
      done();
      return;
    }
    try {
      handler(req, res, next);
    } catch (error) {
      done(error);
    }
  };
  next();
}

/**
 * HTTP server wrapper: register routes, then start.
 *
 * Every server gets the same request logging, disconnect signal, JSON 404
 * and error mapping, whatever routes it carries.
 *
 * @example
 * const srv = new HttpServer('users-api', logger);
 * srv.port = config.server.port;
 * srv.registerRoute(exampleRoute());
 * await srv.start();
 */
export class HttpServer {
  port = DEFAULT_PORT;
  private readonly table = new RouteTable();
  private app: Application | null = null;
  private server: Server | null = null;

  constructor(
    readonly serviceName: string,
    private readonly logger: Logger
  ) {}

  registerRoute(...routes: Route[]): void {
    for (const route of routes) {
      this.table.register(route);
      this.logger.debug({ method: route.method, path: route.path }, 'Route registered');
    }
  }

  routes(): Route[] {
    return this.table.routes();
  }

  /**
   * The Express application serving the registered routes.
   * Building it seals the route table.
   */
  handler(): Application {
    if (this.app) {
      return this.app;
    }
    this.table.seal();

    const app = express();
    app.disable('x-powered-by');
    app.use(requestLogger(this.logger));
    app.use(abortOnDisconnect());
    app.use((req, res, next) => {
      const route = this.table.dispatch(req.method, req.path);
      if (!route) {
        next();
        return;
      }
      const handlers = Array.isArray(route.handler) ? route.handler : [route.handler];
      runHandlers(handlers, req, res, next);
    });
    app.use(notFoundHandler);
    app.use(createErrorHandler(this.logger));

    this.app = app;
    return app;
  }

  /**
   * Listen on `port`. Rejects if the port cannot be bound.
   */
  start(): Promise<AddressInfo> {
    if (this.server) {
      return Promise.reject(new Error(`${this.serviceName} is already started`));
    }
    const app = this.handler();

    return new Promise((resolve, reject) => {
      const server = app.listen(this.port);
      server.once('error', reject);
      server.once('listening', () => {
        server.off('error', reject);
        this.server = server;
        const address = server.address();
        const info: AddressInfo =
          address && typeof address === 'object'
            ? address
            : { address: '::', family: 'IPv6', port: this.port };
        this.logger.info(
          { service: this.serviceName, port: info.port, routes: this.table.routes().length },
          'HTTP server listening'
        );
        resolve(info);
      });
    });
  }

  /**
   * Stop accepting connections and wait for in-flight requests to finish.
   */
  stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return Promise.resolve();
    }
    this.server = null;
    return new Promise((resolve, reject) => {
      server.close((err) => {
        if (err) {
          reject(err);
          return;
        }
        this.logger.info({ service: this.serviceName }, 'HTTP server stopped');
        resolve();
      });
    });
  }
}
