/**
 * Web Server.
 * Provides API endpoints for status, cuts, session control and EDL download,
 * plus a WebSocket server for real-time cut streaming.
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import type { Logger } from 'pino';
import type { AppContext } from '../app.js';
import type { WebConfig } from '../core/config/schema.js';
import { createApiRouter } from './api/routes.js';
import { WebSocketHandler } from './ws/handler.js';

// ============================================================================
// Types
// ============================================================================

export interface WebServerOptions {
  config: WebConfig;
  context: AppContext;
  logger: Logger;
}

export interface WebServer {
  app: Express;
  server: Server;
  wsHandler: WebSocketHandler;
  start: () => Promise<void>;
  stop: () => Promise<void>;
  /** Bound port once started; differs from config when port 0 is requested */
  port: () => number | null;
}

// ============================================================================
// Server Factory
// ============================================================================

/**
 * Create and configure the web server.
 * Sets up Express app, HTTP server, and WebSocket handler.
 */
export function createWebServer(options: WebServerOptions): WebServer {
  const { config, context, logger } = options;
  const webLogger = logger.child({ module: 'web' });

  const app = express();

  app.use(express.json());

  // Request logging
  app.use((req: Request, _res: Response, next: NextFunction) => {
    webLogger.debug({ method: req.method, path: req.path }, 'HTTP request');
    next();
  });

  // Basic auth if configured
  if (config.auth?.enabled && config.auth.username && config.auth.password) {
    const expectedAuth = Buffer.from(`${config.auth.username}:${config.auth.password}`).toString('base64');

    app.use((req: Request, res: Response, next: NextFunction) => {
      const authHeader = req.headers.authorization;
      if (authHeader?.startsWith('Basic ') && authHeader.slice(6) === expectedAuth) {
        next();
        return;
      }
      res.setHeader('WWW-Authenticate', 'Basic realm="Live Cut EDL"');
      res.status(401).json({ error: 'Authentication required' });
    });
  }

  app.use('/api', createApiRouter(context));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    webLogger.error({ err }, 'HTTP error');
    res.status(500).json({ error: 'Internal server error' });
  });

  const server = createServer(app);
  const wsHandler = new WebSocketHandler(server, context, webLogger);

  return {
    app,
    server,
    wsHandler,
    start: async () => {
      return new Promise((resolve, reject) => {
        server.once('error', reject);
        server.listen(config.port, config.host, () => {
          server.off('error', reject);
          webLogger.info({ host: config.host, port: boundPort(server) }, 'Web server listening');
          resolve();
        });
      });
    },
    stop: async () => {
      wsHandler.shutdown();
      return new Promise((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
          } else {
            webLogger.info('Web server stopped');
            resolve();
          }
        });
      });
    },
    port: () => boundPort(server),
  };
}

function boundPort(server: Server): number | null {
  const address: AddressInfo | string | null = server.address();
  return address !== null && typeof address === 'object' ? address.port : null;
}
