/**
 * HTTP server - webhook route and health check
 */

import express, { Request, Response } from 'express';
import { Server } from 'http';
import { AxiosInstance } from 'axios';
import { logger, Logger } from './logger';
import { createWebhookRouter } from './routes/webhook';
import { CallbackClient, createCallbackHttp } from './services/callback';
import { ContainerEngine } from './services/engine';
import { RedeployService } from './services/redeploy';
import { ReceiverConfig } from './types';

export interface ServerOptions {
  config: ReceiverConfig;
  engine: ContainerEngine;
  log?: Logger;
  // Replaces the callback HTTP client, e.g. with a mocked one
  callbackHttp?: AxiosInstance;
}

export function createServer(options: ServerOptions) {
  const { config, engine } = options;
  const log = options.log ?? logger;

  const callbackClient = new CallbackClient(
    options.callbackHttp ?? createCallbackHttp(config.callback.timeoutMs),
    log.child({ module: 'callback' })
  );
  const redeployService = new RedeployService(
    engine,
    { container: config.container, rollback: config.rollback },
    log.child({ module: 'redeploy' })
  );

  const app = express();
  app.disable('x-powered-by');

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(
    createWebhookRouter({
      trustedCallbackPrefix: config.trustedCallbackPrefix,
      callback: config.callback,
      bodyLimit: config.bodyLimit,
      callbackClient,
      redeployService,
      log: log.child({ module: 'webhook' }),
    })
  );

  /**
   * Listen on the configured address; rejects if the port cannot be bound
   */
  function start(): Promise<Server> {
    const { host, port } = config.listen;
    return new Promise((resolve, reject) => {
      const server = app.listen(port, host);
      server.once('error', reject);
      server.once('listening', () => {
        server.off('error', reject);
        log.info(`Serving on http://${host}:${port}`);
        resolve(server);
      });
    });
  }

  return { app, start };
}
