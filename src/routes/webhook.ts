/**
 * Docker Hub webhook route - POST /docker-webhook
 *
 * Answers with a bare status code: 200 when the container was redeployed,
 * 400 for unreadable or foreign requests, 500 when the callback or any
 * engine step failed.
 */

import express, { ErrorRequestHandler, Request, Response, Router } from 'express';
import { WebhookError, errorMessage } from '../errors';
import { Logger } from '../logger';
import { CallbackClient } from '../services/callback';
import { RedeployService } from '../services/redeploy';
import { assertTrustedCallback, buildCallbackReply, parseWebhook } from '../services/webhook';
import { CallbackSettings } from '../types';

export const WEBHOOK_PATH = '/docker-webhook';

export interface WebhookRouteOptions {
  trustedCallbackPrefix: string;
  callback: CallbackSettings;
  bodyLimit: string;
  callbackClient: CallbackClient;
  redeployService: RedeployService;
  log: Logger;
}

export function createWebhookRouter(options: WebhookRouteOptions): Router {
  const { trustedCallbackPrefix, callbackClient, redeployService, log } = options;
  const router = Router();

  // Take the body as raw bytes whatever the content type; decoding is ours
  router.use(WEBHOOK_PATH, express.raw({ type: () => true, limit: options.bodyLimit }));

  router.post(WEBHOOK_PATH, async (req: Request, res: Response) => {
    try {
      const body: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const hook = parseWebhook(body);
      assertTrustedCallback(hook, trustedCallbackPrefix);

      log.info(
        { tag: hook.push_data?.tag, pusher: hook.push_data?.pusher },
        'Accepted webhook for %s',
        hook.repository?.repo_name ?? 'unknown repository'
      );

      await callbackClient.acknowledge(hook.callback_url, buildCallbackReply(options.callback));

      // The callback URL answered, so the request really came from Docker Hub
      await redeployService.redeploy();

      res.status(200).end();
    } catch (error: unknown) {
      if (error instanceof WebhookError) {
        if (error.status < 500) {
          log.warn({ stage: error.stage }, error.message);
        } else {
          log.error({ stage: error.stage }, error.message);
        }
        res.status(error.status).end();
        return;
      }
      log.error('Unexpected webhook failure: %s', errorMessage(error));
      res.status(500).end();
    }
  });

  // Body read failures (aborted, too large, bad encoding) reach here
  const onBodyError: ErrorRequestHandler = (err, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    log.warn({ stage: 'received' }, 'Failed to read request body: %s', errorMessage(err));
    res.status(400).end();
  };
  router.use(WEBHOOK_PATH, onBodyError);

  return router;
}
