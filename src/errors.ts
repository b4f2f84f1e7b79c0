/**
 * Errors raised while handling a webhook. Each carries the HTTP status
 * the route answers with and the stage the request reached.
 */

import { EngineStep, RedeployStage } from './types';

export class WebhookError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly stage: RedeployStage,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'WebhookError';
  }
}

/**
 * Body could not be read or is not a webhook payload
 */
export class InvalidPayloadError extends WebhookError {
  constructor(message: string, stage: RedeployStage, cause?: unknown) {
    super(message, 400, stage, cause);
    this.name = 'InvalidPayloadError';
  }
}

/**
 * callback_url does not start with the trusted prefix
 */
export class UntrustedCallbackError extends WebhookError {
  constructor(readonly callbackUrl: string) {
    super('Got request not from docker hub', 400, 'parsed');
    this.name = 'UntrustedCallbackError';
  }
}

export class CallbackDeliveryError extends WebhookError {
  constructor(message: string, cause?: unknown) {
    super(message, 500, 'validated', cause);
    this.name = 'CallbackDeliveryError';
  }
}

/**
 * A container engine call failed. stage is the last stage that completed.
 */
export class EngineStepError extends WebhookError {
  constructor(readonly step: EngineStep, stage: RedeployStage, cause: unknown) {
    super(`Engine ${step} failed: ${errorMessage(cause)}`, 500, stage, cause);
    this.name = 'EngineStepError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
