/**
 * Callback client - posts the acknowledgement back to Docker Hub
 */

import axios, { AxiosInstance } from 'axios';
import { CallbackDeliveryError, WebhookError, errorMessage } from '../errors';
import { Logger } from '../logger';
import { CallbackReply } from '../types';

/**
 * Create the HTTP client used for callbacks. Any response status counts as
 * delivered; only transport errors fail.
 */
export function createCallbackHttp(timeoutMs: number): AxiosInstance {
  return axios.create({
    timeout: timeoutMs,
    headers: {
      'Content-Type': 'application/json',
    },
    validateStatus: () => true,
  });
}

export class CallbackClient {
  constructor(
    private readonly http: AxiosInstance,
    private readonly log: Logger
  ) {}

  /**
   * POST the reply to callbackUrl and return the response status.
   * A working callback URL is what proves the webhook came from Docker Hub.
   */
  async acknowledge(callbackUrl: string, reply: CallbackReply): Promise<number> {
    let body: string;
    try {
      body = JSON.stringify(reply);
    } catch (error) {
      throw new WebhookError(`Failed to encode callback reply: ${errorMessage(error)}`, 500, 'validated', error);
    }

    try {
      const response = await this.http.post(callbackUrl, body);
      this.log.debug('Callback %s answered %d', callbackUrl, response.status);
      return response.status;
    } catch (error) {
      throw new CallbackDeliveryError(`Callback to ${callbackUrl} failed: ${errorMessage(error)}`, error);
    }
  }
}
