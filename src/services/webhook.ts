/**
 * Docker Hub webhook payloads - decoding, origin check, callback reply
 */

import { InvalidPayloadError, UntrustedCallbackError, errorMessage } from '../errors';
import { CallbackReply, CallbackSettings, DockerHubWebhook, PushData, RepositoryInfo } from '../types';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function isBoolean(value: unknown): value is boolean {
  return typeof value === 'boolean';
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(isString);
}

// null decodes as absent
function field<T>(
  obj: JsonObject,
  key: string,
  where: string,
  expected: string,
  guard: (value: unknown) => value is T
): T | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!guard(value)) {
    throw new InvalidPayloadError(`${where}.${key} must be ${expected}`, 'body-read');
  }
  return value;
}

function optionalObject(obj: JsonObject, key: string): JsonObject | undefined {
  const value = obj[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isObject(value)) {
    throw new InvalidPayloadError(`${key} must be an object`, 'body-read');
  }
  return value;
}

function readPushData(obj: JsonObject): Partial<PushData> {
  const where = 'push_data';
  return {
    pushed_at: field(obj, 'pushed_at', where, 'an integer', isInteger),
    images: field(obj, 'images', where, 'an array of strings', isStringArray),
    tag: field(obj, 'tag', where, 'a string', isString),
    pusher: field(obj, 'pusher', where, 'a string', isString),
  };
}

function readRepository(obj: JsonObject): Partial<RepositoryInfo> {
  const where = 'repository';
  const text = (key: keyof RepositoryInfo) => field(obj, key, where, 'a string', isString);
  const flag = (key: keyof RepositoryInfo) => field(obj, key, where, 'a boolean', isBoolean);
  const count = (key: keyof RepositoryInfo) => field(obj, key, where, 'an integer', isInteger);
  return {
    status: text('status'),
    description: text('description'),
    is_trusted: flag('is_trusted'),
    full_description: text('full_description'),
    repo_url: text('repo_url'),
    owner: text('owner'),
    is_official: flag('is_official'),
    is_private: flag('is_private'),
    name: text('name'),
    namespace: text('namespace'),
    star_count: count('star_count'),
    comment_count: count('comment_count'),
    date_created: count('date_created'),
    repo_name: text('repo_name'),
  };
}

/**
 * Decode a raw request body into a webhook payload.
 * Throws InvalidPayloadError when the body is not a JSON object of the
 * expected shape, including any known push_data or repository field of the
 * wrong type. A missing callback_url decodes as '' and fails the
 * origin check later.
 */
export function parseWebhook(body: Buffer | string): DockerHubWebhook {
  let parsed: unknown;
  try {
    parsed = JSON.parse(typeof body === 'string' ? body : body.toString('utf-8'));
  } catch (error) {
    throw new InvalidPayloadError(`Invalid JSON body: ${errorMessage(error)}`, 'body-read', error);
  }

  if (!isObject(parsed)) {
    throw new InvalidPayloadError('Webhook body must be a JSON object', 'body-read');
  }

  const callbackUrl = parsed.callback_url ?? '';
  if (typeof callbackUrl !== 'string') {
    throw new InvalidPayloadError('callback_url must be a string', 'body-read');
  }

  const pushData = optionalObject(parsed, 'push_data');
  const repository = optionalObject(parsed, 'repository');

  return {
    callback_url: callbackUrl,
    push_data: pushData && readPushData(pushData),
    repository: repository && readRepository(repository),
  };
}

/**
 * Only Docker Hub hands out callback URLs under the repository's own path
 */
export function assertTrustedCallback(hook: DockerHubWebhook, trustedPrefix: string): void {
  if (!hook.callback_url.startsWith(trustedPrefix)) {
    throw new UntrustedCallbackError(hook.callback_url);
  }
}

/**
 * Build the reply posted to callback_url. Always 'success': the reply
 * doubles as proof of receipt.
 */
export function buildCallbackReply(settings: CallbackSettings): CallbackReply {
  return {
    state: 'success',
    description: settings.description,
    context: settings.context,
    target_url: settings.targetUrl,
  };
}
