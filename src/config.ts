/**
 * Configuration loader
 *
 * Reads the receiver configuration from a JSON file, fills in defaults and
 * validates every field. HOST and PORT in the environment override the
 * listen address, the same way the server always honoured them.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from './errors';
import { PortMapping, ReceiverConfig } from './types';

export const DEFAULT_CONFIG_PATH = path.join('config', 'receiver.json');

const DOCKER_HUB_CALLBACK_BASE = 'https://registry.hub.docker.com/u/';

const DEFAULTS = {
  host: '0.0.0.0',
  port: 8080,
  containerName: 'app',
  tag: 'latest',
  ports: [{ containerPort: 443, hostPort: 443 }],
  stopTimeoutSeconds: 5,
  description: 'Redeploy was successful',
  context: 'docker-webhook-receiver',
  callbackTimeoutMs: 30000,
  rollbackTag: 'previous',
  bodyLimit: '1mb',
};

type Env = Record<string, string | undefined>;
type Section = Record<string, unknown>;

function isRecord(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(obj: Section, key: string): Section {
  const value = obj[key];
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigError(`${key} must be an object`);
  }
  return value;
}

function readString(obj: Section, key: string, where: string, fallback?: string): string {
  const value = obj[key];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function readOptionalString(obj: Section, key: string, where: string, fallback: string): string {
  const value = obj[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'string') {
    throw new ConfigError(`${where}.${key} must be a string`);
  }
  return value;
}

function readInt(
  obj: Section,
  key: string,
  where: string,
  fallback: number | undefined,
  min = 0,
  max = Number.MAX_SAFE_INTEGER
): number {
  const value = obj[key];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new ConfigError(`${where}.${key} must be an integer between ${min} and ${max}`);
  }
  return value;
}

function readBoolean(obj: Section, key: string, where: string, fallback: boolean): boolean {
  const value = obj[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigError(`${where}.${key} must be a boolean`);
  }
  return value;
}

function readStringArray(obj: Section, key: string, where: string): string[] {
  const value = obj[key];
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
    throw new ConfigError(`${where}.${key} must be an array of strings`);
  }
  return value.map(String);
}

function readPorts(obj: Section): PortMapping[] {
  const value = obj.ports;
  if (value === undefined) {
    return DEFAULTS.ports.map((p) => ({ ...p }));
  }
  if (!Array.isArray(value)) {
    throw new ConfigError('container.ports must be an array');
  }
  return value.map((entry: unknown, i) => {
    if (!isRecord(entry)) {
      throw new ConfigError(`container.ports[${i}] must be an object`);
    }
    const where = `container.ports[${i}]`;
    return {
      containerPort: readInt(entry, 'containerPort', where, undefined, 1, 65535),
      hostPort: readInt(entry, 'hostPort', where, undefined, 1, 65535),
    };
  });
}

function parsePortEnv(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`PORT must be an integer between 1 and 65535, got "${value}"`);
  }
  return port;
}

/**
 * Trusted prefix for a repository, e.g. https://registry.hub.docker.com/u/acme/web
 */
export function defaultTrustedPrefix(repository: string): string {
  return `${DOCKER_HUB_CALLBACK_BASE}${repository}`;
}

/**
 * Validate a raw configuration object and fill in defaults
 */
export function parseConfig(raw: unknown, env: Env = process.env): ReceiverConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a JSON object');
  }

  const listen = section(raw, 'listen');
  const container = section(raw, 'container');
  const callback = section(raw, 'callback');
  const rollback = section(raw, 'rollback');

  const repository = readString(container, 'repository', 'container');
  const tag = readString(container, 'tag', 'container', DEFAULTS.tag);
  const rollbackEnabled = readBoolean(rollback, 'enabled', 'rollback', true);
  const rollbackTag = readString(rollback, 'tag', 'rollback', DEFAULTS.rollbackTag);
  // Pulling the new image would move the retained tag along with it
  if (rollbackEnabled && rollbackTag === tag) {
    throw new ConfigError(`rollback.tag must differ from container.tag ("${tag}")`);
  }

  return {
    listen: {
      host: env.HOST || readString(listen, 'host', 'listen', DEFAULTS.host),
      port: env.PORT ? parsePortEnv(env.PORT) : readInt(listen, 'port', 'listen', DEFAULTS.port, 1, 65535),
    },
    container: {
      name: readString(container, 'name', 'container', DEFAULTS.containerName),
      repository,
      tag,
      command: readStringArray(container, 'command', 'container'),
      ports: readPorts(container),
      stopTimeoutSeconds: readInt(container, 'stopTimeoutSeconds', 'container', DEFAULTS.stopTimeoutSeconds),
    },
    trustedCallbackPrefix: readString(raw, 'trustedCallbackPrefix', 'config', defaultTrustedPrefix(repository)),
    callback: {
      description: readOptionalString(callback, 'description', 'callback', DEFAULTS.description),
      context: readOptionalString(callback, 'context', 'callback', DEFAULTS.context),
      targetUrl: readOptionalString(callback, 'targetUrl', 'callback', ''),
      timeoutMs: readInt(callback, 'timeoutMs', 'callback', DEFAULTS.callbackTimeoutMs),
    },
    rollback: {
      enabled: rollbackEnabled,
      tag: rollbackTag,
    },
    bodyLimit: readString(raw, 'bodyLimit', 'config', DEFAULTS.bodyLimit),
  };
}

/**
 * Pick the config file: --config flag, then RECEIVER_CONFIG, then the default
 */
export function resolveConfigPath(flag?: string, env: Env = process.env): string {
  return flag || env.RECEIVER_CONFIG || DEFAULT_CONFIG_PATH;
}

/**
 * Load and validate the configuration file
 */
export function loadConfig(configPath: string, env: Env = process.env): ReceiverConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`);
  }

  return parseConfig(raw, env);
}
