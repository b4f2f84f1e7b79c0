#!/usr/bin/env node
/**
 * Hub Redeployer - Entry point
 */

import { Command } from 'commander';
import { loadConfig, resolveConfigPath } from './config';
import { errorMessage } from './errors';
import { createLogger, logger } from './logger';
import { createServer } from './server';
import { ContainerEngine, createDockerEngine } from './services/engine';
import { ReceiverConfig } from './types';
import { VERSION } from './version';

const program = new Command();

program
  .name('hub-redeployer')
  .description('Redeploys a container when Docker Hub reports a push')
  .version(VERSION)
  .option('-c, --config <path>', 'Path to the JSON configuration file')
  .parse();

const { config: configFlag } = program.opts<{ config?: string }>();

let config: ReceiverConfig;
try {
  const configPath = resolveConfigPath(configFlag);
  config = loadConfig(configPath);
  logger.info('Loaded configuration from %s', configPath);
} catch (err) {
  logger.fatal('Failed to load configuration: %s', errorMessage(err));
  process.exit(1);
}

let engine: ContainerEngine;
try {
  engine = createDockerEngine(createLogger('engine'));
} catch (err) {
  logger.fatal('Failed to create docker client: %s', errorMessage(err));
  process.exit(1);
}

const { start } = createServer({ config, engine });

logger.info('Redeploying container %s from %s:%s', config.container.name, config.container.repository, config.container.tag);
start().catch((err) => {
  logger.fatal('Server failed: %s', errorMessage(err));
  process.exit(1);
});
