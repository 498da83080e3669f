#!/usr/bin/env node
import { Command } from 'commander';
import { loadConfig, loadEnvFile, redactConfig } from './config';
import { MetricsController } from './controllers/metrics.controller';
import { ConfigError } from './lib/errors';
import logger, { configureLogger } from './lib/logger';
import { buildServer } from './services/http-server';
import { PbsApi } from './services/pbs-api';

const pkg = require('../package.json') as { version?: string };

async function start(configPath?: string): Promise<void> {
  if (configPath && !loadEnvFile(configPath)) {
    logger.warn('Config file not found, using environment only', { path: configPath });
  }

  const config = loadConfig();
  configureLogger({ level: config.exporter.logLevel, json: config.exporter.logJson });

  logger.info('Starting PBS Exporter', { version: pkg.version ?? 'unknown' });
  logger.info(`PBS endpoint: ${config.pbs.endpoint}`);
  logger.info(`Listen address: ${config.exporter.listenAddress}`);
  logger.debug('Effective configuration', { config: redactConfig(config) });

  const pbsApi = new PbsApi({
    baseUrl: config.pbs.endpoint,
    tokenId: config.pbs.tokenId,
    tokenSecret: config.pbs.tokenSecret,
    verifyTls: config.pbs.verifyTls,
    timeoutSeconds: config.pbs.timeoutSeconds,
  });

  const metrics = new MetricsController(pbsApi, {
    snapshotHistoryLimit: config.pbs.snapshotHistoryLimit,
    taskLimit: config.pbs.taskLimit,
  });

  const server = buildServer({ metrics });
  await server.listen({ host: config.exporter.host, port: config.exporter.port });
  logger.info(`Serving metrics on ${config.exporter.listenAddress}`);

  const shutdown = () => {
    logger.info('Shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('Failed to close HTTP server', { err });
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

const program = new Command()
  .name('pbs-exporter')
  .description('Prometheus metrics exporter for Proxmox Backup Server')
  .version(pkg.version ?? '0.0.0')
  .option('-c, --config <file>', 'dotenv file with PBS_EXPORTER__* settings');

program.parse(process.argv);
const { config: configPath } = program.opts<{ config?: string }>();

start(configPath).catch((err) => {
  if (err instanceof ConfigError) {
    for (const message of err.errors) {
      logger.error(message);
    }
  } else {
    logger.error('Exporter failed', { err });
  }
  process.exit(1);
});
