#!/usr/bin/env node
/**
 * Collector entry point
 *
 * Usage: beacon-collector [config.json]
 */

import { config as loadEnv } from 'dotenv';

// .env before anything reads process.env
loadEnv();

import { AdapterUnavailableError, createTransport } from '../ble-bridge';
import { CollectorConfig, ConfigError, loadConfig, resolveConfigPath } from '../config';
import { InfluxSink } from '../export-pipeline';
import { createLogger, getLogFilePath } from '../shared/logger';
import { Collector } from './Collector';

const logger = createLogger('Main');

async function main(): Promise<number> {
  const configPath = resolveConfigPath();

  let config: CollectorConfig;
  try {
    config = loadConfig(configPath);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message);
      return 1;
    }
    throw error;
  }

  logger.info(`Configuration: ${configPath}`);
  logger.info(`Log file: ${getLogFilePath()}`);

  const transport = await createTransport(config.transport, {
    simulatedAddresses: Object.values(config.devices),
  });
  const sink = new InfluxSink({ url: config.sink.url, token: config.sink.token, org: config.sink.org });
  const collector = new Collector(transport, sink, {
    devices: config.devices,
    discovery: config.discovery,
    polling: config.polling,
    export: { bucket: config.sink.bucket, measurement: config.sink.measurement },
    statusEvery: config.statusEvery,
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      logger.warn(`${signal} again; exiting immediately`);
      process.exit(1);
    }
    shuttingDown = true;
    logger.info(`${signal} received`);

    collector
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  try {
    const report = await collector.start();
    logger.info(
      `Collecting: ${report.complete ? 'all devices subscribed' : `${report.unavailable.length} device(s) unavailable`}`
    );
  } catch (error) {
    if (error instanceof AdapterUnavailableError) {
      logger.error(error.message);
      await collector.stop();
      return 1;
    }
    throw error;
  }

  return 0;
}

process.on('unhandledRejection', error => {
  logger.error('Unhandled promise rejection:', error);
});

main()
  .then(code => {
    if (code !== 0) process.exit(code);
  })
  .catch((error: unknown) => {
    logger.error('Fatal error:', error);
    process.exit(1);
  });
