#!/usr/bin/env node

/**
 * Process entry for the tracker toggler
 *
 * Usage:
 *   npm start                  start the monitor and the web interface
 *   npm run reenable-all       restore every disabled tracker and exit
 */

import path from 'path';
import config from '../../config';
import { createApp } from './app';
import { ILogger } from '../../domain/interfaces';
import { createTrackerMonitor } from '../../application/createTrackerMonitor';
import { CompositeLogger } from '../../infrastructure/logging/CompositeLogger';
import { ConsoleLogger } from '../../infrastructure/logging/ConsoleLogger';
import { levelFromDebugFlag } from '../../infrastructure/logging/levels';
import { JsonSettingsStore } from '../../infrastructure/settings/JsonSettingsStore';
import { TransmissionRpcClient } from '../../infrastructure/transmission/TransmissionRpcClient';
import { runReenableAll } from '../cli/reenableAll';

// Initialize dependencies
const level = levelFromDebugFlag(config.DEBUG_MODE);
const fileLogger = config.LOG_TO_FILE ? new CompositeLogger(path.join(config.RUNTIME_DIR, 'logs'), { level }) : null;
const logger: ILogger = fileLogger ?? new ConsoleLogger({ level });

const rpcUrl = `http://${config.TR_IP}:${config.TR_PORT}${config.TR_RPC_PATH}`;
const torrentClient = new TransmissionRpcClient(
  {
    url: rpcUrl,
    username: config.TR_USERNAME,
    password: config.TR_PASSWORD,
    timeoutMs: config.RPC_TIMEOUT
  },
  logger
);
const settingsStore = new JsonSettingsStore(config.CONFIG_FILE, config.TARGET_TRACKERS);

const monitor = createTrackerMonitor({
  torrentClient,
  settingsStore,
  logger,
  markerPrefix: config.MARKER_PREFIX,
  intervalSeconds: config.CHECK_INTERVAL
});

async function closeLogger(): Promise<void> {
  if (fileLogger) {
    await fileLogger.close();
  }
}

async function main(): Promise<void> {
  if (process.argv[2] === 'REENABLE_ALL') {
    const code = await runReenableAll(monitor, logger);
    await closeLogger();
    process.exit(code);
  }

  logger.info(`Transmission RPC: ${rpcUrl} (check interval ${config.CHECK_INTERVAL}s)`);
  await monitor.start();

  const app = createApp(monitor, logger);
  const server = app.listen(config.PORT, () => {
    logger.info(`🚀 Tracker toggler running on http://localhost:${config.PORT}`);
  });

  // Process termination handling
  const shutdown = async (): Promise<void> => {
    logger.info('🛑 Stopping server...');
    server.close();
    await monitor.stop();
    logger.info('✅ Monitor stopped');
    await closeLogger();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error('Failed to stop cleanly:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
