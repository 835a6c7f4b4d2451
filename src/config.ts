/**
 * Configuration for the tracker toggler, read once from the environment
 */

import path from 'path';

export interface Config {
  PORT: number;
  // Transmission RPC endpoint
  TR_IP: string;
  TR_PORT: number;
  TR_USERNAME: string | undefined;
  TR_PASSWORD: string | undefined;
  TR_RPC_PATH: string;
  RPC_TIMEOUT: number; // Per-request timeout in milliseconds
  CHECK_INTERVAL: number; // Seconds between evaluation passes
  // JSON file holding the settings edited from the web interface
  CONFIG_FILE: string;
  // Seeds target_trackers when CONFIG_FILE is created for the first time
  TARGET_TRACKERS: readonly string[];
  MARKER_PREFIX: string;
  DEBUG_MODE: boolean;
  // Runtime directory for log files
  RUNTIME_DIR: string;
  LOG_TO_FILE: boolean;
}

function isTruthy(value: string | undefined): boolean {
  return ['true', '1', 't'].includes((value ?? '').toLowerCase());
}

function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    // Server configuration
    PORT: Number(env.PORT) || 8080,

    // Transmission connection
    TR_IP: env.TR_IP || 'localhost',
    TR_PORT: Number(env.TR_PORT) || 9091,
    TR_USERNAME: env.TR_USERNAME || undefined,
    TR_PASSWORD: env.TR_PASSWORD || undefined,
    TR_RPC_PATH: env.TR_RPC_PATH || '/transmission/rpc',
    RPC_TIMEOUT: Number(env.RPC_TIMEOUT) || 10000, // 10 seconds

    // Polling
    CHECK_INTERVAL: Number(env.CHECK_INTERVAL) || 60,

    // Settings file
    CONFIG_FILE: env.CONFIG_FILE || '/data/config.json',
    TARGET_TRACKERS: splitList(env.TARGET_TRACKERS),
    MARKER_PREFIX: env.MARKER_PREFIX || 'disabled-',

    // Logging
    DEBUG_MODE: isTruthy(env.DEBUG_MODE),
    RUNTIME_DIR: env.RUNTIME_DIR || path.join(process.cwd(), '.runtime'),
    LOG_TO_FILE: env.LOG_TO_FILE === undefined ? true : isTruthy(env.LOG_TO_FILE)
  };
}

const config: Config = loadConfig();

export default config;
