/**
 * Configuration management
 * Centralizes environment variables; site settings live in the JSON files beside this module
 */

import os from 'os';
import path from 'path';

interface AppConfig {
  configDir: string;
  serverConfigFile: string;
  vncConfigFile: string;
  lsfConfigFile: string;
  host: string | undefined;
  port: number | undefined;
  dbPath: string | undefined;
  sessionSecret: string | undefined;
  sessionExpiryHours: number;
  lsfUser: string;
  lsfCommandTimeoutMs: number;
  sshProbeTimeoutMs: number;
  commandHistoryLimit: number;
  serverUrl: string | undefined;
}

function currentUser(): string {
  if (process.env.USER) return process.env.USER;
  try {
    return os.userInfo().username;
  } catch {
    return 'unknown';
  }
}

// The trailing || fallback handles NaN from non-numeric values
function envInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  return parseInt(raw, 10) || fallback;
}

function envPort(): number | undefined {
  const port = envInt('PORT', 0);
  return port > 0 ? port : undefined;
}

/**
 * Build configuration from the environment
 * Exposed for tests that change process.env between cases.
 */
function loadConfig(): AppConfig {
  const configDir = process.env.VNC_CONFIG_DIR || __dirname;
  return {
    configDir,
    serverConfigFile: process.env.VNC_SERVER_CONFIG_FILE || path.join(configDir, 'server_config.json'),
    vncConfigFile: process.env.VNC_VNC_CONFIG_FILE || path.join(configDir, 'vnc_config.json'),
    lsfConfigFile: process.env.VNC_LSF_CONFIG_FILE || path.join(configDir, 'lsf_config.json'),
    host: process.env.HOST || undefined,
    port: envPort(),
    dbPath: process.env.DB_PATH || undefined,
    // Required whenever authentication is enabled, see assertSessionSecret()
    sessionSecret: process.env.SESSION_SECRET || undefined,
    sessionExpiryHours: envInt('SESSION_EXPIRY_HOURS', 8),
    lsfUser: process.env.LSF_USER || currentUser(),
    lsfCommandTimeoutMs: envInt('LSF_COMMAND_TIMEOUT_MS', 30000),
    sshProbeTimeoutMs: envInt('SSH_PROBE_TIMEOUT_MS', 10000),
    commandHistoryLimit: envInt('COMMAND_HISTORY_LIMIT', 100),
    serverUrl: process.env.VNC_SERVER_URL || undefined,
  };
}

const config: AppConfig = loadConfig();

/**
 * Fail fast: cookie signing needs a strong secret once logins are possible.
 * Skipped under NODE_ENV=test so unit tests can set their own.
 * @returns The secret
 */
function assertSessionSecret(appConfig: AppConfig = config): string {
  const secret = appConfig.sessionSecret;
  if (process.env.NODE_ENV === 'test') {
    return secret || 'test-secret';
  }
  if (!secret) {
    throw new Error('SESSION_SECRET environment variable is required when authentication is enabled');
  }
  if (secret.length < 32) {
    throw new Error('SESSION_SECRET must be at least 32 characters');
  }
  return secret;
}

export type { AppConfig };
export { config, loadConfig, assertSessionSecret };
