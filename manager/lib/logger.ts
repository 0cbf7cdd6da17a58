/**
 * Structured logging with winston
 * One logger for the server, CLI and tools, with per-component debug switches
 */

import path from 'path';
import winston from 'winston';

const { format, transports } = winston;

// DEBUG_COMPONENTS=lsf,ssh or DEBUG_COMPONENTS=all
const debugComponentsEnv = process.env.DEBUG_COMPONENTS || '';
const debugComponents = new Set(
  debugComponentsEnv.split(',').map(s => s.trim().toLowerCase()).filter(Boolean)
);
const debugAll = debugComponents.has('all');

export interface LogMeta {
  [key: string]: unknown;
}

function toMeta(): LogMeta;
function toMeta(meta: LogMeta): LogMeta;
function toMeta(detail: string): LogMeta;
function toMeta(metaOrString: LogMeta | string): LogMeta;
function toMeta(metaOrString?: LogMeta | string): LogMeta {
  if (typeof metaOrString === 'string') {
    return { detail: metaOrString };
  }
  return metaOrString ?? {};
}

interface TimerResult {
  done: (meta?: LogMeta) => number;
}

const consoleFormat = format.printf(({ level, message, timestamp, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}`;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.errors({ stack: true }),
  ),
  transports: [
    new transports.Console({
      format: consoleFormat,
      silent: process.env.NODE_ENV === 'test' && !process.env.LOG_LEVEL,
    }),
  ],
});

if (process.env.NODE_ENV === 'production' || process.env.LOG_FILE) {
  const logFile = process.env.LOG_FILE || path.join(process.env.LOG_DIR || '/tmp', 'server.log');
  logger.add(new transports.File({
    filename: logFile,
    format: format.json(),
    maxsize: 5 * 1024 * 1024, // 5MB
    maxFiles: 3,
  }));
}

function isDebugEnabled(component: string): boolean {
  return debugAll || debugComponents.has(component.toLowerCase());
}

/** Raise or lower the level at runtime (CLI --debug, server_config "debug") */
function setLogLevel(level: string): void {
  logger.level = level;
}

const log = {
  debug: (msg: string, meta: LogMeta | string = {}): void => { logger.debug(msg, toMeta(meta)); },
  info: (msg: string, meta: LogMeta | string = {}): void => { logger.info(msg, toMeta(meta)); },
  warn: (msg: string, meta: LogMeta | string = {}): void => { logger.warn(msg, toMeta(meta)); },
  error: (msg: string, meta: LogMeta | string = {}): void => { logger.error(msg, toMeta(meta)); },

  // Only logs if DEBUG_COMPONENTS includes this component or 'all'
  // Components: lsf, ssh, db, auth, config, perf
  debugFor: (component: string, msg: string, meta: LogMeta | string = {}): void => {
    if (logger.isLevelEnabled('debug') && isDebugEnabled(component)) {
      logger.debug(`[${component}] ${msg}`, toMeta(meta));
    }
  },

  lsf: (action: string, meta: LogMeta | string = {}): void => { logger.info(`[LSF] ${action}`, toMeta(meta)); },
  job: (action: string, meta: LogMeta | string = {}): void => { logger.info(`[Job] ${action}`, toMeta(meta)); },
  ssh: (action: string, meta: LogMeta | string = {}): void => { logger.debug(`[SSH] ${action}`, toMeta(meta)); },
  api: (action: string, meta: LogMeta | string = {}): void => { logger.info(`[API] ${action}`, toMeta(meta)); },
  auth: (action: string, meta: LogMeta | string = {}): void => { logger.info(`[Auth] ${action}`, toMeta(meta)); },

  // Routine queries; enable with DEBUG_COMPONENTS=db and LOG_LEVEL=debug
  db: (action: string, meta: LogMeta | string = {}): void => {
    if (logger.isLevelEnabled('debug') && isDebugEnabled('db')) {
      logger.debug(`[DB] ${action}`, toMeta(meta));
    }
  },

  // Logins, session create/kill, override edits. Always info.
  audit: (action: string, meta: LogMeta | string = {}): void => {
    logger.info(`[Audit] ${action}`, toMeta(meta));
  },

  // const timer = log.startTimer('bjobs'); ...; timer.done({ jobs: 3 });
  startTimer: (label: string): TimerResult => {
    const start = process.hrtime.bigint();
    return {
      done: (meta: LogMeta = {}): number => {
        const end = process.hrtime.bigint();
        const durationMs = Number(end - start) / 1_000_000;
        if (logger.isLevelEnabled('debug') && isDebugEnabled('perf')) {
          logger.debug(`[Perf] ${label}`, { durationMs: durationMs.toFixed(2), ...meta });
        }
        return durationMs;
      },
    };
  },

  isDebugEnabled,
};

export { logger, log, setLogLevel };
