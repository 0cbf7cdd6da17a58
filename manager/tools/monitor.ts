#!/usr/bin/env node
/**
 * Server monitor
 * Run from cron: checks the server URL and restarts the server when it stops answering
 *
 * Exit codes: 0 healthy or restarted, 1 restart failed
 */

import fs from 'fs';
import https from 'https';
import path from 'path';
import { spawn } from 'child_process';
import axios from 'axios';
import findProcess from 'find-process';
import winston from 'winston';
import { Command } from 'commander';
import { errorMessage } from '../lib/errors';
import { MS_PER_SECOND, sleep } from '../lib/time';

export interface MonitorOptions {
  url: string;
  logfile: string;
  restartCmd: string;
  quiet: boolean;
  /** Health check timeout in seconds */
  timeout: number;
  verifySsl: boolean;
  debug: boolean;
  processPattern: string;
}

export interface MonitorLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Seams for the process and network side effects */
export interface MonitorDeps {
  logger: MonitorLogger;
  checkHealth: (url: string) => Promise<boolean>;
  findPids: (pattern: string) => Promise<number[]>;
  isAlive: (pid: number) => boolean;
  kill: (pid: number, signal: NodeJS.Signals) => void;
  startCommand: (command: string) => Promise<boolean>;
  sleep: (ms: number) => Promise<void>;
  pid: number;
}

const STOP_WAIT_SECONDS = 10;
const START_GRACE_MS = 2 * MS_PER_SECOND;
const HEALTHY_WAIT_SECONDS = 30;

interface LineInfo {
  level: string;
  message: unknown;
  timestamp?: unknown;
}

/** "[YYYY-MM-DD HH:mm:ss] [LEVEL] message" */
function formatLine({ level, message, timestamp }: LineInfo): string {
  return `[${String(timestamp)}] [${level.toUpperCase()}] ${String(message)}`;
}

function createMonitorLogger(options: Pick<MonitorOptions, 'logfile' | 'quiet' | 'debug'>): winston.Logger {
  const { format, transports } = winston;
  const lineFormat = format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.printf(info => formatLine(info)),
  );
  return winston.createLogger({
    level: options.debug ? 'debug' : 'info',
    format: lineFormat,
    transports: [
      new transports.File({ filename: options.logfile }),
      new transports.Console({ silent: options.quiet, stderrLevels: ['error', 'warn'] }),
    ],
  });
}

/** <logdir>/.<logstem>.lock */
function lockPathFor(logfile: string): string {
  const stem = path.basename(logfile, path.extname(logfile));
  return path.join(path.dirname(logfile), `.${stem}.lock`);
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: exists but owned by someone else
    return hasErrorCode(err, 'EPERM');
  }
}

/** System errors can come from another realm, so match on `code` alone */
function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code;
}

/**
 * Create the lock file exclusively, replacing a stale one
 * @returns false when a live process holds the lock
 */
function acquireLock(lockPath: string, pid: number, isAlive: (pid: number) => boolean = isProcessAlive): boolean {
  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      const fd = fs.openSync(lockPath, 'wx');
      fs.writeSync(fd, String(pid));
      fs.closeSync(fd);
      return true;
    } catch (err) {
      if (!hasErrorCode(err, 'EEXIST')) throw err;
    }

    let content: string;
    try {
      content = fs.readFileSync(lockPath, 'utf8');
    } catch (err) {
      // Holder removed the lock between our open and read
      if (hasErrorCode(err, 'ENOENT')) continue;
      throw err;
    }
    const holder = parseInt(content.trim(), 10);
    if (Number.isInteger(holder) && holder !== pid && isAlive(holder)) {
      return false;
    }
    fs.rmSync(lockPath, { force: true });
  }
  return false;
}

function releaseLock(lockPath: string): void {
  fs.rmSync(lockPath, { force: true });
}

/**
 * GET with redirects followed; 200-399 counts as healthy
 */
async function checkHealth(url: string, timeoutSeconds: number, verifySsl: boolean): Promise<boolean> {
  const response = await axios.get(url, {
    timeout: timeoutSeconds * MS_PER_SECOND,
    maxRedirects: 5,
    validateStatus: () => true,
    httpsAgent: new https.Agent({ rejectUnauthorized: verifySsl }),
  });
  return response.status >= 200 && response.status < 400;
}

/**
 * PIDs of server processes whose command line matches the pattern
 * Skips this process and anything that looks like a monitor
 */
async function findServerPids(pattern: string, ownPid: number): Promise<number[]> {
  const processes = await findProcess('name', pattern);
  return processes
    .filter(proc => proc.pid !== ownPid)
    .filter(proc => (proc.cmd || proc.name).includes(pattern))
    .filter(proc => !(proc.cmd || '').includes('monitor'))
    .map(proc => proc.pid);
}

/**
 * Spawn the restart command detached through the shell
 * @returns false when it exits within the grace period
 */
function startDetached(command: string, graceMs: number = START_GRACE_MS): Promise<boolean> {
  return new Promise(resolve => {
    const child = spawn(command, { shell: true, detached: true, stdio: 'ignore' });
    let exited = false;
    child.once('exit', () => { exited = true; });
    child.once('error', () => { exited = true; });
    child.unref();
    setTimeout(() => resolve(!exited), graceMs);
  });
}

/**
 * SIGTERM, wait up to STOP_WAIT_SECONDS, then SIGKILL survivors
 */
async function stopProcesses(pids: number[], deps: MonitorDeps): Promise<void> {
  const { logger } = deps;
  for (const pid of pids) {
    try {
      deps.kill(pid, 'SIGTERM');
      logger.info(`Sent SIGTERM to process ${pid}`);
    } catch (err) {
      logger.warn(`Could not signal process ${pid}: ${errorMessage(err)}`);
    }
  }

  let remaining = pids.filter(pid => deps.isAlive(pid));
  for (let i = 0; i < STOP_WAIT_SECONDS && remaining.length > 0; i++) {
    await deps.sleep(MS_PER_SECOND);
    remaining = remaining.filter(pid => deps.isAlive(pid));
  }

  for (const pid of remaining) {
    try {
      deps.kill(pid, 'SIGKILL');
      logger.warn(`Process ${pid} did not stop, sent SIGKILL`);
    } catch (err) {
      logger.warn(`Could not kill process ${pid}: ${errorMessage(err)}`);
    }
  }
}

async function safeCheck(url: string, deps: MonitorDeps): Promise<boolean> {
  try {
    return await deps.checkHealth(url);
  } catch (err) {
    deps.logger.debug(`Health check error: ${errorMessage(err)}`);
    return false;
  }
}

async function waitForHealthy(url: string, deps: MonitorDeps): Promise<boolean> {
  for (let i = 0; i < HEALTHY_WAIT_SECONDS; i++) {
    if (await safeCheck(url, deps)) return true;
    await deps.sleep(MS_PER_SECOND);
  }
  return false;
}

/**
 * One check-and-maybe-restart pass
 * @returns Process exit code
 */
async function runMonitor(options: MonitorOptions, deps: MonitorDeps): Promise<number> {
  const { logger } = deps;
  const lockPath = lockPathFor(options.logfile);

  if (!acquireLock(lockPath, deps.pid, deps.isAlive)) {
    if (!options.quiet) {
      console.log('Another monitoring instance is already running, skipping.');
    }
    return 0;
  }

  try {
    logger.debug(`Checking ${options.url}`);
    if (await safeCheck(options.url, deps)) {
      logger.debug('Server is healthy');
      return 0;
    }

    logger.warn(`Server at ${options.url} is not responding, restarting`);

    let pids: number[] = [];
    try {
      pids = await deps.findPids(options.processPattern);
    } catch (err) {
      logger.warn(`Process lookup failed: ${errorMessage(err)}`);
    }
    if (pids.length > 0) {
      logger.info(`Stopping server processes: ${pids.join(', ')}`);
      await stopProcesses(pids, deps);
    } else {
      logger.info('No running server processes found');
    }

    await deps.sleep(START_GRACE_MS);
    logger.info(`Running restart command: ${options.restartCmd}`);
    if (!(await deps.startCommand(options.restartCmd))) {
      logger.error('Restart command exited immediately');
      return 1;
    }

    if (await waitForHealthy(options.url, deps)) {
      logger.info('Server restarted successfully');
      return 0;
    }
    logger.error(`Server did not become healthy within ${HEALTHY_WAIT_SECONDS} seconds`);
    return 1;
  } finally {
    releaseLock(lockPath);
  }
}

function createDefaultDeps(options: MonitorOptions): MonitorDeps {
  return {
    logger: createMonitorLogger(options),
    checkHealth: url => checkHealth(url, options.timeout, options.verifySsl),
    findPids: pattern => findServerPids(pattern, process.pid),
    isAlive: isProcessAlive,
    kill: (pid, signal) => { process.kill(pid, signal); },
    startCommand: command => startDetached(command),
    sleep,
    pid: process.pid,
  };
}

function buildMonitorProgram(): Command {
  return new Command()
    .name('vnc-monitor')
    .description('Check the session manager and restart it when it is down')
    .requiredOption('--url <url>', 'URL to check')
    .requiredOption('--logfile <path>', 'Monitor log file')
    .requiredOption('--restart-cmd <command>', 'Shell command that starts the server')
    .option('--quiet', 'Only write to the log file', false)
    .option('--timeout <seconds>', 'Health check timeout', '10')
    .option('--no-verify-ssl', 'Skip TLS certificate verification')
    .option('--debug', 'Log debug lines', false)
    .option('--process-pattern <pattern>', 'Command line pattern of server processes', 'manager/server');
}

interface RawMonitorOptions {
  url: string;
  logfile: string;
  restartCmd: string;
  quiet: boolean;
  timeout: string;
  verifySsl: boolean;
  debug: boolean;
  processPattern: string;
}

function parseMonitorOptions(argv: string[]): MonitorOptions {
  const raw = buildMonitorProgram().parse(argv).opts<RawMonitorOptions>();
  const timeout = Number(raw.timeout);
  return {
    ...raw,
    timeout: Number.isFinite(timeout) && timeout > 0 ? timeout : 10,
  };
}

if (require.main === module) {
  const options = parseMonitorOptions(process.argv);
  runMonitor(options, createDefaultDeps(options))
    .then(code => { process.exitCode = code; })
    .catch((err: unknown) => {
      console.error(`Monitor failed: ${errorMessage(err)}`);
      process.exitCode = 1;
    });
}

export {
  runMonitor,
  parseMonitorOptions,
  formatLine,
  lockPathFor,
  acquireLock,
  releaseLock,
  isProcessAlive,
  findServerPids,
  stopProcesses,
  STOP_WAIT_SECONDS,
  HEALTHY_WAIT_SECONDS,
};
