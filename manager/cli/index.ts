#!/usr/bin/env node
/**
 * vnc-manager command line
 * Thin client over the HTTP API; `server start` runs the web server in-process
 */

import { Command } from 'commander';
import { loadConfig } from '../config';
import { SiteConfig } from '../lib/site-config';
import { setLogLevel } from '../lib/logger';
import { VncApiClient, resolveServerUrl, describeApiError } from './client';
import type { CreateSessionBody } from './client';
import type { PublicServerConfig, VncJob } from '../types';

interface GlobalOptions {
  debug?: boolean;
  config_dir?: string;
  server_url?: string;
}

interface CreateOptions {
  name?: string;
  resolution?: string;
  window_manager?: string;
  wm?: string;
  color_depth?: string;
  site?: string;
  queue?: string;
  cores?: string;
  memory?: string;
  os?: string;
}

interface StartOptions {
  host?: string;
  port?: string;
}

export interface CliDeps {
  createClient?: (serverUrl: string) => VncApiClient;
  loadSiteConfig?: () => SiteConfig;
  startServer?: (options: { host?: string; port?: number; siteConfig: SiteConfig }) => void;
  out?: (line: string) => void;
  err?: (line: string) => void;
  setExitCode?: (code: number) => void;
}

const TABLE_COLUMNS: Array<[string, number, (job: VncJob) => string]> = [
  ['Job ID', 10, job => job.job_id],
  ['Name', 20, job => job.name],
  ['User', 10, job => job.user],
  ['Status', 10, job => job.status],
  ['Queue', 15, job => job.queue],
];

const TABLE_RULE = '-'.repeat(65);

/**
 * Lines printed by `list`
 */
function formatSessionTable(jobs: VncJob[]): string[] {
  if (jobs.length === 0) {
    return ['No active VNC sessions found.'];
  }
  const row = (cells: string[]): string =>
    cells.map((cell, i) => cell.padEnd(TABLE_COLUMNS[i][1])).join(' ').trimEnd();
  return [
    row(TABLE_COLUMNS.map(([title]) => title)),
    TABLE_RULE,
    ...jobs.map(job => row(TABLE_COLUMNS.map(([, , pick]) => pick(job)))),
  ];
}

function formatServerInfo(server: PublicServerConfig): string[] {
  return [
    `Host: ${server.host}`,
    `Port: ${server.port}`,
    `Debug: ${server.debug}`,
    `Timeout: ${server.timeout}`,
    `Authentication: ${server.authentication || 'disabled'}`,
  ];
}

function parseInteger(value: string | undefined, label: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${label} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Fill unset create options from the server's defaults
 */
async function buildCreateBody(client: VncApiClient, options: CreateOptions): Promise<CreateSessionBody> {
  const [vnc, lsf] = await Promise.all([client.getVncConfig(), client.getLsfConfig()]);
  const body: CreateSessionBody = {
    name: options.name ?? vnc.defaults.name_prefix,
    resolution: options.resolution ?? vnc.defaults.resolution,
    window_manager: options.window_manager ?? options.wm ?? vnc.defaults.window_manager,
    color_depth: parseInteger(options.color_depth, 'color_depth') ?? vnc.defaults.color_depth,
    queue: options.queue ?? lsf.defaults.queue,
    num_cores: parseInteger(options.cores, 'cores') ?? lsf.defaults.num_cores,
    memory_gb: parseInteger(options.memory, 'memory') ?? lsf.defaults.memory_gb,
  };
  const site = options.site ?? vnc.defaults.site;
  if (site) body.site = site;
  if (options.os) body.os = options.os;
  return body;
}

function buildProgram(deps: CliDeps = {}): Command {
  const out = deps.out ?? ((line: string) => console.log(line));
  const err = deps.err ?? ((line: string) => console.error(line));
  const setExitCode = deps.setExitCode ?? ((code: number) => { process.exitCode = code; });
  const program = new Command();

  let siteConfig: SiteConfig | null = null;
  const getSiteConfig = (): SiteConfig => {
    if (!siteConfig) {
      siteConfig = deps.loadSiteConfig ? deps.loadSiteConfig() : SiteConfig.load(loadConfig());
    }
    return siteConfig;
  };

  const getClient = (): VncApiClient => {
    const { server_url: serverUrl } = program.opts<GlobalOptions>();
    const url = resolveServerUrl(getSiteConfig(), serverUrl);
    return deps.createClient ? deps.createClient(url) : new VncApiClient(url);
  };

  // Every command reports failures the same way and exits 1
  const run = (action: string, fn: () => Promise<void>) => async (): Promise<void> => {
    try {
      await fn();
    } catch (e) {
      err(`Error ${action}: ${describeApiError(e)}`);
      setExitCode(1);
    }
  };

  program
    .name('vnc-manager')
    .description('Manage VNC sessions running as LSF jobs')
    .option('--debug', 'Enable debug logging')
    .option('--config_dir <dir>', 'Directory holding the JSON configuration files')
    .option('--server_url <url>', 'Base URL of the session manager server')
    .hook('preAction', () => {
      const opts = program.opts<GlobalOptions>();
      if (opts.debug) setLogLevel('debug');
      if (opts.config_dir) process.env.VNC_CONFIG_DIR = opts.config_dir;
    });

  program
    .command('list')
    .description('List active VNC sessions')
    .action(run('listing VNC sessions', async () => {
      const jobs = await getClient().listSessions();
      formatSessionTable(jobs).forEach(line => out(line));
    }));

  program
    .command('create')
    .description('Submit a new VNC session')
    .option('--name <name>', 'Session name')
    .option('--resolution <resolution>', 'Screen resolution, e.g. 1920x1080')
    .option('--window_manager <wm>', 'Window manager')
    .option('--wm <wm>', 'Alias for --window_manager')
    .option('--color_depth <depth>', 'Color depth in bits')
    .option('--site <site>', 'Site')
    .option('--queue <queue>', 'LSF queue')
    .option('--cores <n>', 'Number of cores')
    .option('--memory <gb>', 'Memory in GB')
    .option('--os <name>', 'OS option')
    .action((options: CreateOptions) => run('creating VNC session', async () => {
      const client = getClient();
      const body = await buildCreateBody(client, options);
      const result = await client.createSession(body);
      if (!result.success) {
        throw new Error(result.message);
      }
      out(`VNC session created successfully. Job ID: ${result.job_id ?? 'unknown'}`);
    })());

  program
    .command('kill')
    .description('Kill a VNC session')
    .argument('<job_id>', 'LSF job ID')
    .action((jobId: string) => run('killing VNC session', async () => {
      const result = await getClient().killSession(jobId);
      if (result.success) {
        out(`VNC session ${jobId} killed successfully.`);
      } else {
        err(`Failed to kill VNC session ${jobId}.`);
        setExitCode(1);
      }
    })());

  const server = program.command('server').description('Server information and control');

  server
    .command('info')
    .description('Show server configuration')
    .action(run('getting server info', async () => {
      const info = await getClient().getServerConfig();
      formatServerInfo(info).forEach(line => out(line));
    }));

  server
    .command('start')
    .description('Start the web server in this process')
    .option('--host <host>', 'Listen address')
    .option('--port <port>', 'Listen port')
    .action((options: StartOptions) => run('starting server', async () => {
      const start = deps.startServer ?? (await import('../server')).startServer;
      start({
        host: options.host,
        port: parseInteger(options.port, 'port'),
        siteConfig: getSiteConfig(),
      });
    })());

  return program;
}

if (require.main === module) {
  buildProgram().parseAsync(process.argv).catch((e: unknown) => {
    console.error(`Error: ${describeApiError(e)}`);
    process.exit(1);
  });
}

export default buildProgram;
export { buildProgram, buildCreateBody, formatSessionTable, formatServerInfo };
