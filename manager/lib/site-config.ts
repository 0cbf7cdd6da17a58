/**
 * Site configuration
 *
 * Loads server_config.json, vnc_config.json and lsf_config.json (plus the
 * optional ldap/entra files) from the config directory, applies defaults
 * through joi schemas and answers the option queries used by the API and CLI.
 */

import fs from 'fs';
import path from 'path';
import Joi from 'joi';
import { config as appConfig } from '../config';
import { log } from './logger';
import { ConfigError } from './errors';
import type {
  VncConfig, VncDefaults, LsfConfig, LsfDefaults, ServerConfig, PublicServerConfig,
  OsOption, SiteEntry, OverrideFields, UserOptions, AuthMethod,
} from '../types';

export interface SiteConfigPaths {
  configDir: string;
  serverConfigFile: string;
  vncConfigFile: string;
  lsfConfigFile: string;
}

export interface SiteConfigSources {
  server?: unknown;
  vnc?: unknown;
  lsf?: unknown;
  ldap?: Record<string, unknown> | null;
  entra?: Record<string, unknown> | null;
}

const DEFAULT_SITES: SiteEntry[] = [
  { name: 'Toronto', domain: 'yyz' },
  { name: 'Austin', domain: 'aus' },
  { name: 'Bangalore', domain: 'bglr' },
];

const DEFAULT_MEMORY_OPTIONS_GB = [2, 4, 8, 16, 32];

const stringList = Joi.array().items(Joi.string());
const intList = Joi.array().items(Joi.number());

const vncSchema = Joi.object<VncConfig>({
  default_settings: Joi.object<VncDefaults>({
    resolution: Joi.string().default('1920x1080'),
    window_manager: Joi.string().default('gnome'),
    color_depth: Joi.number().integer().valid(8, 16, 24, 32).default(24),
    site: Joi.string().allow('').default('Austin'),
    vncserver_path: Joi.string().default('/usr/bin/vncserver'),
    name_prefix: Joi.string().default('vnc_session'),
    xstartup_path: Joi.string().allow('').default(''),
    use_custom_xstartup: Joi.boolean().default(false),
  }).unknown(true).default(),
  available_window_managers: stringList.default(['gnome', 'kde', 'xfce', 'mate']),
  available_resolutions: stringList.default(['1920x1080', '2560x1440', '1280x1024']),
  enabled_window_managers: stringList,
  enabled_resolutions: stringList,
  window_manager_configs: Joi.object().unknown(true),
}).unknown(true);

interface LsfConfigFile extends Omit<LsfConfig, 'default_settings' | 'memory_options_gb' | 'available_sites'> {
  default_settings: Omit<LsfDefaults, 'memory_gb'> & { memory_gb?: number; memory_mb?: number };
  memory_options_gb?: number[];
  memory_options_mb?: number[];
  available_sites?: unknown;
}

const lsfSchema = Joi.object<LsfConfigFile>({
  default_settings: Joi.object({
    queue: Joi.string().default('interactive'),
    num_cores: Joi.number().integer().min(1).default(2),
    memory_gb: Joi.number().positive(),
    memory_mb: Joi.number().positive(),
    job_name: Joi.string().pattern(/^[A-Za-z0-9_.-]+$/).default('vnc_session'),
    host_filter: Joi.string().allow('').default(''),
  }).unknown(true).default(),
  available_queues: stringList.default(['interactive']),
  memory_options_gb: intList,
  memory_options_mb: intList,
  core_options: intList.default([1, 2, 4, 8]),
  available_sites: Joi.any(),
  os_options: Joi.array().items(Joi.object<OsOption>({
    name: Joi.string().required(),
    select: Joi.string().allow('').required(),
    container: Joi.string(),
  }).unknown(true)).default([]),
  bindpaths: Joi.array().items(Joi.object({
    name: Joi.string().required(),
    paths: stringList.default([]),
  }).unknown(true)).default([]),
  enabled_queues: stringList,
  enabled_memory_options_gb: intList,
  enabled_core_options: intList,
  enabled_os_options: stringList,
}).unknown(true);

const serverSchema = Joi.object<ServerConfig>({
  host: Joi.string().default('localhost'),
  port: Joi.number().integer().min(1).max(65535).default(9143),
  debug: Joi.boolean().default(false),
  timeout: Joi.number().positive().default(30),
  logdir: Joi.string().allow(''),
  datadir: Joi.string().allow(''),
  authentication: Joi.string().valid('ldap', 'entra', '').insensitive().lowercase().default(''),
  managers: stringList.default([]),
  manager_overrides: Joi.object({
    allow_cores_override: Joi.boolean().default(true),
    allow_memory_override: Joi.boolean().default(true),
    allow_window_manager_override: Joi.boolean().default(true),
    allow_queue_override: Joi.boolean().default(true),
    allow_os_override: Joi.boolean().default(true),
  }).unknown(true).default(),
  ssl_cert: Joi.string().allow(''),
  ssl_key: Joi.string().allow(''),
  ssl_ca_chain: Joi.string().allow(''),
}).unknown(true);

function validateSection<T>(schema: Joi.ObjectSchema<T>, raw: unknown, name: string): T {
  const result = schema.validate(raw ?? {}, { abortEarly: false });
  if (result.error) {
    throw new ConfigError(`Invalid ${name}: ${result.error.message}`, {
      file: name,
      problems: result.error.details.map(d => d.message),
    });
  }
  return result.value;
}

function isSiteList(value: unknown): value is SiteEntry[] {
  return Array.isArray(value) && value.every(
    site => typeof site === 'object' && site !== null && typeof site.name === 'string',
  );
}

function normalizeLsf(file: LsfConfigFile): LsfConfig {
  const { memory_gb, memory_mb, ...restDefaults } = file.default_settings;
  const defaults: LsfDefaults = {
    ...restDefaults,
    memory_gb: memory_gb ?? (memory_mb !== undefined ? Math.max(1, Math.floor(memory_mb / 1024)) : 16),
  };

  let memoryOptions = file.memory_options_gb;
  if (!memoryOptions && file.memory_options_mb) {
    memoryOptions = file.memory_options_mb.map(mb => Math.max(1, Math.floor(mb / 1024)));
  }

  let sites: SiteEntry[];
  if (file.available_sites === undefined) {
    sites = [];
  } else if (isSiteList(file.available_sites)) {
    sites = file.available_sites.map(site => ({ name: site.name, domain: site.domain ?? '' }));
  } else {
    log.warn('available_sites has an invalid format in lsf_config.json, using built-in sites');
    sites = DEFAULT_SITES;
  }

  const { memory_options_mb: _mb, ...rest } = file;
  return {
    ...rest,
    default_settings: defaults,
    memory_options_gb: memoryOptions ?? DEFAULT_MEMORY_OPTIONS_GB,
    available_sites: sites,
  };
}

/**
 * Read a JSON file, or null when it does not exist
 * @throws ConfigError on unreadable file or invalid JSON
 */
function readJsonFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    return null;
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Invalid JSON in configuration file ${path.basename(filePath)}`, {
      file: filePath,
      error: err instanceof Error ? err.message : String(err),
    });
  }
}

function readObjectFile(filePath: string): Record<string, unknown> | null {
  const raw = readJsonFile(filePath);
  if (raw === null) return null;
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Configuration file ${path.basename(filePath)} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(raw));
}

class SiteConfig {
  readonly vnc: VncConfig;
  readonly lsf: LsfConfig;
  readonly server: ServerConfig;
  readonly ldapFile: Record<string, unknown> | null;
  readonly entraFile: Record<string, unknown> | null;

  constructor(sources: SiteConfigSources = {}) {
    this.vnc = validateSection(vncSchema, sources.vnc, 'vnc_config.json');
    this.lsf = normalizeLsf(validateSection(lsfSchema, sources.lsf, 'lsf_config.json'));
    this.server = validateSection(serverSchema, sources.server, 'server_config.json');
    this.ldapFile = sources.ldap ?? null;
    this.entraFile = sources.entra ?? null;
  }

  /**
   * Load every file from disk. Missing core files fall back to built-in defaults.
   */
  static load(paths: SiteConfigPaths = appConfig): SiteConfig {
    const files: Array<['server' | 'vnc' | 'lsf', string]> = [
      ['server', paths.serverConfigFile],
      ['vnc', paths.vncConfigFile],
      ['lsf', paths.lsfConfigFile],
    ];
    const sources: SiteConfigSources = {};
    for (const [key, file] of files) {
      const raw = readJsonFile(file);
      if (raw === null) {
        log.warn(`Configuration file not found, using defaults`, { file });
        continue;
      }
      sources[key] = raw;
      log.debugFor('config', `Loaded ${path.basename(file)}`, { file });
    }
    sources.ldap = readObjectFile(path.join(paths.configDir, 'ldap_config.json'));
    sources.entra = readObjectFile(path.join(paths.configDir, 'entra_config.json'));
    return new SiteConfig(sources);
  }

  // ---------------------------------------------------------------- VNC

  getVncDefaults(): VncDefaults {
    return { ...this.vnc.default_settings };
  }

  getAvailableWindowManagers(): string[] {
    return this.vnc.available_window_managers;
  }

  getAvailableResolutions(): string[] {
    return this.vnc.available_resolutions;
  }

  getEnabledWindowManagers(): string[] {
    return this.vnc.enabled_window_managers ?? this.vnc.available_window_managers;
  }

  getEnabledResolutions(): string[] {
    return this.vnc.enabled_resolutions ?? this.vnc.available_resolutions;
  }

  // ---------------------------------------------------------------- LSF

  getLsfDefaults(): LsfDefaults {
    return { ...this.lsf.default_settings };
  }

  getAvailableSites(): string[] {
    return this.lsf.available_sites.map(site => site.name);
  }

  /** Domain for a site; built-in mapping when the site is not configured */
  getSiteDomain(siteName: string): string | null {
    const site = this.lsf.available_sites.find(s => s.name === siteName);
    if (site && site.domain) return site.domain;
    return DEFAULT_SITES.find(s => s.name === siteName)?.domain ?? null;
  }

  getAvailableQueues(): string[] {
    return this.lsf.available_queues;
  }

  getEnabledQueues(): string[] {
    return this.lsf.enabled_queues ?? this.lsf.available_queues;
  }

  getMemoryOptions(): number[] {
    return this.lsf.memory_options_gb;
  }

  getCoreOptions(): number[] {
    return this.lsf.core_options;
  }

  getOsOptions(): OsOption[] {
    return this.lsf.os_options;
  }

  getOsOption(name: string): OsOption | null {
    return this.lsf.os_options.find(os => os.name === name) ?? null;
  }

  getBindpaths(name: string): string[] | null {
    return this.lsf.bindpaths.find(set => set.name === name)?.paths ?? null;
  }

  getEnabledMemoryOptions(): number[] {
    return this.lsf.enabled_memory_options_gb ?? this.lsf.memory_options_gb;
  }

  getEnabledCoreOptions(): number[] {
    return this.lsf.enabled_core_options ?? this.lsf.core_options;
  }

  /** Enabled OS options; an absent or empty enabled list means all */
  getEnabledOsOptions(): OsOption[] {
    const enabled = this.lsf.enabled_os_options;
    if (!enabled || enabled.length === 0) return this.lsf.os_options;
    return this.lsf.os_options.filter(os => enabled.includes(os.name));
  }

  /**
   * Options a user may pick from. Each non-null override field replaces
   * the globally enabled list; OS names that no longer exist are dropped.
   */
  getUserSpecificOptions(username: string, override?: OverrideFields | null): UserOptions {
    log.debugFor('config', 'Resolving user options', { username, hasOverride: Boolean(override) });
    const osNames = override?.os_options ?? null;
    return {
      cores: override?.cores ?? this.getEnabledCoreOptions(),
      memory: override?.memory ?? this.getEnabledMemoryOptions(),
      window_managers: override?.window_managers ?? this.getEnabledWindowManagers(),
      queues: override?.queues ?? this.getEnabledQueues(),
      os_options: osNames
        ? this.lsf.os_options.filter(os => osNames.includes(os.name))
        : this.getEnabledOsOptions(),
    };
  }

  // ---------------------------------------------------------------- Server

  authMethod(): AuthMethod {
    return this.server.authentication;
  }

  isAuthEnabled(): boolean {
    return this.server.authentication === 'ldap' || this.server.authentication === 'entra';
  }

  isManager(username: string | null | undefined): boolean {
    if (!username) return false;
    return this.server.managers.includes(username);
  }

  isSslEnabled(): boolean {
    return Boolean(this.server.ssl_cert && this.server.ssl_key);
  }

  toPublicServerConfig(): PublicServerConfig {
    const { ssl_cert: _cert, ssl_key: _key, ssl_ca_chain: _ca, ...rest } = this.server;
    return { ...rest, auth_enabled: this.isAuthEnabled(), ssl_enabled: this.isSslEnabled() };
  }
}

export { SiteConfig, DEFAULT_SITES, readJsonFile };
