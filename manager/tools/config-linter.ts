#!/usr/bin/env node
/**
 * Configuration linter
 * Checks JSON syntax and cross-field consistency of the files in a config directory
 */

import fs from 'fs';
import path from 'path';
import { Command } from 'commander';
import { errorMessage } from '../lib/errors';

export interface LintReport {
  errors: string[];
  warnings: string[];
  info: string[];
}

type JsonObject = Record<string, unknown>;

const OVERRIDE_KEYS = [
  'allow_cores_override',
  'allow_memory_override',
  'allow_window_manager_override',
  'allow_queue_override',
  'allow_os_override',
];

const RULE = '='.repeat(70);
const SECTION_RULE = '-'.repeat(70);

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function typeName(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

/** Values of `enabled` that are missing from `available` */
function notIn(enabled: unknown, available: unknown): unknown[] {
  if (!Array.isArray(enabled) || !Array.isArray(available)) return [];
  return enabled.filter(value => !available.includes(value));
}

function formatValues(values: unknown[]): string {
  return values.map(value => JSON.stringify(value)).join(', ');
}

/**
 * "line L, col C" from V8's "at position N" message, when present
 */
function describeJsonError(text: string, err: unknown): string {
  const message = errorMessage(err);
  const match = /position (\d+)/.exec(message);
  if (!match) return message;
  const before = text.slice(0, parseInt(match[1], 10));
  const lines = before.split('\n');
  return `line ${lines.length}, col ${lines[lines.length - 1].length + 1}: ${message}`;
}

class ConfigLinter {
  readonly report: LintReport = { errors: [], warnings: [], info: [] };

  private error(file: string, message: string): void {
    this.report.errors.push(`${file}: ${message}`);
  }

  private warn(file: string, message: string): void {
    this.report.warnings.push(`${file}: ${message}`);
  }

  /** Subset check shared by the enabled_* lists */
  private checkSubset(file: string, config: JsonObject, enabledKey: string, availableKey: string, noun = 'values'): void {
    if (!(enabledKey in config) || !(availableKey in config)) return;
    const invalid = notIn(config[enabledKey], config[availableKey]);
    if (invalid.length > 0) {
      this.error(file, `'${enabledKey}' contains ${noun} not in '${availableKey}': ${formatValues(invalid)}`);
    }
  }

  private checkRequired(file: string, config: JsonObject, fields: string[], level: 'error' | 'warning', label: string): void {
    for (const field of fields) {
      if (field in config) continue;
      if (level === 'error') {
        this.error(file, `Missing ${label} '${field}'`);
      } else {
        this.warn(file, `Missing ${label} '${field}'`);
      }
    }
  }

  private checkNonEmptyList(file: string, config: JsonObject, key: string): void {
    if (!(key in config)) return;
    const value = config[key];
    if (!Array.isArray(value)) {
      this.error(file, `'${key}' must be a list`);
    } else if (value.length === 0) {
      this.error(file, `'${key}' cannot be empty`);
    }
  }

  private checkIntegerList(file: string, config: JsonObject, key: string): void {
    if (!(key in config)) return;
    const value = config[key];
    if (!Array.isArray(value)) {
      this.error(file, `'${key}' must be a list`);
    } else if (!value.every(item => Number.isInteger(item))) {
      this.error(file, `'${key}' must contain only integers`);
    }
  }

  private checkObject(file: string, config: JsonObject, key: string): void {
    if (key in config && !isObject(config[key])) {
      this.error(file, `'${key}' must be an object`);
    }
  }

  checkServerConfig(file: string, config: JsonObject): void {
    this.checkRequired(file, config, ['host', 'port', 'datadir', 'logdir', 'managers'], 'warning', 'recommended field');

    if ('managers' in config) {
      const managers = config.managers;
      if (!Array.isArray(managers)) {
        this.error(file, `'managers' must be a list, got ${typeName(managers)}`);
      } else if (managers.length === 0) {
        this.warn(file, `'managers' list is empty`);
      }
    }

    if ('manager_overrides' in config) {
      const overrides = config.manager_overrides;
      if (!isObject(overrides)) {
        this.error(file, `'manager_overrides' must be an object`);
      } else {
        for (const key of OVERRIDE_KEYS) {
          if (!(key in overrides)) {
            this.warn(file, `Missing 'manager_overrides.${key}'`);
          } else if (typeof overrides[key] !== 'boolean') {
            this.error(file, `'manager_overrides.${key}' must be boolean`);
          }
        }
      }
    }

    if ('port' in config && !Number.isInteger(config.port)) {
      this.error(file, `'port' must be integer, got ${typeName(config.port)}`);
    }
  }

  checkLsfConfig(file: string, config: JsonObject): void {
    this.checkRequired(file, config, ['available_queues', 'core_options', 'memory_options_gb', 'os_options'], 'error', 'required field');

    this.checkNonEmptyList(file, config, 'available_queues');
    this.checkSubset(file, config, 'enabled_queues', 'available_queues');

    this.checkIntegerList(file, config, 'core_options');
    this.checkSubset(file, config, 'enabled_core_options', 'core_options');

    this.checkIntegerList(file, config, 'memory_options_gb');
    this.checkSubset(file, config, 'enabled_memory_options_gb', 'memory_options_gb');

    const osNames: string[] = [];
    if ('os_options' in config) {
      const osOptions = config.os_options;
      if (!Array.isArray(osOptions)) {
        this.error(file, `'os_options' must be a list`);
      } else {
        osOptions.forEach((option: unknown, idx: number) => {
          if (!isObject(option)) {
            this.error(file, `'os_options[${idx}]' must be an object`);
            return;
          }
          if (!('name' in option)) {
            this.error(file, `'os_options[${idx}]' missing 'name' field`);
          } else {
            osNames.push(String(option.name));
          }
          if (!('select' in option)) {
            this.error(file, `'os_options[${idx}]' missing 'select' field`);
          }
        });
      }
    }

    if ('enabled_os_options' in config && 'os_options' in config) {
      const invalid = notIn(config.enabled_os_options, osNames);
      if (invalid.length > 0) {
        this.error(file, `'enabled_os_options' contains names not in 'os_options': ${formatValues(invalid)}`);
      }
    }

    if ('default_settings' in config) {
      const defaults = config.default_settings;
      if (!isObject(defaults)) {
        this.error(file, `'default_settings' must be an object`);
      } else if ('queue' in defaults && Array.isArray(config.available_queues)
        && !config.available_queues.includes(defaults.queue)) {
        this.warn(file, `default 'queue' ${JSON.stringify(defaults.queue)} not in available_queues`);
      }
    }
  }

  checkVncConfig(file: string, config: JsonObject): void {
    this.checkRequired(file, config, ['available_window_managers', 'available_resolutions'], 'error', 'required field');

    this.checkNonEmptyList(file, config, 'available_window_managers');
    this.checkSubset(file, config, 'enabled_window_managers', 'available_window_managers');

    this.checkNonEmptyList(file, config, 'available_resolutions');
    this.checkSubset(file, config, 'enabled_resolutions', 'available_resolutions');

    this.checkObject(file, config, 'window_manager_configs');
    this.checkObject(file, config, 'default_settings');
  }

  checkLdapConfig(file: string, config: JsonObject): void {
    this.checkRequired(file, config, ['server', 'base_dn'], 'warning', 'field');
  }

  checkEntraConfig(file: string, config: JsonObject): void {
    this.checkRequired(file, config, ['client_id', 'tenant_id'], 'warning', 'field');
  }

  lintFile(filePath: string): void {
    const file = path.basename(filePath);
    let text = '';
    let parsed: unknown;
    try {
      text = fs.readFileSync(filePath, 'utf8');
    } catch (err) {
      this.error(file, errorMessage(err));
      return;
    }
    try {
      parsed = JSON.parse(text);
    } catch (err) {
      this.error(file, `JSON syntax error at ${describeJsonError(text, err)}`);
      return;
    }

    this.report.info.push(`${file}: Valid JSON syntax`);

    const checks: Record<string, (file: string, config: JsonObject) => void> = {
      'server_config.json': (f, c) => this.checkServerConfig(f, c),
      'lsf_config.json': (f, c) => this.checkLsfConfig(f, c),
      'vnc_config.json': (f, c) => this.checkVncConfig(f, c),
      'ldap_config.json': (f, c) => this.checkLdapConfig(f, c),
      'entra_config.json': (f, c) => this.checkEntraConfig(f, c),
    };
    const check = checks[file];
    if (!check) return;
    if (!isObject(parsed)) {
      this.error(file, `top level must be an object, got ${typeName(parsed)}`);
      return;
    }
    check(file, parsed);
  }
}

/**
 * Lint every *.json file in a directory, in name order
 */
function lintConfigDir(dir: string): LintReport {
  const linter = new ConfigLinter();
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    linter.report.errors.push(`Config directory does not exist: ${dir}`);
    return linter.report;
  }

  const files = fs.readdirSync(dir).filter(name => name.endsWith('.json')).sort();
  if (files.length === 0) {
    linter.report.errors.push(`No JSON files found in ${dir}`);
    return linter.report;
  }

  for (const name of files) {
    linter.lintFile(path.join(dir, name));
  }
  return linter.report;
}

function summarize(report: LintReport): string {
  if (report.errors.length > 0) return `Found ${report.errors.length} error(s)`;
  if (report.warnings.length > 0) return `All critical checks passed (${report.warnings.length} warning(s))`;
  return 'All configuration files are valid!';
}

/**
 * Printable report: non-empty sections, then the summary line
 */
function formatReport(report: LintReport): string[] {
  const lines: string[] = [RULE];
  const sections: Array<[string, string[]]> = [
    ['ERRORS', report.errors],
    ['WARNINGS', report.warnings],
    ['INFO', report.info],
  ];
  for (const [title, items] of sections) {
    if (items.length === 0) continue;
    lines.push('', `${title}:`, SECTION_RULE, ...items.map(item => `  ${item}`));
  }
  lines.push('', RULE, summarize(report));
  return lines;
}

if (require.main === module) {
  const program = new Command()
    .name('vnc-config-lint')
    .description('Validate the JSON configuration files')
    .argument('[config_dir]', 'Configuration directory', path.join(__dirname, '..', 'config'))
    .action((configDir: string) => {
      console.log(`Linting configuration files in: ${configDir}`);
      const report = lintConfigDir(configDir);
      formatReport(report).forEach(line => console.log(line));
      process.exitCode = report.errors.length === 0 ? 0 : 1;
    });
  program.parse(process.argv);
}

export default lintConfigDir;
export { lintConfigDir, formatReport, summarize, ConfigLinter };
