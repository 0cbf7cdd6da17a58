/**
 * LDAP/AD Authentication
 *
 * Settings come from ldap_config.json, with LDAP_* environment variables
 * taking precedence. With no server configured, TEST_USERNAME/TEST_PASSWORD
 * enable a local dev login.
 */

import crypto from 'crypto';
import { Client, InvalidCredentialsError } from 'ldapts';
import { log } from '../logger';
import { errorMessage } from '../errors';
import type { AuthResult, AuthUser } from '../../types';

export interface LdapConfig {
  /** Comma-separated URLs, tried in order */
  server: string;
  domain: string;
  base_dn: string;
  user_filter: string;
  attr_username: string;
  attr_display_name: string;
  attr_email: string;
  attr_groups: string;
  admin_binddn: string;
  admin_password: string;
}

export interface LdapDiagnosticResult {
  server: string;
  connected: boolean;
  bound: boolean;
  searched: boolean;
  error?: string;
  durationMs: number;
}

type AttributeValue = Buffer | Buffer[] | string[] | string;

const CONNECT_TIMEOUT_MS = 5000;

const DEFAULTS: LdapConfig = {
  server: '',
  domain: '',
  base_dn: '',
  user_filter: '(sAMAccountName=%s)',
  attr_username: 'sAMAccountName',
  attr_display_name: 'displayName',
  attr_email: 'mail',
  attr_groups: 'memberOf',
  admin_binddn: '',
  admin_password: '',
};

const ENV_KEYS: Record<keyof LdapConfig, string> = {
  server: 'LDAP_SERVER',
  domain: 'LDAP_DOMAIN',
  base_dn: 'LDAP_BASE_DN',
  user_filter: 'LDAP_USER_FILTER',
  attr_username: 'LDAP_ATTR_USERNAME',
  attr_display_name: 'LDAP_ATTR_DISPLAY_NAME',
  attr_email: 'LDAP_ATTR_EMAIL',
  attr_groups: 'LDAP_ATTR_GROUPS',
  admin_binddn: 'LDAP_ADMIN_BINDDN',
  admin_password: 'LDAP_ADMIN_PASSWORD',
};

function isConfigKey(key: string): key is keyof LdapConfig {
  return Object.prototype.hasOwnProperty.call(DEFAULTS, key);
}

/**
 * Merge defaults, the config file and the environment
 */
function resolveLdapConfig(file: Record<string, unknown> | null = null, env: NodeJS.ProcessEnv = process.env): LdapConfig {
  const merged: LdapConfig = { ...DEFAULTS };
  for (const [key, value] of Object.entries(file ?? {})) {
    if (isConfigKey(key) && typeof value === 'string') merged[key] = value;
  }
  for (const key of Object.keys(ENV_KEYS)) {
    if (!isConfigKey(key)) continue;
    const value = env[ENV_KEYS[key]];
    if (value) merged[key] = value;
  }
  return merged;
}

function serverList(ldapConfig: LdapConfig): string[] {
  return ldapConfig.server.split(',').map(u => u.trim()).filter(Boolean);
}

/** RFC 4515 filter value escaping */
function escapeFilter(value: string): string {
  return value.replace(/[\\*()\0]/g, ch => `\\${ch.charCodeAt(0).toString(16).padStart(2, '0')}`);
}

function bindDnFor(username: string, domain: string): string {
  if (username.includes('@') || username.includes(',') || !domain) return username;
  return `${username}@${domain}`;
}

function firstValue(value: AttributeValue | undefined): string | null {
  if (value === undefined) return null;
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined) return null;
  return Buffer.isBuffer(first) ? first.toString('utf8') : first;
}

function allValues(value: AttributeValue | undefined): string[] {
  if (value === undefined) return [];
  const list: Array<string | Buffer> = Array.isArray(value) ? value : [value];
  return list.map(v => (Buffer.isBuffer(v) ? v.toString('utf8') : v));
}

/** "CN=vnc-users,OU=Groups,DC=example,DC=org" -> "vnc-users" */
function groupNames(dns: string[]): string[] {
  const names: string[] = [];
  for (const dn of dns) {
    const match = dn.match(/^CN=([^,]+)/i);
    if (match) names.push(match[1]);
  }
  return names;
}

function constantTimeEqual(a: string, b: string): boolean {
  const aBuf = Buffer.from(a);
  const bBuf = Buffer.from(b);
  return aBuf.length === bBuf.length && crypto.timingSafeEqual(aBuf, bBuf);
}

function devLogin(username: string, password: string): AuthResult {
  const testUser = process.env.TEST_USERNAME;
  const testPass = process.env.TEST_PASSWORD;
  if (!testUser || !testPass) {
    return { success: false, message: 'LDAP server is not configured' };
  }
  // Evaluate both so timing does not reveal which one matched
  const usernameValid = constantTimeEqual(username, testUser);
  const passwordValid = constantTimeEqual(password, testPass);
  if (!usernameValid || !passwordValid) {
    return { success: false, message: 'Invalid username or password' };
  }
  return {
    success: true,
    message: 'Authentication successful',
    user: {
      username,
      display_name: process.env.TEST_FULLNAME || username,
      email: '',
      groups: [],
      auth_method: 'ldap',
    },
  };
}

async function safeUnbind(client: Client, url: string): Promise<void> {
  try {
    await client.unbind();
  } catch (err) {
    log.debugFor('auth', 'LDAP unbind failed', { url, error: errorMessage(err) });
  }
}

async function lookupUser(client: Client, username: string, ldapConfig: LdapConfig): Promise<AuthUser | null> {
  const { searchEntries } = await client.search(ldapConfig.base_dn, {
    scope: 'sub',
    filter: ldapConfig.user_filter.replace(/%s/g, escapeFilter(username)),
    attributes: [
      ldapConfig.attr_username,
      ldapConfig.attr_display_name,
      ldapConfig.attr_email,
      ldapConfig.attr_groups,
    ],
  });

  const entry = searchEntries[0];
  if (!entry) return null;

  return {
    username: firstValue(entry[ldapConfig.attr_username]) || username,
    display_name: firstValue(entry[ldapConfig.attr_display_name]) || username,
    email: firstValue(entry[ldapConfig.attr_email])
      || (ldapConfig.domain ? `${username}@${ldapConfig.domain}` : ''),
    groups: groupNames(allValues(entry[ldapConfig.attr_groups])),
    auth_method: 'ldap',
  };
}

/**
 * Bind as the user against each configured server in turn
 */
async function authenticateLdap(username: string, password: string, ldapConfig: LdapConfig): Promise<AuthResult> {
  const urls = serverList(ldapConfig);
  if (urls.length === 0) {
    return devLogin(username, password);
  }

  const bindDn = bindDnFor(username, ldapConfig.domain);

  for (const url of urls) {
    const client = new Client({ url, connectTimeout: CONNECT_TIMEOUT_MS, timeout: CONNECT_TIMEOUT_MS });
    try {
      await client.bind(bindDn, password);
      const user = await lookupUser(client, username, ldapConfig);
      if (!user) {
        log.warn('LDAP bind succeeded but no entry matched', { username, url });
        return { success: false, message: 'User found but unable to retrieve details' };
      }
      log.auth('LDAP authentication succeeded', { username: user.username, url });
      return { success: true, message: 'Authentication successful', user };
    } catch (err) {
      if (err instanceof InvalidCredentialsError) {
        // Every server gives the same answer
        log.auth('LDAP authentication failed', { username, url });
        return { success: false, message: 'Invalid username or password' };
      }
      log.warn('LDAP server unreachable, trying next', { url, error: errorMessage(err) });
    } finally {
      await safeUnbind(client, url);
    }
  }

  log.error('All LDAP servers unreachable', { servers: urls });
  return { success: false, message: 'LDAP server is not available' };
}

/**
 * Connect, bind and search each server, reporting where it stops
 */
async function runLdapDiagnostics(ldapConfig: LdapConfig): Promise<LdapDiagnosticResult[]> {
  const results: LdapDiagnosticResult[] = [];

  for (const url of serverList(ldapConfig)) {
    const started = Date.now();
    const result: LdapDiagnosticResult = { server: url, connected: false, bound: false, searched: false, durationMs: 0 };
    const client = new Client({ url, connectTimeout: CONNECT_TIMEOUT_MS, timeout: CONNECT_TIMEOUT_MS });

    try {
      // ldapts connects lazily; an anonymous bind is the first round trip
      if (ldapConfig.admin_binddn) {
        await client.bind(ldapConfig.admin_binddn, ldapConfig.admin_password);
      } else {
        await client.bind('', '');
      }
      result.connected = true;
      result.bound = true;

      await client.search(ldapConfig.base_dn, { scope: 'base', sizeLimit: 1 });
      result.searched = true;
    } catch (err) {
      if (err instanceof InvalidCredentialsError) {
        result.connected = true;
      }
      result.error = errorMessage(err);
    } finally {
      await safeUnbind(client, url);
    }

    result.durationMs = Date.now() - started;
    log.auth('LDAP diagnostic', { ...result });
    results.push(result);
  }

  return results;
}

export {
  authenticateLdap,
  runLdapDiagnostics,
  resolveLdapConfig,
  escapeFilter,
  bindDnFor,
  groupNames,
};
