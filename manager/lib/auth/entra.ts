/**
 * Microsoft Entra ID (Azure AD) Authentication
 * OAuth2 authorization-code and password grants against the v2.0 endpoints,
 * profile and groups from Microsoft Graph
 */

import axios from 'axios';
import { log } from '../logger';
import { AuthError, errorMessage } from '../errors';
import type { AuthResult, AuthUser } from '../../types';

export interface EntraConfig {
  tenant_id: string;
  client_id: string;
  client_secret: string;
  redirect_uri: string;
  scopes: string[];
}

interface TokenResponse {
  access_token: string;
  refresh_token?: string;
  expires_in?: number;
}

interface GraphUser {
  userPrincipalName?: string;
  displayName?: string;
  mail?: string | null;
}

interface GraphGroupList {
  value?: Array<{ displayName?: string | null }>;
}

const LOGIN_BASE = 'https://login.microsoftonline.com';
const GRAPH_BASE = 'https://graph.microsoft.com/v1.0';
const REQUEST_TIMEOUT_MS = 10000;
const DEFAULT_SCOPES = ['User.Read'];

function stringField(source: Record<string, unknown> | null, key: string): string {
  const value = source?.[key];
  return typeof value === 'string' ? value : '';
}

/**
 * entra_config.json values, each overridable by ENTRA_* env vars
 */
function resolveEntraConfig(file: Record<string, unknown> | null = null, env: NodeJS.ProcessEnv = process.env): EntraConfig {
  const fileScopes = file?.scopes;
  const scopes = env.ENTRA_SCOPES
    ? env.ENTRA_SCOPES.split(/[\s,]+/).filter(Boolean)
    : Array.isArray(fileScopes)
      ? fileScopes.filter((s): s is string => typeof s === 'string')
      : DEFAULT_SCOPES;

  return {
    tenant_id: env.ENTRA_TENANT_ID || stringField(file, 'tenant_id'),
    client_id: env.ENTRA_CLIENT_ID || stringField(file, 'client_id'),
    client_secret: env.ENTRA_CLIENT_SECRET || stringField(file, 'client_secret'),
    redirect_uri: env.ENTRA_REDIRECT_URI || stringField(file, 'redirect_uri') || 'http://localhost:9143/auth/callback',
    scopes,
  };
}

function isEntraConfigured(entraConfig: EntraConfig): boolean {
  return Boolean(entraConfig.tenant_id && entraConfig.client_id);
}

/** Prefer the provider's error_description over the HTTP status text */
function describeError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const data: unknown = err.response?.data;
    if (data && typeof data === 'object' && 'error_description' in data && typeof data.error_description === 'string') {
      return data.error_description;
    }
  }
  return errorMessage(err);
}

function usernameFromPrincipal(principal: string): string {
  return principal.split('@')[0];
}

class EntraClient {
  constructor(private readonly entraConfig: EntraConfig) {}

  get configured(): boolean {
    return isEntraConfigured(this.entraConfig);
  }

  private get tokenEndpoint(): string {
    return `${LOGIN_BASE}/${this.entraConfig.tenant_id}/oauth2/v2.0/token`;
  }

  getAuthorizationUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.entraConfig.client_id,
      response_type: 'code',
      redirect_uri: this.entraConfig.redirect_uri,
      scope: this.entraConfig.scopes.join(' '),
      response_mode: 'query',
      state,
      prompt: 'select_account',
    });
    return `${LOGIN_BASE}/${this.entraConfig.tenant_id}/oauth2/v2.0/authorize?${params.toString()}`;
  }

  private async requestToken(form: Record<string, string>): Promise<TokenResponse> {
    const body = new URLSearchParams({
      client_id: this.entraConfig.client_id,
      client_secret: this.entraConfig.client_secret,
      scope: this.entraConfig.scopes.join(' '),
      ...form,
    });
    const response = await axios.post<TokenResponse>(this.tokenEndpoint, body.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      timeout: REQUEST_TIMEOUT_MS,
    });
    return response.data;
  }

  async exchangeCode(code: string): Promise<TokenResponse> {
    return this.requestToken({
      grant_type: 'authorization_code',
      code,
      redirect_uri: this.entraConfig.redirect_uri,
    });
  }

  /** Resource-owner password grant, used by the login form */
  async authenticatePassword(username: string, password: string): Promise<AuthResult> {
    if (!this.configured) {
      return { success: false, message: 'Microsoft Entra ID is not configured' };
    }
    try {
      const token = await this.requestToken({ grant_type: 'password', username, password });
      const user = await this.resolveUser(token.access_token);
      log.auth('Entra password authentication succeeded', { username: user.username });
      return { success: true, message: 'Authentication successful', user };
    } catch (err) {
      const message = describeError(err);
      log.auth('Entra password authentication failed', { username, error: message });
      return { success: false, message: `Authentication failed: ${message}` };
    }
  }

  async getUserInfo(accessToken: string): Promise<GraphUser> {
    const response = await axios.get<GraphUser>(`${GRAPH_BASE}/me`, {
      headers: { Authorization: `Bearer ${accessToken}` },
      timeout: REQUEST_TIMEOUT_MS,
    });
    return response.data;
  }

  /**
   * Display names of the user's groups
   * @returns [] when Graph refuses the request
   */
  async getUserGroups(accessToken: string): Promise<string[]> {
    try {
      const response = await axios.get<GraphGroupList>(`${GRAPH_BASE}/me/memberOf`, {
        headers: { Authorization: `Bearer ${accessToken}` },
        timeout: REQUEST_TIMEOUT_MS,
      });
      return (response.data.value ?? [])
        .map(group => group.displayName)
        .filter((name): name is string => typeof name === 'string' && name.length > 0);
    } catch (err) {
      log.warn('Could not read Entra groups', { error: describeError(err) });
      return [];
    }
  }

  async resolveUser(accessToken: string): Promise<AuthUser> {
    const profile = await this.getUserInfo(accessToken);
    const principal = profile.userPrincipalName ?? '';
    if (!usernameFromPrincipal(principal)) {
      throw new AuthError('Microsoft Entra ID did not return a user principal name');
    }
    const groups = await this.getUserGroups(accessToken);
    return {
      username: usernameFromPrincipal(principal),
      display_name: profile.displayName || usernameFromPrincipal(principal),
      email: profile.mail || principal,
      groups,
      auth_method: 'entra',
    };
  }
}

export { EntraClient, resolveEntraConfig, isEntraConfigured, describeError, usernameFromPrincipal };
export type { TokenResponse, GraphUser };
