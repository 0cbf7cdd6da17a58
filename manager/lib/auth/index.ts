/**
 * Auth Manager
 * Dispatches logins to LDAP or Entra ID and owns the cookie-backed session lifecycle
 */

import crypto from 'crypto';
import { config, assertSessionSecret } from '../../config';
import { log } from '../logger';
import { ValidationError, errorMessage } from '../errors';
import { MS_PER_HOUR, MS_PER_MINUTE } from '../time';
import {
  createAuthSession, getAuthSession, touchAuthSession, deleteAuthSession, purgeExpiredSessions,
} from '../db/sessions';
import { signSessionId, verifySessionCookie } from './token';
import { authenticateLdap, runLdapDiagnostics, resolveLdapConfig } from './ldap';
import { EntraClient, resolveEntraConfig, describeError } from './entra';
import type { LdapConfig, LdapDiagnosticResult } from './ldap';
import type { SiteConfig } from '../site-config';
import type { AuthMethod, AuthResult, AuthSession, AuthUser } from '../../types';

export interface LoginResult {
  success: boolean;
  message: string;
  user?: AuthUser;
  /** Signed cookie value; present on success */
  cookie?: string;
}

export interface AuthManagerOptions {
  siteConfig: SiteConfig;
  ldapConfig?: LdapConfig;
  entra?: EntraClient;
  secret?: string;
  sessionTtlMs?: number;
  now?: () => number;
}

const PENDING_STATE_TTL_MS = 10 * MS_PER_MINUTE;

class AuthManager {
  private siteConfig: SiteConfig;
  private ldapConfig: LdapConfig;
  readonly entra: EntraClient;
  private secret: string | null;
  readonly sessionTtlMs: number;
  private now: () => number;
  private pendingStates = new Map<string, number>();

  constructor(options: AuthManagerOptions) {
    this.siteConfig = options.siteConfig;
    this.ldapConfig = options.ldapConfig ?? resolveLdapConfig(options.siteConfig.ldapFile);
    this.entra = options.entra ?? new EntraClient(resolveEntraConfig(options.siteConfig.entraFile));
    this.secret = options.secret ?? null;
    this.sessionTtlMs = options.sessionTtlMs ?? config.sessionExpiryHours * MS_PER_HOUR;
    this.now = options.now ?? Date.now;
  }

  get method(): AuthMethod {
    return this.siteConfig.authMethod();
  }

  get enabled(): boolean {
    return this.siteConfig.isAuthEnabled();
  }

  // Resolved on first use so an auth-less server starts without SESSION_SECRET
  private getSecret(): string {
    if (!this.secret) this.secret = assertSessionSecret();
    return this.secret;
  }

  private startSession(user: AuthUser): LoginResult {
    const session = createAuthSession(user, this.sessionTtlMs, this.now());
    log.audit('Login', { user: user.username, method: user.auth_method });
    return {
      success: true,
      message: 'Authentication successful',
      user,
      cookie: signSessionId(session.session_id, this.getSecret()),
    };
  }

  async authenticate(username: string, password: string): Promise<LoginResult> {
    if (!this.enabled) {
      return { success: false, message: 'Authentication is disabled' };
    }

    let result: AuthResult;
    try {
      result = this.method === 'ldap'
        ? await authenticateLdap(username, password, this.ldapConfig)
        : await this.entra.authenticatePassword(username, password);
    } catch (err) {
      log.error('Authentication error', { username, method: this.method, error: errorMessage(err) });
      return { success: false, message: `Authentication error: ${errorMessage(err)}` };
    }

    if (!result.success || !result.user) {
      log.audit('Login failed', { user: username, method: this.method });
      return { success: false, message: result.message };
    }
    return this.startSession(result.user);
  }

  private prunePendingStates(): void {
    const now = this.now();
    for (const [state, expires] of this.pendingStates) {
      if (expires <= now) this.pendingStates.delete(state);
    }
  }

  /**
   * Start an Entra login
   * @returns Authorize URL, or null when Entra is not configured
   */
  getAuthUrl(): string | null {
    if (!this.entra.configured) return null;
    this.prunePendingStates();
    const state = crypto.randomUUID();
    this.pendingStates.set(state, this.now() + PENDING_STATE_TTL_MS);
    return this.entra.getAuthorizationUrl(state);
  }

  /**
   * Complete an Entra login from the redirect callback
   */
  async handleAuthCode(code: string, state: string): Promise<LoginResult> {
    this.prunePendingStates();
    if (!this.pendingStates.has(state)) {
      log.warn('Entra callback with unknown or expired state');
      return { success: false, message: 'Invalid or expired login state' };
    }
    this.pendingStates.delete(state);

    try {
      const token = await this.entra.exchangeCode(code);
      const user = await this.entra.resolveUser(token.access_token);
      return this.startSession(user);
    } catch (err) {
      const message = describeError(err);
      log.error('Entra code exchange failed', { error: message });
      return { success: false, message: `Authentication failed: ${message}` };
    }
  }

  /**
   * Resolve a cookie to a live session, refreshing its last access time
   */
  validateSession(cookieValue: string | undefined | null): AuthSession | null {
    const sessionId = verifySessionCookie(cookieValue, this.getSecret());
    if (!sessionId) return null;

    const session = getAuthSession(sessionId);
    if (!session) return null;

    const now = this.now();
    if (session.expires_at <= now) {
      deleteAuthSession(sessionId);
      log.auth('Session expired', { username: session.username });
      return null;
    }

    touchAuthSession(sessionId, now);
    return { ...session, last_access: now };
  }

  logout(cookieValue: string | undefined | null): { success: boolean; message: string } {
    const sessionId = verifySessionCookie(cookieValue, this.getSecret());
    if (!sessionId) {
      return { success: false, message: 'Session not found' };
    }
    const session = getAuthSession(sessionId);
    if (!deleteAuthSession(sessionId)) {
      return { success: false, message: 'Session not found' };
    }
    log.audit('Logout', { user: session?.username });
    return { success: true, message: 'Logged out successfully' };
  }

  /**
   * @throws ValidationError when LDAP is not the configured method
   */
  async runDiagnostics(): Promise<LdapDiagnosticResult[]> {
    if (this.method !== 'ldap') {
      throw new ValidationError('LDAP diagnostics are only available when authentication is ldap');
    }
    return runLdapDiagnostics(this.ldapConfig);
  }

  purgeExpired(): number {
    return purgeExpiredSessions(this.now());
  }

  pendingStateCount(): number {
    return this.pendingStates.size;
  }
}

export default AuthManager;
export { AuthManager, PENDING_STATE_TTL_MS };
