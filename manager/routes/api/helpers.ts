/**
 * Shared helpers and dependency types for API routes
 */

import type { Request } from 'express';
import type { SiteConfig } from '../../lib/site-config';
import type { LsfService } from '../../services/lsf';
import type { VncSessionService } from '../../services/vnc';
import type { AuthenticatedRequest } from '../../types';

export interface ApiDeps {
  siteConfig: SiteConfig;
  lsf: LsfService;
  vnc: VncSessionService;
}

// Express types route params as string, but optional params may be absent
export const param = (req: Request, name: string): string | undefined => {
  const value: string | undefined = req.params[name];
  return value || undefined;
};

/**
 * Username set by requireAuth
 * @returns 'anonymous' when no user is attached
 */
export function getRequestUser(req: Request): string {
  const authReq: AuthenticatedRequest = req;
  return authReq.user?.username || 'anonymous';
}

// Keys whose values are hidden from /api/debug/environment
const SECRET_KEY_PATTERN = /SECRET|PASSWORD|TOKEN|KEY/i;

/**
 * Copy of the environment with secrets masked
 */
export function maskEnvironment(env: NodeJS.ProcessEnv): Record<string, string> {
  const masked: Record<string, string> = {};
  for (const key of Object.keys(env).sort()) {
    const value = env[key];
    if (value === undefined) continue;
    masked[key] = SECRET_KEY_PATTERN.test(key) ? '***' : value;
  }
  return masked;
}

/** Trim long command output so the debug page stays readable */
export function truncateOutput(text: string, max = 2000): string {
  return text.length > max ? `${text.substring(0, max)}... (truncated)` : text;
}
