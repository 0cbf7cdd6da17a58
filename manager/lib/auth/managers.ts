/**
 * Manager Authorization
 * Managers are listed in server_config.json "managers" and may edit per-user overrides
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { log } from '../logger';
import type { SiteConfig } from '../site-config';
import type { AuthenticatedRequest } from '../../types';

function isManager(siteConfig: SiteConfig, username: string | undefined | null): boolean {
  return siteConfig.isManager(username);
}

/**
 * Express middleware to require manager access
 * Must be used after requireAuth
 */
function createRequireManager(siteConfig: SiteConfig): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authReq: AuthenticatedRequest = req;
    const user = authReq.user;

    if (!user) {
      res.status(401).json({ success: false, message: 'Authentication required' });
      return;
    }

    if (!isManager(siteConfig, user.username)) {
      log.warn('Manager access denied', { username: user.username, path: req.originalUrl });
      res.status(403).json({ success: false, message: 'Manager access required' });
      return;
    }

    next();
  };
}

/**
 * Manager check that applies only while authentication is enabled;
 * an auth-less server lets everyone through
 */
function createRequireManagerWhenAuthEnabled(siteConfig: SiteConfig): RequestHandler {
  const requireManager = createRequireManager(siteConfig);
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!siteConfig.isAuthEnabled()) {
      next();
      return;
    }
    requireManager(req, res, next);
  };
}

export { isManager, createRequireManager, createRequireManagerWhenAuthEnabled };
