/**
 * Auth Routes
 * Login, logout and session lookup for the web UI, plus the Entra ID redirect flow
 *
 * Session model:
 * - A successful login stores a row in auth_sessions and sets an HttpOnly
 *   session_id cookie holding "<id>.<hmac>"
 * - requireAuth resolves the cookie on every protected request
 * - With authentication disabled every request runs as "anonymous"
 */

import express, { Request, Response, NextFunction, RequestHandler, Router } from 'express';
import { log } from '../lib/logger';
import { asyncHandler } from '../lib/asyncHandler';
import { schemas, validate, queryString } from '../lib/validation';
import { getCookie, buildSessionCookie, clearSessionCookie } from '../lib/cookies';
import { createRequireManagerWhenAuthEnabled } from '../lib/auth/managers';
import type { AuthManager } from '../lib/auth';
import type { SiteConfig } from '../lib/site-config';
import type { AuthUser, AuthenticatedRequest } from '../types';

export interface AuthRouteDeps {
  authManager: AuthManager;
  siteConfig: SiteConfig;
}

const ANONYMOUS_USER: AuthUser = {
  username: 'anonymous',
  display_name: 'Anonymous User',
  email: '',
  groups: [],
  auth_method: '',
};

/**
 * Middleware to require a valid session
 * API requests get 401 JSON, page requests are redirected to /login
 */
function createRequireAuth({ authManager }: AuthRouteDeps): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const authReq: AuthenticatedRequest = req;

    if (!authManager.enabled) {
      authReq.user = { ...ANONYMOUS_USER };
      next();
      return;
    }

    const session = authManager.validateSession(getCookie(req.headers.cookie));
    if (!session) {
      if (req.originalUrl.startsWith('/api')) {
        res.status(401).json({ success: false, message: 'Authentication required' });
      } else {
        res.redirect('/login');
      }
      return;
    }

    authReq.user = {
      username: session.username,
      display_name: session.display_name,
      email: session.email,
      groups: session.groups,
      auth_method: session.auth_method,
    };
    authReq.sessionId = session.session_id;
    next();
  };
}

function createAuthRouter(deps: AuthRouteDeps): Router {
  const { authManager, siteConfig } = deps;
  const router = express.Router();
  const requireAuth = createRequireAuth(deps);
  const maxAgeSeconds = (): number => authManager.sessionTtlMs / 1000;

  /**
   * POST /api/login
   * Authenticate and set the session cookie
   */
  router.post(['/api/login', '/api/auth/login'], express.json(), validate(schemas.login), asyncHandler(async (req: Request, res: Response) => {
    const { username, password }: { username: string; password: string } = req.body;
    const result = await authManager.authenticate(username, password);

    if (!result.success || !result.cookie) {
      res.status(401).json({ success: false, message: result.message });
      return;
    }

    res.setHeader('Set-Cookie', buildSessionCookie(result.cookie, maxAgeSeconds(), siteConfig.isSslEnabled()));
    res.json({ success: true, message: result.message });
  }));

  /**
   * POST /api/logout
   * Delete the session row and expire the cookie
   */
  router.post(['/api/logout', '/api/auth/logout'], (req: Request, res: Response) => {
    const cookie = getCookie(req.headers.cookie);
    res.setHeader('Set-Cookie', clearSessionCookie(siteConfig.isSslEnabled()));

    if (!cookie || !authManager.enabled) {
      res.json({ success: true, message: 'No active session' });
      return;
    }
    res.json(authManager.logout(cookie));
  });

  /**
   * GET /session
   * Who is logged in; 401 when nobody is
   */
  router.get(['/session', '/api/auth/session'], (req: Request, res: Response) => {
    if (!authManager.enabled) {
      res.json({ authenticated: true, ...ANONYMOUS_USER });
      return;
    }

    const session = authManager.validateSession(getCookie(req.headers.cookie));
    if (!session) {
      res.status(401).json({ authenticated: false, message: 'Not authenticated' });
      return;
    }

    res.json({
      authenticated: true,
      username: session.username,
      display_name: session.display_name,
      email: session.email,
      groups: session.groups,
      auth_method: session.auth_method,
      is_manager: siteConfig.isManager(session.username),
    });
  });

  /**
   * GET /auth/entra
   * Redirect to the Microsoft sign-in page
   */
  router.get('/auth/entra', (_req: Request, res: Response) => {
    if (authManager.method !== 'entra') {
      res.status(404).type('text').send('Not found');
      return;
    }
    const url = authManager.getAuthUrl();
    if (!url) {
      log.error('Entra login requested but Entra ID is not configured');
      res.status(500).type('text').send('Microsoft Entra ID is not configured');
      return;
    }
    res.redirect(url);
  });

  /**
   * GET /auth/callback
   * Finish the Entra flow and land on the main page
   */
  router.get('/auth/callback', asyncHandler(async (req: Request, res: Response) => {
    const code = queryString(req.query.code);
    if (!code) {
      res.status(400).type('text').send('No authorization code provided');
      return;
    }

    const result = await authManager.handleAuthCode(code, queryString(req.query.state) ?? '');
    if (!result.success || !result.cookie) {
      res.status(401).type('text').send(result.message);
      return;
    }

    res.setHeader('Set-Cookie', buildSessionCookie(result.cookie, maxAgeSeconds(), siteConfig.isSslEnabled()));
    res.redirect('/');
  }));

  /**
   * GET /api/auth/ldap/diagnose
   * Per-server connect/bind/search report
   */
  router.get(
    '/api/auth/ldap/diagnose',
    requireAuth,
    createRequireManagerWhenAuthEnabled(siteConfig),
    asyncHandler(async (_req: Request, res: Response) => {
      const results = await authManager.runDiagnostics();
      res.json({ success: true, results });
    }),
  );

  return router;
}

export default createAuthRouter;
export { createAuthRouter, createRequireAuth, ANONYMOUS_USER };
