/**
 * VNC Session Manager
 * Main Express server - orchestration only
 *
 * Frontend pages are served from public/
 * Business logic is in services/ and lib/
 * API routes are in routes/
 */

import express, { Express, Request, Response, NextFunction } from 'express';
import fs from 'fs';
import http from 'http';
import https from 'https';
import path from 'path';
import { config, assertSessionSecret } from './config';
import { SiteConfig } from './lib/site-config';
import { AuthManager } from './lib/auth';
import { LsfService } from './services/lsf';
import { VncSessionService } from './services/vnc';
import { createApiRouter } from './routes/api';
import { createPublicConfigRouter } from './routes/api/config';
import { createAuthRouter, createRequireAuth } from './routes/auth';
import { errorMiddleware } from './lib/asyncHandler';
import { initializeDb, closeDb, resolveDbPath } from './lib/db';
import { log, setLogLevel } from './lib/logger';
import { errorMessage } from './lib/errors';
import { MS_PER_HOUR, MS_PER_SECOND } from './lib/time';

export interface AppDeps {
  siteConfig: SiteConfig;
  lsf: LsfService;
  vnc: VncSessionService;
  authManager: AuthManager;
  publicDir?: string;
}

export interface StartOptions {
  host?: string;
  port?: number;
  siteConfig?: SiteConfig;
}

const DEFAULT_PUBLIC_DIR = path.join(__dirname, 'public');

/**
 * Wire services from a loaded site configuration
 */
function createDefaultDeps(siteConfig: SiteConfig): AppDeps {
  const lsf = new LsfService({ jobName: siteConfig.getLsfDefaults().job_name });
  return {
    siteConfig,
    lsf,
    vnc: new VncSessionService({ siteConfig, lsf }),
    authManager: new AuthManager({ siteConfig }),
  };
}

function createApp(deps: AppDeps): Express {
  const { siteConfig, authManager } = deps;
  const publicDir = deps.publicDir ?? DEFAULT_PUBLIC_DIR;
  const app = express();
  const requireAuth = createRequireAuth({ authManager, siteConfig });

  app.disable('x-powered-by');

  // API responses are per-user and change with every bjobs call
  app.use('/api', (_req: Request, res: Response, next: NextFunction) => {
    res.setHeader('Cache-Control', 'no-store');
    next();
  });

  // Public before requireAuth: the login page needs the auth method
  app.use('/api', createPublicConfigRouter(siteConfig));
  app.use('/', createAuthRouter({ authManager, siteConfig }));

  app.use('/api', requireAuth, createApiRouter(deps));

  app.use('/api', (req: Request, res: Response) => {
    res.status(404).json({ success: false, message: `Not found: ${req.method} ${req.originalUrl}` });
  });

  app.get('/login', (_req: Request, res: Response) => {
    if (!authManager.enabled) {
      res.redirect('/');
      return;
    }
    res.sendFile(path.join(publicDir, 'login.html'));
  });

  app.get('/', requireAuth, (_req: Request, res: Response) => {
    res.sendFile(path.join(publicDir, 'index.html'));
  });

  // Scripts and styles; pages above carry the auth checks
  app.use(express.static(publicDir, { index: false }));

  app.use(errorMiddleware);

  return app;
}

/**
 * HTTPS options when both certificate files exist
 */
function loadTlsOptions(siteConfig: SiteConfig): https.ServerOptions | null {
  const { ssl_cert: cert, ssl_key: key, ssl_ca_chain: ca } = siteConfig.server;
  if (!cert || !key) return null;
  if (!fs.existsSync(cert) || !fs.existsSync(key)) {
    log.warn('SSL configured but certificate files are missing, serving HTTP', { cert, key });
    return null;
  }
  const options: https.ServerOptions = {
    cert: fs.readFileSync(cert),
    key: fs.readFileSync(key),
  };
  if (ca && fs.existsSync(ca)) {
    options.ca = fs.readFileSync(ca);
  }
  return options;
}

/**
 * Load configuration, open the database and listen
 * @returns The listening server
 */
function startServer(options: StartOptions = {}): http.Server | https.Server {
  const siteConfig = options.siteConfig ?? SiteConfig.load();
  if (siteConfig.server.debug) {
    setLogLevel('debug');
  }

  if (siteConfig.isAuthEnabled()) {
    assertSessionSecret();
  }
  initializeDb(resolveDbPath(siteConfig.server.datadir));

  const deps = createDefaultDeps(siteConfig);
  const app = createApp(deps);

  const host = options.host ?? config.host ?? siteConfig.server.host;
  const port = options.port ?? config.port ?? siteConfig.server.port;
  const tls = loadTlsOptions(siteConfig);
  const server = tls ? https.createServer(tls, app) : http.createServer(app);
  server.setTimeout(siteConfig.server.timeout * MS_PER_SECOND);

  server.listen(port, host, () => {
    log.info(`VNC session manager listening on ${tls ? 'https' : 'http'}://${host}:${port}`);
    log.info('Authentication', { method: siteConfig.authMethod() || 'disabled' });
  });

  server.on('error', (err: Error) => {
    log.error('Server error', { error: err.message });
    process.exit(1);
  });

  const purgeTimer = setInterval(() => {
    try {
      deps.authManager.purgeExpired();
    } catch (err) {
      log.warn('Session purge failed', { error: errorMessage(err) });
    }
  }, MS_PER_HOUR);
  purgeTimer.unref();

  const shutdown = (signal: string): void => {
    log.info(`${signal} received, shutting down`);
    clearInterval(purgeTimer);
    server.close(() => {
      closeDb();
      log.info('Server closed');
      process.exit(0);
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return server;
}

if (require.main === module) {
  try {
    startServer();
  } catch (err) {
    log.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  }
}

export { createApp, createDefaultDeps, startServer, loadTlsOptions };
