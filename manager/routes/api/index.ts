/**
 * API Routes - Combined router
 * Mounts the session, config, user, manager and debug sub-routers.
 * Every route here runs after requireAuth, so req.user is always set.
 */

import express, { Request, Response, NextFunction, Router } from 'express';
import { log } from '../../lib/logger';
import type { ApiDeps } from './helpers';
import { createVncRouter } from './vnc';
import { createConfigRouter } from './config';
import { createUserRouter } from './user';
import { createManagerRouter } from './manager';
import { createDebugRouter } from './debug';

export function createApiRouter(deps: ApiDeps): Router {
  const router = express.Router();

  router.use(express.json());

  // Logging middleware for user actions
  router.use((req: Request, _res: Response, next: NextFunction) => {
    if (req.method !== 'GET') {
      log.api(`${req.method} ${req.path}`, req.body || {});
    }
    next();
  });

  router.use('/', createVncRouter(deps));
  router.use('/', createConfigRouter(deps));
  router.use('/', createUserRouter(deps));
  router.use('/', createManagerRouter(deps));
  router.use('/', createDebugRouter(deps));

  return router;
}

export default createApiRouter;
