/**
 * Configuration routes
 * Read-only views of the site configuration for the web UI and CLI
 */

import express, { Request, Response, Router } from 'express';
import type { SiteConfig } from '../../lib/site-config';
import type { ApiDeps } from './helpers';

/**
 * Server settings needed before login (auth method, SSL); mounted ahead of requireAuth
 */
export function createPublicConfigRouter(siteConfig: SiteConfig): Router {
  const router = express.Router();

  router.get(['/config/server', '/server/config'], (_req: Request, res: Response) => {
    res.json(siteConfig.toPublicServerConfig());
  });

  return router;
}

export function createConfigRouter({ siteConfig }: ApiDeps): Router {
  const router = express.Router();

  router.get(['/config/lsf', '/lsf/config'], (_req: Request, res: Response) => {
    res.json({
      defaults: siteConfig.getLsfDefaults(),
      queues: siteConfig.getAvailableQueues(),
      memory_options: siteConfig.getMemoryOptions(),
      core_options: siteConfig.getCoreOptions(),
      sites: siteConfig.getAvailableSites(),
      os_options: siteConfig.getOsOptions(),
    });
  });

  router.get('/config/vnc', (_req: Request, res: Response) => {
    res.json({
      window_managers: siteConfig.getAvailableWindowManagers(),
      resolutions: siteConfig.getAvailableResolutions(),
      defaults: siteConfig.getVncDefaults(),
      sites: siteConfig.getAvailableSites(),
      enabled_window_managers: siteConfig.getEnabledWindowManagers(),
      enabled_resolutions: siteConfig.getEnabledResolutions(),
    });
  });

  return router;
}

export default createConfigRouter;
