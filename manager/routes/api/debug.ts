/**
 * Debug routes
 * Recent LSF/ssh commands and the server environment, secrets masked
 */

import express, { Request, Response, Router } from 'express';
import os from 'os';
import { parseQueryInt } from '../../lib/validation';
import { createRequireManagerWhenAuthEnabled } from '../../lib/auth/managers';
import { maskEnvironment, truncateOutput } from './helpers';
import type { ApiDeps } from './helpers';

export function createDebugRouter({ siteConfig, lsf }: ApiDeps): Router {
  const router = express.Router();
  router.use('/debug', createRequireManagerWhenAuthEnabled(siteConfig));

  router.get(['/debug', '/debug/commands'], (req: Request, res: Response) => {
    const limit = parseQueryInt(req.query, 'limit', 100, { min: 1, max: 1000 });
    const commandHistory = lsf.getCommandHistory(limit).map(entry => ({
      command: entry.command,
      success: entry.success,
      timestamp: entry.timestamp,
      stdout: truncateOutput(entry.stdout.trim()),
      stderr: truncateOutput(entry.stderr.trim()),
    }));
    res.json({ success: true, command_history: commandHistory });
  });

  router.get('/debug/environment', (_req: Request, res: Response) => {
    res.json({
      success: true,
      environment: {
        'Node Version': process.version,
        Platform: `${os.platform()} ${os.release()}`,
        User: process.env.USER || 'Unknown',
        Hostname: os.hostname(),
        ...maskEnvironment(process.env),
      },
      config: {
        vnc_config: siteConfig.vnc,
        lsf_config: siteConfig.lsf,
      },
    });
  });

  return router;
}

export default createDebugRouter;
