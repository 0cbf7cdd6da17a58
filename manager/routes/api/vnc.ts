/**
 * VNC session routes
 * List, create, copy and stop sessions, and look up connection details
 */

import express, { Request, Response, Router } from 'express';
import { log } from '../../lib/logger';
import { asyncHandler } from '../../lib/asyncHandler';
import { VncError, errorMessage } from '../../lib/errors';
import { schemas, validate } from '../../lib/validation';
import { getRequestUser, param } from './helpers';
import type { ApiDeps } from './helpers';
import type { SessionRequest } from '../../services/vnc';

export function createVncRouter({ vnc, lsf }: ApiDeps): Router {
  const router = express.Router();

  router.get(['/vnc/list', '/vnc/sessions'], asyncHandler(async (_req: Request, res: Response) => {
    const sessions = await vnc.listSessions();
    res.json(sessions);
  }));

  router.post(['/vnc/create', '/vnc/start'], validate(schemas.createSession), asyncHandler(async (req: Request, res: Response) => {
    const body: SessionRequest = req.body;
    const user = getRequestUser(req);
    try {
      const { job_id, status } = await vnc.createSession(body, user);
      res.json({ success: true, message: 'VNC session created successfully', job_id, status });
    } catch (err) {
      // Bad input keeps its own 4xx body
      if (err instanceof VncError && err.code < 500) throw err;
      const message = `Error creating VNC session: ${errorMessage(err)}`;
      log.error(message, { user });
      res.status(err instanceof VncError ? err.code : 500).json({ success: false, message });
    }
  }));

  router.post(
    ['/vnc/kill/:jobId', '/vnc/stop/:jobId', '/vnc/kill', '/vnc/stop'],
    asyncHandler(async (req: Request, res: Response) => {
      const bodyJobId: unknown = req.body?.job_id;
      const jobId = param(req, 'jobId')
        ?? (typeof bodyJobId === 'string' || typeof bodyJobId === 'number' ? String(bodyJobId) : undefined);

      if (!jobId) {
        res.status(400).json({ success: false, message: 'No job ID provided' });
        return;
      }

      const killed = await vnc.killSession(jobId, getRequestUser(req));
      res.json({
        success: killed,
        message: killed ? 'VNC session stopped successfully' : 'Failed to stop VNC session',
        job_id: jobId,
      });
    }),
  );

  router.post('/vnc/copy', validate(schemas.copySession), asyncHandler(async (req: Request, res: Response) => {
    const sessionId: string | number = req.body.session_id;
    const { job_id, status } = await vnc.copySession(sessionId, getRequestUser(req));
    res.json({ success: true, message: 'VNC session copied successfully', job_id, status });
  }));

  router.get('/vnc/connection/:jobId', asyncHandler(async (req: Request, res: Response) => {
    const jobId = param(req, 'jobId') ?? '';
    const details = await lsf.getConnectionDetails(jobId);
    if (!details) {
      res.status(404).json({ success: false, message: `No connection details found for job ${jobId}` });
      return;
    }
    res.json({ success: true, ...details });
  }));

  return router;
}

export default createVncRouter;
