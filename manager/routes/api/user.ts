/**
 * Per-user routes
 * Selectable options after manager overrides, and saved UI preferences
 */

import express, { Request, Response, Router } from 'express';
import { schemas, validate } from '../../lib/validation';
import { getUserSettings, saveUserSettings, deleteUserSettings } from '../../lib/db/settings';
import { getRequestUser } from './helpers';
import type { ApiDeps } from './helpers';

export function createUserRouter({ vnc }: ApiDeps): Router {
  const router = express.Router();

  router.get('/user/options', (req: Request, res: Response) => {
    res.json(vnc.getUserOptions(getRequestUser(req)));
  });

  router.get('/user/settings', (req: Request, res: Response) => {
    res.json({ success: true, settings: getUserSettings(getRequestUser(req)) });
  });

  router.post('/user/settings', validate(schemas.userSettings), (req: Request, res: Response) => {
    const user = getRequestUser(req);
    const settings: Record<string, unknown> = req.body.settings;
    const saved = saveUserSettings(user, settings);
    res.json({ success: true, message: 'Settings saved', settings: saved });
  });

  router.delete('/user/settings', (req: Request, res: Response) => {
    deleteUserSettings(getRequestUser(req));
    res.json({ success: true });
  });

  return router;
}

export default createUserRouter;
