/**
 * Manager routes
 * Per-user overrides of the selectable cores, memory, window managers, queues and OS images
 */

import express, { Request, Response, Router } from 'express';
import { log } from '../../lib/logger';
import { asyncHandler } from '../../lib/asyncHandler';
import { ValidationError, NotFoundError } from '../../lib/errors';
import { schemas, validate } from '../../lib/validation';
import { createRequireManager } from '../../lib/auth/managers';
import { getOverride, listOverrides, saveOverride, deleteOverride } from '../../lib/db/overrides';
import { getRequestUser } from './helpers';
import type { ApiDeps } from './helpers';
import type { SiteConfig } from '../../lib/site-config';
import type { OverrideFields, OverridePolicy } from '../../types';

type OverrideInput = Partial<OverrideFields>;

const POLICY_KEYS: Record<keyof OverrideFields, keyof OverridePolicy> = {
  cores: 'allow_cores_override',
  memory: 'allow_memory_override',
  window_managers: 'allow_window_manager_override',
  queues: 'allow_queue_override',
  os_options: 'allow_os_override',
};

function checkSubset<T>(values: T[] | null, allowed: T[], label: string): T[] | null {
  if (values === null) return null;
  const invalid = values.filter(v => !allowed.includes(v));
  if (invalid.length > 0) {
    throw new ValidationError(`Invalid ${label}: ${invalid.join(', ')}`, { invalid, allowed });
  }
  return values;
}

/**
 * Drop fields the server policy does not allow, then check the rest against the
 * available (not just enabled) options
 * @throws ValidationError
 */
function resolveOverrideFields(siteConfig: SiteConfig, input: OverrideInput): OverrideFields {
  const policy = siteConfig.server.manager_overrides;
  const pick = <K extends keyof OverrideFields>(key: K): OverrideFields[K] | null =>
    (policy[POLICY_KEYS[key]] ? input[key] ?? null : null);

  return {
    cores: checkSubset(pick('cores'), siteConfig.getCoreOptions(), 'core options'),
    memory: checkSubset(pick('memory'), siteConfig.getMemoryOptions(), 'memory options'),
    window_managers: checkSubset(pick('window_managers'), siteConfig.getAvailableWindowManagers(), 'window managers'),
    queues: checkSubset(pick('queues'), siteConfig.getAvailableQueues(), 'queues'),
    os_options: checkSubset(pick('os_options'), siteConfig.getOsOptions().map(os => os.name), 'OS options'),
  };
}

export function createManagerRouter({ siteConfig }: ApiDeps): Router {
  const router = express.Router();
  router.use('/manager', createRequireManager(siteConfig));

  router.get('/manager/overrides', (_req: Request, res: Response) => {
    const overrides = listOverrides().map(o => ({
      username: o.username,
      cores: o.cores,
      memory: o.memory,
      window_managers: o.window_managers,
      queues: o.queues,
      os_options: o.os_options,
      updated_by: o.updated_by,
      updated_at: o.updated_at,
    }));
    res.json({ success: true, overrides });
  });

  router.post('/manager/overrides', validate(schemas.saveOverride), asyncHandler(async (req: Request, res: Response) => {
    const { username, overrides }: { username: string; overrides: OverrideInput } = req.body;
    const manager = getRequestUser(req);
    const fields = resolveOverrideFields(siteConfig, overrides);
    const existed = getOverride(username) !== null;
    const override = saveOverride(username, fields, manager);

    log.audit(existed ? 'Override updated' : 'Override created', { manager, user: username, fields });
    res.json({ success: true, message: `Overrides saved for ${username}`, override });
  }));

  router.delete('/manager/overrides', validate(schemas.deleteOverride), asyncHandler(async (req: Request, res: Response) => {
    const { username }: { username: string } = req.body;
    if (!deleteOverride(username)) {
      throw new NotFoundError(`No overrides found for ${username}`);
    }
    log.audit('Override deleted', { manager: getRequestUser(req), user: username });
    res.json({ success: true });
  }));

  return router;
}

export { resolveOverrideFields };
export default createManagerRouter;
