/**
 * VNC Session Service
 * Turns API requests into LSF submissions: merges defaults, enforces the
 * per-user option lists and enriches listed jobs with connection details
 */

import { log } from '../lib/logger';
import { ValidationError, NotFoundError, errorMessage } from '../lib/errors';
import { validateResolution, validateSessionName } from '../lib/validation';
import { getOverride } from '../lib/db/overrides';
import type { SiteConfig } from '../lib/site-config';
import type { LsfService } from './lsf';
import type {
  CreateSessionRequest, VncJob, VncSubmitSettings, LsfSubmitSettings, UserOptions, OverrideFields,
} from '../types';

const COLOR_DEPTHS = [8, 16, 24, 32];

/** Body accepted by createSession; `wm` is the CLI's short alias */
export interface SessionRequest extends CreateSessionRequest {
  wm?: string;
}

export interface SubmittedSession {
  job_id: string;
  status: 'pending';
}

export interface VncSessionServiceOptions {
  siteConfig: SiteConfig;
  lsf: LsfService;
  /** Stored manager override for a user; reads the database by default */
  overrideLookup?: (username: string) => OverrideFields | null;
}

function requireOneOf<T>(value: T, allowed: T[], label: string): T {
  if (!allowed.includes(value)) {
    throw new ValidationError(`Invalid ${label}: ${String(value)}`, { allowed });
  }
  return value;
}

class VncSessionService {
  private siteConfig: SiteConfig;
  private lsf: LsfService;
  private overrideLookup: (username: string) => OverrideFields | null;

  constructor(options: VncSessionServiceOptions) {
    this.siteConfig = options.siteConfig;
    this.lsf = options.lsf;
    this.overrideLookup = options.overrideLookup ?? getOverride;
  }

  getUserOptions(username: string): UserOptions {
    let override: OverrideFields | null = null;
    try {
      override = this.overrideLookup(username);
    } catch (err) {
      log.warn('Could not read manager override, using global options', { username, error: errorMessage(err) });
    }
    return this.siteConfig.getUserSpecificOptions(username, override);
  }

  /**
   * Merge a request with configured defaults and check it against the user's options
   * @throws ValidationError
   */
  buildSubmission(request: SessionRequest, username: string): { vnc: VncSubmitSettings; lsf: LsfSubmitSettings } {
    const vncDefaults = this.siteConfig.getVncDefaults();
    const lsfDefaults = this.siteConfig.getLsfDefaults();
    const options = this.getUserOptions(username);

    const name = validateSessionName((request.name ?? '').trim() || vncDefaults.name_prefix);

    const resolution = request.resolution ?? vncDefaults.resolution;
    if (!this.siteConfig.getAvailableResolutions().includes(resolution)) {
      validateResolution(resolution);
    }

    const windowManager = requireOneOf(
      request.window_manager ?? request.wm ?? vncDefaults.window_manager,
      options.window_managers,
      'window manager',
    );
    const colorDepth = requireOneOf(request.color_depth ?? vncDefaults.color_depth, COLOR_DEPTHS, 'color depth');
    const queue = requireOneOf(request.queue ?? lsfDefaults.queue, options.queues, 'queue');
    const numCores = requireOneOf(request.num_cores ?? lsfDefaults.num_cores, options.cores, 'number of cores');
    const memoryGb = requireOneOf(request.memory_gb ?? lsfDefaults.memory_gb, options.memory, 'memory');

    const sites = this.siteConfig.getAvailableSites();
    if (request.site && sites.length > 0) {
      requireOneOf(request.site, sites, 'site');
    }

    let osSelect: string | undefined;
    if (request.os) {
      const osOption = options.os_options.find(os => os.name === request.os);
      if (!osOption) {
        throw new ValidationError(`Invalid OS option: ${request.os}`, {
          allowed: options.os_options.map(os => os.name),
        });
      }
      osSelect = osOption.select;
    }

    return {
      vnc: {
        name,
        resolution,
        color_depth: colorDepth,
        window_manager: windowManager,
        vncserver_path: vncDefaults.vncserver_path,
        xstartup_path: vncDefaults.xstartup_path,
        use_custom_xstartup: vncDefaults.use_custom_xstartup,
      },
      lsf: {
        queue,
        num_cores: numCores,
        memory_gb: memoryGb,
        job_name: lsfDefaults.job_name,
        host_filter: lsfDefaults.host_filter,
        os_select: osSelect,
      },
    };
  }

  async createSession(request: SessionRequest, username: string): Promise<SubmittedSession> {
    const { vnc, lsf } = this.buildSubmission(request, username);
    const jobId = await this.lsf.submitJob(vnc, lsf);
    log.audit('Session created', {
      user: username,
      jobId,
      name: vnc.name,
      queue: lsf.queue,
      cores: lsf.num_cores,
      memoryGb: lsf.memory_gb,
    });
    return { job_id: jobId, status: 'pending' };
  }

  /**
   * Submit a new job with the same resources as an existing one
   * @throws NotFoundError when the session is not in the job list
   */
  async copySession(sessionId: string | number, username: string): Promise<SubmittedSession> {
    const id = String(sessionId);
    const jobs = await this.lsf.listJobs();
    const source = jobs.find(job => job.job_id === id);
    if (!source) {
      throw new NotFoundError(`Session with ID ${id} not found`);
    }

    const vncDefaults = this.siteConfig.getVncDefaults();
    const lsfDefaults = this.siteConfig.getLsfDefaults();
    // Resources are copied as-is; the source job already passed validation
    const name = validateSessionName(`Copy of ${source.name}`.substring(0, 64));
    const jobId = await this.lsf.submitJob(
      {
        name,
        resolution: vncDefaults.resolution,
        color_depth: vncDefaults.color_depth,
        window_manager: vncDefaults.window_manager,
        vncserver_path: vncDefaults.vncserver_path,
        xstartup_path: vncDefaults.xstartup_path,
        use_custom_xstartup: vncDefaults.use_custom_xstartup,
      },
      {
        queue: source.queue || lsfDefaults.queue,
        num_cores: source.num_cores,
        memory_gb: source.memory_gb,
        job_name: lsfDefaults.job_name,
        host_filter: lsfDefaults.host_filter,
      },
    );
    log.audit('Session copied', { user: username, source: id, jobId });
    return { job_id: jobId, status: 'pending' };
  }

  async listSessions(): Promise<VncJob[]> {
    const jobs = await this.lsf.listJobs();
    for (const job of jobs) {
      if (!job.host || job.host === 'N/A' || job.host === '-' || job.port !== undefined) continue;
      try {
        const details = await this.lsf.getConnectionDetails(job.job_id);
        if (details) {
          job.host = details.host;
          job.display = details.display;
          job.port = details.port;
        }
      } catch (err) {
        log.warn('Could not get connection details', { jobId: job.job_id, error: errorMessage(err) });
      }
    }
    return jobs;
  }

  async killSession(jobId: string, username: string): Promise<boolean> {
    const killed = await this.lsf.killJob(jobId);
    log.audit(killed ? 'Session killed' : 'Session kill failed', { user: username, jobId });
    return killed;
  }
}

export default VncSessionService;
export { VncSessionService, COLOR_DEPTHS };
