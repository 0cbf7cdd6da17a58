/**
 * HTTP client for the session manager API, used by the CLI
 */

import axios, { AxiosInstance } from 'axios';
import { errorMessage } from '../lib/errors';
import type { SiteConfig } from '../lib/site-config';
import type { PublicServerConfig, VncDefaults, LsfDefaults, VncJob, OsOption } from '../types';

export interface VncConfigResponse {
  window_managers: string[];
  resolutions: string[];
  defaults: VncDefaults;
  sites: string[];
  enabled_window_managers: string[];
  enabled_resolutions: string[];
}

export interface LsfConfigResponse {
  defaults: LsfDefaults;
  queues: string[];
  memory_options: number[];
  core_options: number[];
  sites: string[];
  os_options: OsOption[];
}

export interface CreateSessionBody {
  name: string;
  resolution: string;
  window_manager: string;
  color_depth: number;
  site?: string;
  queue: string;
  num_cores: number;
  memory_gb: number;
  os?: string;
}

export interface ActionResponse {
  success: boolean;
  message: string;
  job_id?: string;
  status?: string;
}

const REQUEST_TIMEOUT_MS = 60000;

/**
 * Server URL: explicit option, then VNC_SERVER_URL, then the server config
 */
export function resolveServerUrl(
  siteConfig: SiteConfig,
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const url = explicit || env.VNC_SERVER_URL;
  if (url) return url.replace(/\/+$/, '');
  const scheme = siteConfig.isSslEnabled() ? 'https' : 'http';
  return `${scheme}://${siteConfig.server.host}:${siteConfig.server.port}`;
}

/**
 * Prefer the API's own message over axios' "Request failed with status code N"
 */
export function describeApiError(err: unknown): string {
  if (axios.isAxiosError(err)) {
    const data: unknown = err.response?.data;
    if (data && typeof data === 'object' && 'message' in data && typeof data.message === 'string') {
      return data.message;
    }
    if (!err.response) {
      return `Could not reach server: ${err.message}`;
    }
  }
  return errorMessage(err);
}

export class VncApiClient {
  private client: AxiosInstance;

  constructor(baseUrl: string, client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: `${baseUrl}/api`,
      timeout: REQUEST_TIMEOUT_MS,
      headers: { 'Content-Type': 'application/json' },
    });
  }

  async listSessions(): Promise<VncJob[]> {
    const response = await this.client.get<VncJob[]>('/vnc/list');
    return response.data;
  }

  async getVncConfig(): Promise<VncConfigResponse> {
    const response = await this.client.get<VncConfigResponse>('/config/vnc');
    return response.data;
  }

  async getLsfConfig(): Promise<LsfConfigResponse> {
    const response = await this.client.get<LsfConfigResponse>('/config/lsf');
    return response.data;
  }

  async getServerConfig(): Promise<PublicServerConfig> {
    const response = await this.client.get<PublicServerConfig>('/config/server');
    return response.data;
  }

  async createSession(body: CreateSessionBody): Promise<ActionResponse> {
    const response = await this.client.post<ActionResponse>('/vnc/create', body);
    return response.data;
  }

  async killSession(jobId: string): Promise<ActionResponse> {
    const response = await this.client.post<ActionResponse>(`/vnc/kill/${encodeURIComponent(jobId)}`);
    return response.data;
  }
}

export default VncApiClient;
