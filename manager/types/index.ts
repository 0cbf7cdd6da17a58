/**
 * Core type definitions for the VNC session manager
 */

import { Request } from 'express';

// ============================================================================
// Site Configuration Types
// ============================================================================

export interface VncDefaults {
  resolution: string;
  window_manager: string;
  color_depth: number;
  site: string;
  vncserver_path: string;
  name_prefix: string;
  xstartup_path: string;
  use_custom_xstartup: boolean;
}

export interface VncConfig {
  default_settings: VncDefaults;
  available_window_managers: string[];
  available_resolutions: string[];
  enabled_window_managers?: string[];
  enabled_resolutions?: string[];
  window_manager_configs?: Record<string, unknown>;
}

export interface LsfDefaults {
  queue: string;
  num_cores: number;
  memory_gb: number;
  job_name: string;
  host_filter: string;
}

export interface SiteEntry {
  name: string;
  domain: string;
}

export interface OsOption {
  name: string;
  select: string;
  container?: string;
}

export interface BindpathSet {
  name: string;
  paths: string[];
}

export interface LsfConfig {
  default_settings: LsfDefaults;
  available_queues: string[];
  memory_options_gb: number[];
  core_options: number[];
  available_sites: SiteEntry[];
  os_options: OsOption[];
  bindpaths: BindpathSet[];
  enabled_queues?: string[];
  enabled_memory_options_gb?: number[];
  enabled_core_options?: number[];
  enabled_os_options?: string[];
}

export type AuthMethod = 'ldap' | 'entra' | '';

export interface OverridePolicy {
  allow_cores_override: boolean;
  allow_memory_override: boolean;
  allow_window_manager_override: boolean;
  allow_queue_override: boolean;
  allow_os_override: boolean;
}

export interface ServerConfig {
  host: string;
  port: number;
  debug: boolean;
  /** Request timeout in seconds */
  timeout: number;
  logdir?: string;
  datadir?: string;
  authentication: AuthMethod;
  managers: string[];
  manager_overrides: OverridePolicy;
  ssl_cert?: string;
  ssl_key?: string;
  ssl_ca_chain?: string;
}

export interface PublicServerConfig extends Omit<ServerConfig, 'ssl_cert' | 'ssl_key' | 'ssl_ca_chain'> {
  auth_enabled: boolean;
  ssl_enabled: boolean;
}

// ============================================================================
// Per-user Option Types
// ============================================================================

/** Stored per-user restriction; null keeps the global list */
export interface OverrideFields {
  cores: number[] | null;
  memory: number[] | null;
  window_managers: string[] | null;
  queues: string[] | null;
  os_options: string[] | null;
}

export interface ManagerOverride extends OverrideFields {
  username: string;
  updated_by: string | null;
  created_at: number;
  updated_at: number;
}

export interface UserOptions {
  cores: number[];
  memory: number[];
  window_managers: string[];
  queues: string[];
  os_options: OsOption[];
}

// ============================================================================
// Job / Session Types
// ============================================================================

export interface VncJob {
  job_id: string;
  name: string;
  status: string;
  queue: string;
  from_host: string;
  exec_host: string;
  host: string;
  user: string;
  num_cores: number;
  memory_gb: number;
  submit_time: string | null;
  submit_time_raw: string;
  runtime: string;
  runtime_display: string;
  run_time_seconds: number;
  display?: number;
  port?: number;
}

export interface ConnectionDetails {
  host: string;
  display: number;
  port: number;
  connection_string: string;
}

/** Fully resolved arguments for one bsub submission */
export interface VncSubmitSettings {
  name: string;
  resolution: string;
  color_depth: number;
  window_manager: string;
  vncserver_path: string;
  xstartup_path: string;
  use_custom_xstartup: boolean;
}

export interface LsfSubmitSettings {
  queue: string;
  num_cores: number;
  memory_gb: number;
  job_name: string;
  host_filter: string;
  os_select?: string;
}

export interface CreateSessionRequest {
  name?: string;
  resolution?: string;
  window_manager?: string;
  color_depth?: number;
  site?: string;
  queue?: string;
  num_cores?: number;
  memory_gb?: number;
  os?: string;
}

// ============================================================================
// Auth Types
// ============================================================================

export interface AuthUser {
  username: string;
  display_name: string;
  email: string;
  groups: string[];
  auth_method: AuthMethod;
}

export interface AuthSession extends AuthUser {
  session_id: string;
  created_at: number;
  expires_at: number;
  last_access: number;
}

export interface AuthResult {
  success: boolean;
  message: string;
  user?: AuthUser;
}

export interface AuthenticatedRequest extends Request {
  user?: AuthUser;
  sessionId?: string;
}
