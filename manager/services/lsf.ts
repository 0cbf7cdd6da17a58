/**
 * LSF Service
 * Submits, lists and kills VNC jobs through bsub/bjobs/bkill and finds
 * their X display by probing the execution host over ssh
 */

import { config } from '../config';
import { log } from '../lib/logger';
import { SchedulerError, errorMessage } from '../lib/errors';
import { CommandRunner, CommandResult, CommandHistory, ExecFileRunner, formatCommand } from '../lib/commands';
import { withHostQueue } from '../lib/ssh-queue';
import { validateJobId, validateHostname, validateUsername } from '../lib/validation';
import { parseRuntimeSeconds, formatRuntime, parseSubmitTime } from '../lib/helpers';
import {
  DEFAULT_CORES, DEFAULT_MEMORY_GB,
  isDelimiterUnsupported, parseDelimitedJobs, parseWideJobs, parseWideRunHost,
  cleanHost, sanitizeHost, parseStartedHost, parseExecHost, parseJobUser,
  parseSessionName, parseCores, parseMemoryGb, parseSubmittedAt, parseSubmittedJobId,
  parseDisplay, displayToPort,
} from '../lib/lsf-parsers';
import type { DelimitedJobRow } from '../lib/lsf-parsers';
import type { VncJob, ConnectionDetails, VncSubmitSettings, LsfSubmitSettings } from '../types';

export interface LsfServiceOptions {
  runner?: CommandRunner;
  history?: CommandHistory;
  /** Account whose jobs are listed */
  user?: string;
  /** -J name shared by every VNC job */
  jobName?: string;
  commandTimeoutMs?: number;
  probeTimeoutMs?: number;
  now?: () => Date;
}

interface KillJobsResult {
  killed: string[];
  failed: string[];
}

const BJOBS_FORMAT = "jobid stat user queue first_host run_time command delimiter=';'";

const SSH_OPTIONS = ['-o', 'BatchMode=yes', '-o', 'ConnectTimeout=5'];

function isUsableHost(host: string | null | undefined): host is string {
  return Boolean(host) && host !== 'N/A' && host !== '-';
}

class LsfService {
  private runner: CommandRunner;
  private history: CommandHistory;
  readonly user: string;
  readonly jobName: string;
  private commandTimeoutMs: number;
  private probeTimeoutMs: number;
  private now: () => Date;

  constructor(options: LsfServiceOptions = {}) {
    this.runner = options.runner ?? new ExecFileRunner();
    this.history = options.history ?? new CommandHistory(config.commandHistoryLimit);
    this.user = options.user ?? config.lsfUser;
    this.jobName = options.jobName ?? 'vnc_session';
    this.commandTimeoutMs = options.commandTimeoutMs ?? config.lsfCommandTimeoutMs;
    this.probeTimeoutMs = options.probeTimeoutMs ?? config.sshProbeTimeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Run a command and record it in history
   * @throws SchedulerError when the binary cannot be run
   */
  private async exec(command: string, args: string[], timeoutMs = this.commandTimeoutMs): Promise<CommandResult> {
    const line = formatCommand(command, args);
    log.lsf('Executing', { command: line.substring(0, 200) });
    log.debugFor('lsf', 'full command', { command: line });

    let result: CommandResult;
    try {
      result = await this.runner.run(command, args, { timeoutMs });
    } catch (err) {
      this.history.record(line, { stderr: errorMessage(err), success: false });
      log.error('Command could not be run', { command: line, error: errorMessage(err) });
      throw new SchedulerError(errorMessage(err), { command: line });
    }

    const success = result.exitCode === 0;
    this.history.record(line, { ...result, success });
    if (!success) {
      log.warn('Command exited non-zero', { command: line, exitCode: result.exitCode, stderr: result.stderr.trim() });
    }
    return result;
  }

  /**
   * Run a command that must succeed
   * @returns stdout
   */
  private async execOk(command: string, args: string[]): Promise<string> {
    const result = await this.exec(command, args);
    if (result.exitCode !== 0) {
      throw new SchedulerError(`Command failed: ${result.stderr.trim() || `exit code ${result.exitCode}`}`, {
        command: formatCommand(command, args),
      });
    }
    return result.stdout;
  }

  /**
   * Build the bsub argv for a VNC session
   */
  buildSubmitArgs(vnc: VncSubmitSettings, lsf: LsfSubmitSettings): string[] {
    const args = [
      '-q', lsf.queue,
      '-n', String(lsf.num_cores),
      '-R', `rusage[mem=${lsf.memory_gb}G]`,
    ];
    if (lsf.os_select && lsf.os_select.trim()) {
      args.push('-R', `select[${lsf.os_select.trim()}]`);
    }
    args.push('-J', lsf.job_name);
    if (lsf.host_filter && lsf.host_filter.trim()) {
      args.push('-m', lsf.host_filter.trim());
    }

    const vncArgs = [
      vnc.vncserver_path,
      '-geometry', vnc.resolution,
      '-depth', String(vnc.color_depth),
    ];
    if (vnc.name && vnc.name.trim()) {
      vncArgs.push('-name', vnc.name.trim());
    }
    if (vnc.use_custom_xstartup && vnc.xstartup_path && vnc.xstartup_path.trim()) {
      vncArgs.push('-xstartup', vnc.xstartup_path.trim());
      // read by the xstartup script to pick the desktop
      args.push('-env', `WINDOW_MANAGER=${vnc.window_manager}`);
    }

    return [...args, ...vncArgs];
  }

  /**
   * Submit a VNC job
   * @returns LSF job ID, or 'unknown' when bsub printed no ID
   */
  async submitJob(vnc: VncSubmitSettings, lsf: LsfSubmitSettings): Promise<string> {
    const args = this.buildSubmitArgs(vnc, lsf);
    const stdout = await this.execOk('bsub', args);
    const jobId = parseSubmittedJobId(stdout);
    if (jobId === 'unknown') {
      log.warn('bsub output contained no job ID', { stdout: stdout.trim() });
    }
    log.job('Submitted', {
      jobId,
      queue: lsf.queue,
      cores: lsf.num_cores,
      memoryGb: lsf.memory_gb,
      resolution: vnc.resolution,
      name: vnc.name,
    });
    return jobId;
  }

  /**
   * Kill a VNC job
   * @returns true when bkill succeeded
   */
  async killJob(jobId: string): Promise<boolean> {
    const id = validateJobId(jobId);
    log.job('Killing', { jobId: id });
    try {
      const result = await this.exec('bkill', [id]);
      if (result.exitCode !== 0) {
        log.warn('bkill failed', { jobId: id, stderr: result.stderr.trim() });
        return false;
      }
      return true;
    } catch (err) {
      log.error('bkill could not be run', { jobId: id, error: errorMessage(err) });
      return false;
    }
  }

  /**
   * Kill several jobs with one bkill call
   */
  async killJobs(jobIds: string[]): Promise<KillJobsResult> {
    if (jobIds.length === 0) {
      return { killed: [], failed: [] };
    }
    const ids = jobIds.map(validateJobId);
    try {
      const result = await this.exec('bkill', ids);
      if (result.exitCode === 0) {
        log.job('Batch killed', { jobIds: ids, count: ids.length });
        return { killed: ids, failed: [] };
      }
      // bkill reports per-job failures as "Job <id>: ..." on stderr
      const failed = ids.filter(id => result.stderr.includes(`<${id}>`));
      const killed = ids.filter(id => !failed.includes(id));
      log.warn('Batch kill partially failed', { killed, failed });
      return failed.length > 0 ? { killed, failed } : { killed: [], failed: ids };
    } catch (err) {
      log.warn('Batch kill failed', { jobIds: ids, error: errorMessage(err) });
      return { killed: [], failed: ids };
    }
  }

  /**
   * List this account's VNC jobs with host, resources and display
   */
  async listJobs(): Promise<VncJob[]> {
    const timer = log.startTimer('listJobs');
    const user = validateUsername(this.user);
    const result = await this.exec('bjobs', [
      '-o', BJOBS_FORMAT, '-noheader', '-u', user, '-J', this.jobName,
    ]);

    if (result.stderr.trim()) {
      if (isDelimiterUnsupported(result.stderr)) {
        log.info('bjobs does not support delimiter output, using wide format');
        return this.listJobsWide(user);
      }
      if (!result.stdout.trim()) {
        // "No unfinished job found" lands here
        log.debugFor('lsf', 'bjobs stderr', { stderr: result.stderr.trim() });
        return [];
      }
    }

    const rows = parseDelimitedJobs(result.stdout);
    const jobs = await Promise.all(rows.map(row => this.buildJob(row)));
    timer.done({ jobs: jobs.length });
    return jobs;
  }

  /**
   * Fallback listing for LSF releases without -o delimiter support
   */
  private async listJobsWide(user: string): Promise<VncJob[]> {
    const result = await this.exec('bjobs', ['-u', user, '-J', this.jobName, '-w']);
    if (result.exitCode !== 0 && !result.stdout.trim()) {
      return [];
    }
    return parseWideJobs(result.stdout).map(row => ({
      job_id: row.jobId,
      name: row.jobName,
      status: row.status,
      queue: row.queue,
      from_host: row.fromHost,
      exec_host: row.execHost,
      host: row.execHost,
      user: row.user,
      num_cores: DEFAULT_CORES,
      memory_gb: DEFAULT_MEMORY_GB,
      submit_time: parseSubmitTime(row.submitTimeRaw, this.now()),
      submit_time_raw: row.submitTimeRaw,
      runtime: 'N/A',
      runtime_display: 'N/A',
      run_time_seconds: 0,
    }));
  }

  /**
   * Combine a bjobs row with `bjobs -l` detail and the display probe
   */
  private async buildJob(row: DelimitedJobRow): Promise<VncJob> {
    const runTimeSeconds = parseRuntimeSeconds(row.runTimeRaw);
    const runtime = formatRuntime(runTimeSeconds, row.status);

    let execHost = row.firstHost;
    let host = cleanHost(row.firstHost);
    let name = parseSessionName(row.command);
    let cores = DEFAULT_CORES;
    let memoryGb = DEFAULT_MEMORY_GB;
    let submitRaw = '';

    try {
      const detail = await this.execOk('bjobs', ['-l', validateJobId(row.jobId)]);
      execHost = parseStartedHost(detail) ?? row.firstHost;
      host = cleanHost(execHost);
      name = parseSessionName(row.command, detail);
      cores = parseCores(detail);
      memoryGb = parseMemoryGb(detail);
      submitRaw = parseSubmittedAt(detail) ?? '';
    } catch (err) {
      log.warn('Could not read job detail', { jobId: row.jobId, error: errorMessage(err) });
    }

    const job: VncJob = {
      job_id: row.jobId,
      name,
      status: row.status,
      queue: row.queue,
      from_host: row.firstHost,
      exec_host: execHost,
      host,
      user: row.user,
      num_cores: cores,
      memory_gb: memoryGb,
      submit_time: parseSubmitTime(submitRaw, this.now()),
      submit_time_raw: submitRaw,
      runtime,
      runtime_display: runtime,
      run_time_seconds: runTimeSeconds,
    };

    if (isUsableHost(host)) {
      const display = await this.probeDisplay(host, row.user || this.user);
      if (display !== null) {
        job.display = display;
        job.port = displayToPort(display);
      }
    }
    return job;
  }

  /**
   * Find the Xvnc display owned by a user on a host
   * @returns Display number, or null when unreachable or no Xvnc runs
   */
  async probeDisplay(host: string, user: string): Promise<number | null> {
    let safeHost: string;
    let safeUser: string;
    try {
      safeHost = validateHostname(sanitizeHost(host));
      safeUser = validateUsername(user);
    } catch (err) {
      log.warn('Skipping display probe', { host, user, error: errorMessage(err) });
      return null;
    }

    return withHostQueue(safeHost, async () => {
      log.ssh('Probing display', { host: safeHost, user: safeUser });
      try {
        const result = await this.exec('ssh', [
          ...SSH_OPTIONS, safeHost, 'ps', '-u', safeUser, '-o', 'pid,command',
        ], this.probeTimeoutMs);
        const display = parseDisplay(result.stdout);
        log.debugFor('ssh', 'Display probe result', { host: safeHost, display });
        return display;
      } catch (err) {
        log.warn('Display probe failed', { host: safeHost, error: errorMessage(err) });
        return null;
      }
    });
  }

  /**
   * Resolve host, display and port for a running job
   * @returns null when the job has no host yet or no Xvnc display is found
   */
  async getConnectionDetails(jobId: string): Promise<ConnectionDetails | null> {
    const id = validateJobId(jobId);

    let host: string | null = null;
    let detail = '';
    try {
      const wide = await this.exec('bjobs', ['-w', id]);
      host = parseWideRunHost(wide.stdout);

      if (!host) {
        detail = (await this.exec('bjobs', ['-l', id])).stdout;
        host = parseStartedHost(detail) ?? parseExecHost(detail);
      }
    } catch (err) {
      log.warn('Could not query job for connection details', { jobId: id, error: errorMessage(err) });
      return null;
    }

    if (!host) {
      log.warn('Could not determine execution host', { jobId: id });
      return null;
    }

    const cleaned = sanitizeHost(cleanHost(host));
    if (!cleaned) {
      log.warn('Execution host is invalid after cleaning', { jobId: id, host });
      return null;
    }

    const user = parseJobUser(detail) ?? this.user;
    const display = await this.probeDisplay(cleaned, user);
    if (display === null) {
      log.info('No Xvnc display found for job', { jobId: id, host: cleaned });
      return null;
    }

    return {
      host: cleaned,
      display,
      port: displayToPort(display),
      connection_string: `${cleaned}:${display}`,
    };
  }

  getCommandHistory(limit?: number) {
    return this.history.list(limit);
  }
}

export default LsfService;
export { LsfService, BJOBS_FORMAT };
export type { KillJobsResult };
