/**
 * LSF output parsers
 *
 * bjobs and ps print semi-structured text. Every function here is pure and
 * tolerant: unrecognized input yields a default or null, never a throw.
 */

export const DEFAULT_SESSION_NAME = 'VNC Session';
export const DEFAULT_CORES = 2;
export const DEFAULT_MEMORY_GB = 16;
export const VNC_BASE_PORT = 5900;

/** One row of `bjobs -o "... delimiter=';'" -noheader` */
export interface DelimitedJobRow {
  jobId: string;
  status: string;
  user: string;
  queue: string;
  firstHost: string;
  runTimeRaw: string;
  command: string;
}

/** One row of `bjobs -w` */
export interface WideJobRow {
  jobId: string;
  user: string;
  status: string;
  queue: string;
  fromHost: string;
  execHost: string;
  jobName: string;
  submitTimeRaw: string;
}

/** Older LSF rejects the delimiter keyword and complains about a job ID */
export function isDelimiterUnsupported(stderr: string): boolean {
  return stderr.includes('delimiter') && stderr.includes('Illegal job ID');
}

export function parseDelimitedJobs(stdout: string): DelimitedJobRow[] {
  const rows: DelimitedJobRow[] = [];
  for (const line of stdout.split('\n')) {
    if (!line.trim()) continue;
    const fields = line.split(';').map(f => f.trim());
    if (fields.length < 6) continue;
    rows.push({
      jobId: fields[0],
      status: fields[1],
      user: fields[2],
      queue: fields[3],
      firstHost: fields[4],
      runTimeRaw: fields[5],
      // the command itself may contain ';'
      command: fields.slice(6).join(';'),
    });
  }
  return rows;
}

const MONTH_NAME = /^(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)$/;

/** "Oct 19 08:15" spans three fields; a bare "08:15" or "19 08:15" spans two */
function submitTimeFieldCount(fields: string[]): number {
  return MONTH_NAME.test(fields[fields.length - 3]) ? 3 : 2;
}

/**
 * Parse `bjobs -w` output
 * Columns: JOBID USER STAT QUEUE FROM_HOST EXEC_HOST JOB_NAME SUBMIT_TIME
 */
export function parseWideJobs(stdout: string): WideJobRow[] {
  const lines = stdout.trim().split('\n');
  const rows: WideJobRow[] = [];
  for (const line of lines.slice(1)) {
    if (!line.trim()) continue;
    const fields = line.trim().split(/\s+/);
    if (fields.length < 7) continue;
    const timeCount = submitTimeFieldCount(fields);
    // A pending job can leave EXEC_HOST blank, which drops a column
    const execMissing = fields.length - timeCount === 6;
    rows.push({
      jobId: fields[0],
      user: fields[1],
      status: fields[2],
      queue: fields[3],
      fromHost: fields[4],
      execHost: execMissing ? '-' : fields[5],
      jobName: execMissing ? fields[5] : fields[6],
      submitTimeRaw: fields.slice(-timeCount).join(' '),
    });
  }
  return rows;
}

/**
 * Reduce an LSF host spec to a short hostname
 * "4*node12.example.org:node13" -> "node12", "node12*2" -> "node12"
 */
export function cleanHost(execHost: string): string {
  let host = execHost.replace(/^\d+\*/, '');
  if (host.includes('*')) host = host.split('*')[0];
  if (host.includes(':')) host = host.split(':')[0];
  if (host.includes('.')) host = host.split('.')[0];
  return host;
}

/** Keep only characters valid in a hostname */
export function sanitizeHost(host: string): string {
  return host.trim().replace(/[^A-Za-z0-9.-]/g, '');
}

export function parseStartedHost(detail: string): string | null {
  const match = detail.match(/Started on <([^>]+)>/);
  return match ? match[1] : null;
}

export function parseExecHost(detail: string): string | null {
  const match = detail.match(/EXEC_HOST\s*:\s*(\S+)/i);
  return match ? match[1].split(':')[0] : null;
}

export function parseJobUser(detail: string): string | null {
  const match = detail.match(/User <([^>]+)>/);
  return match ? match[1] : null;
}

/** Host from the RUN line of `bjobs -w <id>`, null when pending or absent */
export function parseWideRunHost(stdout: string): string | null {
  const lines = stdout.trim().split('\n');
  if (lines.length < 2) return null;
  const jobLine = lines[1];
  const fields = jobLine.trim().split(/\s+/);
  if (fields.length < 6 || !jobLine.includes('RUN')) return null;
  const execHost = fields[5];
  if (!execHost || execHost === '-') return null;
  return execHost.split(':')[0];
}

// bjobs -l wraps the command in <...>, so stop at angle brackets
const NAME_PATTERN = /-name\s+([^\s"<>]+|"([^"]+)")/;

/** The vncserver -name argument, looked up in the command then the detail */
export function parseSessionName(command: string, detail = ''): string {
  const match = command.match(NAME_PATTERN) ?? detail.match(NAME_PATTERN);
  if (!match) return DEFAULT_SESSION_NAME;
  return match[2] ?? match[1];
}

export function parseCores(detail: string): number {
  const match = detail.match(/(\d+)\s+Task\(s\)/);
  return match ? parseInt(match[1], 10) : DEFAULT_CORES;
}

/** rusage[mem=N{K,M,G}] in GB, rounded to two places; no unit means GB */
export function parseMemoryGb(detail: string): number {
  const match = detail.match(/rusage\[mem=(\d+(\.\d+)?)([KMG]?)\]/);
  if (!match) return DEFAULT_MEMORY_GB;
  const value = parseFloat(match[1]);
  let gb: number;
  switch (match[3]) {
    case 'K':
      gb = value / (1024 * 1024);
      break;
    case 'M':
      gb = value / 1024;
      break;
    default:
      gb = value;
  }
  return Math.round(gb * 100) / 100;
}

/**
 * Submission time from `bjobs -l`, e.g. "Mon Oct 19 10:12:33: Submitted from host"
 * @returns "Oct 19 10:12", ready for parseSubmitTime
 */
export function parseSubmittedAt(detail: string): string | null {
  const match = detail.match(/(?:[A-Z][a-z]{2}\s+)?([A-Z][a-z]{2})\s+(\d{1,2})\s+(\d{1,2}:\d{2})(?::\d{2})?(?:\s+\d{4})?:\s+Submitted from host/);
  return match ? `${match[1]} ${match[2]} ${match[3]}` : null;
}

export function parseSubmittedJobId(stdout: string): string {
  const match = stdout.match(/Job <(\d+)>/);
  return match ? match[1] : 'unknown';
}

/** X display number from `ps -o pid,command` output, null when no Xvnc is running */
export function parseDisplay(psOutput: string): number | null {
  const xvncLines = psOutput.split('\n').filter(line => line.includes('Xvnc')).join('\n');
  const direct = xvncLines.match(/Xvnc\s+:\s*(\d+)/);
  if (direct) return parseInt(direct[1], 10);
  const loose = xvncLines.match(/Xvnc.*?:(\d+)/);
  return loose ? parseInt(loose[1], 10) : null;
}

export function displayToPort(display: number): number {
  return VNC_BASE_PORT + display;
}
