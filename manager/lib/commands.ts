/**
 * External command execution
 * Runs LSF and ssh binaries without a shell and keeps a short history for the debug API
 */

import { execFile } from 'child_process';
import { log } from './logger';
import { formatTimestamp } from './time';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  timeoutMs?: number;
}

/**
 * Anything that can run a binary with argv.
 * Resolves for any exit status; rejects only when the binary cannot run or times out.
 */
export interface CommandRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
}

export interface CommandHistoryEntry {
  command: string;
  stdout: string;
  stderr: string;
  success: boolean;
  timestamp: string;
}

const MAX_BUFFER = 10 * 1024 * 1024;
const DEFAULT_TIMEOUT_MS = 30000;

/** Render argv the way a user would type it, quoting arguments with spaces */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map(arg => (/[\s"';]/.test(arg) ? `"${arg.replace(/"/g, '\\"')}"` : arg))
    .join(' ');
}

export class ExecFileRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    const timeout = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    log.debugFor('lsf', 'exec', { command: formatCommand(command, args), timeout });

    return new Promise((resolve, reject) => {
      execFile(command, args, { timeout, maxBuffer: MAX_BUFFER }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }
        // Non-zero exit: error.code is the numeric status
        if (typeof error.code === 'number') {
          resolve({ stdout, stderr, exitCode: error.code });
          return;
        }
        if (error.killed) {
          reject(new Error(`${command} timed out after ${timeout}ms`));
          return;
        }
        reject(new Error(`${command} could not be run: ${error.message}`));
      });
    });
  }
}

/** Bounded, newest-last record of executed commands */
export class CommandHistory {
  private entries: CommandHistoryEntry[] = [];

  constructor(private readonly limit = 100) {}

  record(command: string, result: Partial<CommandResult> & { success: boolean }): CommandHistoryEntry {
    const entry: CommandHistoryEntry = {
      command,
      stdout: result.stdout ?? '',
      stderr: result.stderr ?? '',
      success: result.success,
      timestamp: formatTimestamp(),
    };
    this.entries.push(entry);
    if (this.entries.length > this.limit) {
      this.entries.splice(0, this.entries.length - this.limit);
    }
    return entry;
  }

  /** Most recent entries, oldest first */
  list(limit?: number): CommandHistoryEntry[] {
    if (limit === undefined || limit >= this.entries.length) return [...this.entries];
    return this.entries.slice(this.entries.length - limit);
  }

  clear(): void {
    this.entries = [];
  }
}
