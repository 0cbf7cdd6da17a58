/**
 * Unit tests for the server monitor
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import findProcess from 'find-process';
import {
    runMonitor, parseMonitorOptions, formatLine, lockPathFor, acquireLock, findServerPids,
    STOP_WAIT_SECONDS, HEALTHY_WAIT_SECONDS,
} from '../tools/monitor';
import type { MonitorDeps, MonitorLogger, MonitorOptions } from '../tools/monitor';

jest.mock('find-process', () => ({ __esModule: true, default: jest.fn() }));

interface RecordingLogger extends MonitorLogger {
    lines: Array<[string, string]>;
}

function recordingLogger(): RecordingLogger {
    const lines: Array<[string, string]> = [];
    return {
        lines,
        debug: message => { lines.push(['debug', message]); },
        info: message => { lines.push(['info', message]); },
        warn: message => { lines.push(['warn', message]); },
        error: message => { lines.push(['error', message]); },
    };
}

describe('monitor', () => {
    let dir: string;
    let options: MonitorOptions;
    let logger: RecordingLogger;
    let alive: Set<number>;
    let deps: MonitorDeps & {
        checkHealth: jest.Mock;
        findPids: jest.Mock;
        kill: jest.Mock;
        startCommand: jest.Mock;
        sleep: jest.Mock;
    };

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'vnc-monitor-'));
        options = {
            url: 'http://localhost:9143',
            logfile: path.join(dir, 'monitor.log'),
            restartCmd: './start-server.sh',
            quiet: true,
            timeout: 10,
            verifySsl: true,
            debug: false,
            processPattern: 'manager/server',
        };
        logger = recordingLogger();
        alive = new Set<number>();
        deps = {
            logger,
            checkHealth: jest.fn().mockResolvedValue(true),
            findPids: jest.fn().mockResolvedValue([]),
            isAlive: pid => alive.has(pid),
            kill: jest.fn(),
            startCommand: jest.fn().mockResolvedValue(true),
            sleep: jest.fn().mockResolvedValue(undefined),
            pid: 1234,
        };
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
        jest.restoreAllMocks();
    });

    describe('formatLine', () => {
        it('should format timestamp, level and message', () => {
            expect(formatLine({ level: 'warn', message: 'Server down', timestamp: '2026-10-19 12:00:00' }))
                .toBe('[2026-10-19 12:00:00] [WARN] Server down');
        });
    });

    describe('lockPathFor', () => {
        it('should place a hidden lock beside the log', () => {
            expect(lockPathFor('/var/log/vnc/monitor.log')).toBe('/var/log/vnc/.monitor.lock');
        });
    });

    describe('acquireLock', () => {
        it('should write the PID to a new lock', () => {
            const lockPath = path.join(dir, '.monitor.lock');

            expect(acquireLock(lockPath, 1234, () => false)).toBe(true);
            expect(fs.readFileSync(lockPath, 'utf8')).toBe('1234');
        });

        it('should refuse while a live process holds it', () => {
            const lockPath = path.join(dir, '.monitor.lock');
            fs.writeFileSync(lockPath, '999');

            expect(acquireLock(lockPath, 1234, pid => pid === 999)).toBe(false);
            expect(fs.readFileSync(lockPath, 'utf8')).toBe('999');
        });

        it('should replace a stale lock', () => {
            const lockPath = path.join(dir, '.monitor.lock');
            fs.writeFileSync(lockPath, '999');

            expect(acquireLock(lockPath, 1234, () => false)).toBe(true);
            expect(fs.readFileSync(lockPath, 'utf8')).toBe('1234');
        });

        it('should retry when the lock disappears before it is read', () => {
            const lockPath = path.join(dir, '.monitor.lock');
            fs.writeFileSync(lockPath, '999');
            const realRead = fs.readFileSync;
            jest.spyOn(fs, 'readFileSync').mockImplementationOnce(() => {
                fs.rmSync(lockPath);
                throw Object.assign(new Error('lock vanished'), { code: 'ENOENT' });
            });

            expect(acquireLock(lockPath, 1234, () => true)).toBe(true);
            expect(realRead(lockPath, 'utf8')).toBe('1234');
        });

        it('should rethrow read errors other than a missing lock', () => {
            const lockPath = path.join(dir, '.monitor.lock');
            fs.writeFileSync(lockPath, '999');
            jest.spyOn(fs, 'readFileSync').mockImplementationOnce(() => {
                throw Object.assign(new Error('no access'), { code: 'EACCES' });
            });

            expect(() => acquireLock(lockPath, 1234, () => false)).toThrow('no access');
        });
    });

    describe('findServerPids', () => {
        it('should skip itself and monitor processes', async () => {
            jest.mocked(findProcess).mockResolvedValue([
                { pid: 50, ppid: 1, name: 'node', cmd: 'node dist/manager/server.js' },
                { pid: 60, ppid: 1, name: 'node', cmd: 'node dist/manager/server.js --port 9143' },
                { pid: 70, ppid: 1, name: 'node', cmd: 'node dist/tools/monitor.js --process-pattern manager/server' },
                { pid: 80, ppid: 1, name: 'node', cmd: 'node other.js' },
            ]);

            await expect(findServerPids('manager/server', 50)).resolves.toEqual([60]);
            expect(findProcess).toHaveBeenCalledWith('name', 'manager/server');
        });
    });

    describe('parseMonitorOptions', () => {
        it('should parse flags', () => {
            expect(parseMonitorOptions([
                'node', 'vnc-monitor',
                '--url', 'https://vnc.example.test',
                '--logfile', '/tmp/monitor.log',
                '--restart-cmd', './start-server.sh',
                '--timeout', '5',
                '--no-verify-ssl',
            ])).toEqual({
                url: 'https://vnc.example.test',
                logfile: '/tmp/monitor.log',
                restartCmd: './start-server.sh',
                quiet: false,
                timeout: 5,
                verifySsl: false,
                debug: false,
                processPattern: 'manager/server',
            });
        });
    });

    describe('runMonitor', () => {
        it('should do nothing when the server is healthy', async () => {
            await expect(runMonitor(options, deps)).resolves.toBe(0);

            expect(deps.findPids).not.toHaveBeenCalled();
            expect(deps.startCommand).not.toHaveBeenCalled();
            expect(fs.existsSync(lockPathFor(options.logfile))).toBe(false);
        });

        it('should stop old processes and restart', async () => {
            deps.checkHealth.mockResolvedValueOnce(false).mockResolvedValue(true);
            deps.findPids.mockResolvedValue([111]);
            alive.add(111);
            deps.kill.mockImplementation((pid: number) => { alive.delete(pid); });

            await expect(runMonitor(options, deps)).resolves.toBe(0);

            expect(deps.kill).toHaveBeenCalledWith(111, 'SIGTERM');
            expect(deps.startCommand).toHaveBeenCalledWith('./start-server.sh');
            expect(logger.lines).toContainEqual(['info', 'Sent SIGTERM to process 111']);
            expect(logger.lines[logger.lines.length - 1]).toEqual(['info', 'Server restarted successfully']);
        });

        it('should SIGKILL a process that ignores SIGTERM', async () => {
            deps.checkHealth.mockResolvedValue(false);
            deps.findPids.mockResolvedValue([111]);
            alive.add(111);
            deps.startCommand.mockResolvedValue(false);

            await expect(runMonitor(options, deps)).resolves.toBe(1);

            expect(deps.kill.mock.calls).toEqual([[111, 'SIGTERM'], [111, 'SIGKILL']]);
            expect(deps.sleep).toHaveBeenCalledTimes(STOP_WAIT_SECONDS + 1);
            expect(logger.lines).toContainEqual(['warn', 'Process 111 did not stop, sent SIGKILL']);
            expect(logger.lines).toContainEqual(['error', 'Restart command exited immediately']);
        });

        it('should fail when the server never comes back', async () => {
            deps.checkHealth.mockRejectedValue(new Error('connect ECONNREFUSED'));

            await expect(runMonitor(options, deps)).resolves.toBe(1);

            expect(deps.checkHealth).toHaveBeenCalledTimes(HEALTHY_WAIT_SECONDS + 1);
            expect(logger.lines).toContainEqual(['info', 'No running server processes found']);
            expect(logger.lines[logger.lines.length - 1])
                .toEqual(['error', `Server did not become healthy within ${HEALTHY_WAIT_SECONDS} seconds`]);
            expect(fs.existsSync(lockPathFor(options.logfile))).toBe(false);
        });

        it('should skip when another monitor holds the lock', async () => {
            fs.writeFileSync(lockPathFor(options.logfile), '999');
            alive.add(999);
            const print = jest.spyOn(console, 'log').mockImplementation(() => undefined);

            await expect(runMonitor({ ...options, quiet: false }, deps)).resolves.toBe(0);

            expect(print).toHaveBeenCalledWith('Another monitoring instance is already running, skipping.');
            expect(deps.checkHealth).not.toHaveBeenCalled();
            expect(fs.readFileSync(lockPathFor(options.logfile), 'utf8')).toBe('999');
        });
    });
});
