/**
 * Unit tests for LsfService
 */

import { LsfService, BJOBS_FORMAT } from '../services/lsf';
import { CommandHistory } from '../lib/commands';
import { withHostQueue, clearQueues } from '../lib/ssh-queue';
import { SchedulerError, ValidationError } from '../lib/errors';
import {
    FakeRunner, ok, fail,
    MOCK_BSUB_OUTPUT, MOCK_BJOBS_DELIMITED, MOCK_BJOBS_DETAIL, MOCK_BJOBS_WIDE,
    MOCK_BJOBS_STDERR, MOCK_PS_OUTPUT,
} from './__mocks__/lsfCommands';
import type { VncSubmitSettings, LsfSubmitSettings } from '../types';

const NOW = new Date(2026, 9, 19, 12, 0, 0);

function createService(runner: FakeRunner): LsfService {
    return new LsfService({
        runner,
        history: new CommandHistory(50),
        user: 'testuser',
        jobName: 'vnc_session',
        probeTimeoutMs: 1234,
        now: () => NOW,
    });
}

const VNC: VncSubmitSettings = {
    name: '  my desk ',
    resolution: '1920x1080',
    color_depth: 24,
    window_manager: 'xfce',
    vncserver_path: '/usr/bin/vncserver',
    xstartup_path: '/opt/xstartup',
    use_custom_xstartup: true,
};

const LSF: LsfSubmitSettings = {
    queue: 'interactive',
    num_cores: 4,
    memory_gb: 16,
    job_name: 'vnc_session',
    host_filter: 'rhel8hosts',
    os_select: 'rhel8',
};

describe('LsfService', () => {
    afterEach(() => {
        clearQueues();
    });

    describe('ssh queue', () => {
        it('should run work for one host in order', async () => {
            const order: string[] = [];
            let releaseFirst = (): void => undefined;
            const first = withHostQueue('node12', () => new Promise<void>(resolve => {
                releaseFirst = () => { order.push('first'); resolve(); };
            }));
            const second = withHostQueue('node12', async () => { order.push('second'); });
            const other = withHostQueue('node13', async () => { order.push('other'); });

            await other;
            expect(order).toEqual(['other']);
            releaseFirst();
            await Promise.all([first, second]);
            expect(order).toEqual(['other', 'first', 'second']);
        });

        it('should start a fresh chain once the queues are cleared', async () => {
            void withHostQueue('node12', () => new Promise<never>(() => undefined));
            clearQueues();

            await expect(withHostQueue('node12', async () => 'ran')).resolves.toBe('ran');
        });
    });

    describe('buildSubmitArgs', () => {
        it('should include every optional argument when configured', () => {
            const service = createService(new FakeRunner(() => ok('')));

            expect(service.buildSubmitArgs(VNC, LSF)).toEqual([
                '-q', 'interactive',
                '-n', '4',
                '-R', 'rusage[mem=16G]',
                '-R', 'select[rhel8]',
                '-J', 'vnc_session',
                '-m', 'rhel8hosts',
                '-env', 'WINDOW_MANAGER=xfce',
                '/usr/bin/vncserver',
                '-geometry', '1920x1080',
                '-depth', '24',
                '-name', 'my desk',
                '-xstartup', '/opt/xstartup',
            ]);
        });

        it('should leave out empty optional arguments', () => {
            const service = createService(new FakeRunner(() => ok('')));
            const args = service.buildSubmitArgs(
                { ...VNC, name: 'desk', resolution: '1280x1024', color_depth: 16, use_custom_xstartup: false },
                { ...LSF, num_cores: 2, memory_gb: 8, host_filter: '', os_select: '' },
            );

            expect(args).toEqual([
                '-q', 'interactive',
                '-n', '2',
                '-R', 'rusage[mem=8G]',
                '-J', 'vnc_session',
                '/usr/bin/vncserver',
                '-geometry', '1280x1024',
                '-depth', '16',
                '-name', 'desk',
            ]);
        });
    });

    describe('submitJob', () => {
        it('should return the job ID printed by bsub', async () => {
            const runner = new FakeRunner(() => ok(MOCK_BSUB_OUTPUT.submitted));
            const service = createService(runner);

            await expect(service.submitJob(VNC, LSF)).resolves.toBe('4321');
            expect(runner.callsFor('bsub')).toHaveLength(1);
        });

        it('should return unknown when bsub printed no ID', async () => {
            const service = createService(new FakeRunner(() => ok(MOCK_BSUB_OUTPUT.noId)));
            await expect(service.submitJob(VNC, LSF)).resolves.toBe('unknown');
        });

        it('should raise a SchedulerError with bsub stderr', async () => {
            const service = createService(new FakeRunner(() => fail('Queue does not exist')));

            await expect(service.submitJob(VNC, LSF)).rejects.toThrow('Command failed: Queue does not exist');
            await expect(service.submitJob(VNC, LSF)).rejects.toBeInstanceOf(SchedulerError);
        });

        it('should record a binary that cannot run', async () => {
            const service = createService(new FakeRunner(() => new Error('spawn bsub ENOENT')));

            await expect(service.submitJob(VNC, LSF)).rejects.toThrow('spawn bsub ENOENT');
            const history = service.getCommandHistory();
            expect(history).toHaveLength(1);
            expect(history[0].success).toBe(false);
            expect(history[0].stderr).toBe('spawn bsub ENOENT');
        });
    });

    describe('killJob', () => {
        it('should return true when bkill succeeds', async () => {
            const runner = new FakeRunner(() => ok('Job <1001> is being terminated'));
            const service = createService(runner);

            await expect(service.killJob('1001')).resolves.toBe(true);
            expect(runner.calls[0]).toMatchObject({ command: 'bkill', args: ['1001'] });
        });

        it('should return false when bkill fails', async () => {
            const service = createService(new FakeRunner(() => fail('Job <1001>: No matching job found', 1)));
            await expect(service.killJob('1001')).resolves.toBe(false);
        });

        it('should reject an invalid job ID before running anything', async () => {
            const runner = new FakeRunner(() => ok(''));
            const service = createService(runner);

            await expect(service.killJob('1; rm -rf /')).rejects.toBeInstanceOf(ValidationError);
            expect(runner.calls).toHaveLength(0);
        });
    });

    describe('killJobs', () => {
        it('should kill every job in one call', async () => {
            const runner = new FakeRunner(() => ok(''));
            const service = createService(runner);

            await expect(service.killJobs(['1', '2'])).resolves.toEqual({ killed: ['1', '2'], failed: [] });
            expect(runner.calls[0].args).toEqual(['1', '2']);
        });

        it('should split killed and failed jobs from stderr', async () => {
            const service = createService(new FakeRunner(() => fail('Job <2>: No matching job found')));
            await expect(service.killJobs(['1', '2'])).resolves.toEqual({ killed: ['1'], failed: ['2'] });
        });

        it('should fail every job when stderr names none', async () => {
            const service = createService(new FakeRunner(() => fail('bkill: internal error')));
            await expect(service.killJobs(['1', '2'])).resolves.toEqual({ killed: [], failed: ['1', '2'] });
        });

        it('should do nothing for an empty list', async () => {
            const runner = new FakeRunner(() => ok(''));
            await expect(createService(runner).killJobs([])).resolves.toEqual({ killed: [], failed: [] });
            expect(runner.calls).toHaveLength(0);
        });
    });

    describe('listJobs', () => {
        const lsfResponder = (listing: string, detailFails = false) => (command: string, args: string[]) => {
            if (command === 'ssh') return ok(MOCK_PS_OUTPUT.withXvnc);
            if (args[0] === '-o') return ok(listing);
            if (args[0] === '-l') {
                if (detailFails) return fail('bjobs detail unavailable');
                return ok(args[1] === '1001' ? MOCK_BJOBS_DETAIL.running : MOCK_BJOBS_DETAIL.pending);
            }
            return fail('unexpected command');
        };

        it('should combine the listing, job detail and display probe', async () => {
            const runner = new FakeRunner(lsfResponder(MOCK_BJOBS_DELIMITED.running));
            const service = createService(runner);

            const jobs = await service.listJobs();

            expect(jobs).toEqual([{
                job_id: '1001',
                name: 'work',
                status: 'RUN',
                queue: 'interactive',
                from_host: '4*node12.example.org',
                exec_host: 'node12.example.org',
                host: 'node12',
                user: 'testuser',
                num_cores: 4,
                memory_gb: 8,
                submit_time: '2026-10-19 10:12:00',
                submit_time_raw: 'Oct 19 10:12',
                runtime: '12m 34s',
                runtime_display: '12m 34s',
                run_time_seconds: 754,
                display: 3,
                port: 5903,
            }]);
        });

        it('should query bjobs with the delimited format for this account', async () => {
            const runner = new FakeRunner(lsfResponder(MOCK_BJOBS_DELIMITED.running));
            await createService(runner).listJobs();

            expect(runner.calls[0].args).toEqual([
                '-o', BJOBS_FORMAT, '-noheader', '-u', 'testuser', '-J', 'vnc_session',
            ]);
        });

        it('should probe the display over ssh with the probe timeout', async () => {
            const runner = new FakeRunner(lsfResponder(MOCK_BJOBS_DELIMITED.running));
            await createService(runner).listJobs();

            const [probe] = runner.callsFor('ssh');
            expect(probe.args).toEqual([
                '-o', 'BatchMode=yes', '-o', 'ConnectTimeout=5', 'node12', 'ps', '-u', 'testuser', '-o', 'pid,command',
            ]);
            expect(probe.options).toEqual({ timeoutMs: 1234 });
        });

        it('should not probe pending jobs', async () => {
            const runner = new FakeRunner(lsfResponder(MOCK_BJOBS_DELIMITED.pending));
            const jobs = await createService(runner).listJobs();

            expect(runner.callsFor('ssh')).toHaveLength(0);
            expect(jobs[0]).toMatchObject({
                job_id: '1002',
                name: 'VNC Session',
                status: 'PEND',
                host: '-',
                num_cores: 2,
                memory_gb: 4,
                runtime: '0m',
                submit_time: '2026-10-19 09:30:00',
            });
            expect(jobs[0].display).toBeUndefined();
        });

        it('should keep listing values when the job detail fails', async () => {
            const runner = new FakeRunner(lsfResponder(MOCK_BJOBS_DELIMITED.running, true));
            const jobs = await createService(runner).listJobs();

            expect(jobs[0]).toMatchObject({
                exec_host: '4*node12.example.org',
                host: 'node12',
                name: 'work',
                num_cores: 2,
                memory_gb: 16,
                submit_time: null,
                submit_time_raw: '',
                display: 3,
            });
        });

        it('should return [] when no jobs are found', async () => {
            const runner = new FakeRunner(() => fail(MOCK_BJOBS_STDERR.noJobs));
            await expect(createService(runner).listJobs()).resolves.toEqual([]);
        });

        it('should fall back to wide output on LSF without delimiter support', async () => {
            const runner = new FakeRunner((_command, args) => {
                if (args[0] === '-o') return fail(MOCK_BJOBS_STDERR.delimiterUnsupported);
                return ok(MOCK_BJOBS_WIDE.list);
            });
            const service = createService(runner);

            const jobs = await service.listJobs();

            expect(runner.calls[1].args).toEqual(['-u', 'testuser', '-J', 'vnc_session', '-w']);
            expect(jobs).toHaveLength(2);
            expect(jobs[0]).toEqual({
                job_id: '2001',
                name: 'vnc_session',
                status: 'RUN',
                queue: 'interactive',
                from_host: 'login01',
                exec_host: 'node07',
                host: 'node07',
                user: 'testuser',
                num_cores: 2,
                memory_gb: 16,
                submit_time: '2026-10-19 08:15:00',
                submit_time_raw: 'Oct 19 08:15',
                runtime: 'N/A',
                runtime_display: 'N/A',
                run_time_seconds: 0,
            });
        });

        it('should read a pending wide row whose EXEC_HOST is blank', async () => {
            const runner = new FakeRunner((_command, args) => {
                if (args[0] === '-o') return fail(MOCK_BJOBS_STDERR.delimiterUnsupported);
                return ok(MOCK_BJOBS_WIDE.blankExecHost);
            });

            const jobs = await createService(runner).listJobs();

            expect(jobs).toHaveLength(1);
            expect(jobs[0]).toMatchObject({
                job_id: '1234',
                name: 'vnc_session',
                status: 'PEND',
                exec_host: '-',
                host: '-',
                submit_time: '2026-10-19 08:15:00',
                submit_time_raw: 'Oct 19 08:15',
            });
        });
    });

    describe('getConnectionDetails', () => {
        it('should resolve host, display and port for a running job', async () => {
            const runner = new FakeRunner((command, args) => {
                if (command === 'ssh') return ok(MOCK_PS_OUTPUT.withXvnc);
                if (args[0] === '-w') return ok(MOCK_BJOBS_WIDE.runningJob);
                return fail('unexpected command');
            });

            await expect(createService(runner).getConnectionDetails('1001')).resolves.toEqual({
                host: 'node12',
                display: 3,
                port: 5903,
                connection_string: 'node12:3',
            });
        });

        it('should use bjobs -l when the job is not running', async () => {
            const runner = new FakeRunner((command, args) => {
                if (args[0] === '-w') return ok(MOCK_BJOBS_WIDE.pendingJob);
                if (args[0] === '-l') return ok(MOCK_BJOBS_DETAIL.pending);
                return fail('unexpected command');
            });

            await expect(createService(runner).getConnectionDetails('1002')).resolves.toBeNull();
            expect(runner.calls.map(c => c.args[0])).toEqual(['-w', '-l']);
        });

        it('should return null when no Xvnc display is found', async () => {
            const runner = new FakeRunner((command, args) => {
                if (command === 'ssh') return ok(MOCK_PS_OUTPUT.withoutXvnc);
                if (args[0] === '-w') return ok(MOCK_BJOBS_WIDE.runningJob);
                return fail('unexpected command');
            });

            await expect(createService(runner).getConnectionDetails('1001')).resolves.toBeNull();
        });

        it('should reject an invalid job ID', async () => {
            const service = createService(new FakeRunner(() => ok('')));
            await expect(service.getConnectionDetails('abc')).rejects.toThrow('Invalid job ID: abc');
        });
    });

    describe('command history', () => {
        it('should record each command with its outcome', async () => {
            const runner = new FakeRunner(() => fail(MOCK_BJOBS_STDERR.noJobs));
            const service = createService(runner);
            await service.listJobs();

            const [entry] = service.getCommandHistory();
            expect(entry.command).toBe(
                `bjobs -o "${BJOBS_FORMAT}" -noheader -u testuser -J vnc_session`,
            );
            expect(entry.success).toBe(false);
            expect(entry.stderr).toBe(MOCK_BJOBS_STDERR.noJobs);
        });
    });
});
