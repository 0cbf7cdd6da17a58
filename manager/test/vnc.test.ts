/**
 * Unit tests for VncSessionService
 */

import { VncSessionService } from '../services/vnc';
import { LsfService } from '../services/lsf';
import { SiteConfig } from '../lib/site-config';
import { NotFoundError, ValidationError } from '../lib/errors';
import { FakeRunner, ok, MOCK_BSUB_OUTPUT } from './__mocks__/lsfCommands';
import type { OverrideFields, VncJob } from '../types';

const siteConfig = new SiteConfig({
    lsf: {
        available_queues: ['interactive', 'normal'],
        core_options: [1, 2, 4],
        memory_options_gb: [8, 16],
        os_options: [{ name: 'RHEL8', select: 'rhel8' }],
        available_sites: [{ name: 'Austin', domain: 'aus' }],
    },
});

function makeJob(overrides: Partial<VncJob>): VncJob {
    return {
        job_id: '1001',
        name: 'work',
        status: 'RUN',
        queue: 'normal',
        from_host: 'login01',
        exec_host: 'node07',
        host: 'node07',
        user: 'testuser',
        num_cores: 4,
        memory_gb: 8,
        submit_time: null,
        submit_time_raw: '',
        runtime: '1m 0s',
        runtime_display: '1m 0s',
        run_time_seconds: 60,
        ...overrides,
    };
}

describe('VncSessionService', () => {
    let runner: FakeRunner;
    let lsf: LsfService;
    let override: OverrideFields | null;
    let service: VncSessionService;

    beforeEach(() => {
        runner = new FakeRunner(() => ok(MOCK_BSUB_OUTPUT.submitted));
        lsf = new LsfService({ runner, user: 'testuser' });
        override = null;
        service = new VncSessionService({ siteConfig, lsf, overrideLookup: () => override });
    });

    describe('createSession', () => {
        it('should submit with configured defaults', async () => {
            const result = await service.createSession({}, 'alice');

            expect(result).toEqual({ job_id: '4321', status: 'pending' });
            expect(runner.calls[0].args).toEqual([
                '-q', 'interactive',
                '-n', '2',
                '-R', 'rusage[mem=16G]',
                '-J', 'vnc_session',
                '/usr/bin/vncserver',
                '-geometry', '1920x1080',
                '-depth', '24',
                '-name', 'vnc_session',
            ]);
        });

        it('should not submit an invalid request', async () => {
            await expect(service.createSession({ queue: 'gpu' }, 'alice')).rejects.toThrow('Invalid queue: gpu');
            expect(runner.calls).toHaveLength(0);
        });
    });

    describe('buildSubmission', () => {
        it('should accept the wm alias', () => {
            expect(service.buildSubmission({ wm: 'xfce' }, 'alice').vnc.window_manager).toBe('xfce');
        });

        it('should prefer window_manager over wm', () => {
            const { vnc } = service.buildSubmission({ window_manager: 'kde', wm: 'xfce' }, 'alice');
            expect(vnc.window_manager).toBe('kde');
        });

        it('should trim the name and fall back to the name prefix', () => {
            expect(service.buildSubmission({ name: '  desk  ' }, 'alice').vnc.name).toBe('desk');
            expect(service.buildSubmission({ name: '   ' }, 'alice').vnc.name).toBe('vnc_session');
        });

        it('should reject names with shell characters', () => {
            expect(() => service.buildSubmission({ name: 'a;b' }, 'alice'))
                .toThrow('Session name contains characters that are not allowed');
        });

        it('should accept an unlisted resolution of the right shape', () => {
            expect(service.buildSubmission({ resolution: '1234x567' }, 'alice').vnc.resolution).toBe('1234x567');
        });

        it('should reject a malformed resolution', () => {
            expect(() => service.buildSubmission({ resolution: 'huge' }, 'alice'))
                .toThrow('Invalid resolution: huge. Use WIDTHxHEIGHT, e.g. 1920x1080');
        });

        it('should reject an unsupported color depth', () => {
            expect(() => service.buildSubmission({ color_depth: 12 }, 'alice')).toThrow('Invalid color depth: 12');
        });

        it('should attach the allowed values to the error', () => {
            let caught: unknown;
            try {
                service.buildSubmission({ memory_gb: 64 }, 'alice');
            } catch (err) {
                caught = err;
            }

            expect(caught).toBeInstanceOf(ValidationError);
            expect(caught).toMatchObject({ message: 'Invalid memory: 64', code: 400, details: { allowed: [8, 16] } });
        });

        it('should check the site against configured sites', () => {
            expect(() => service.buildSubmission({ site: 'Mars' }, 'alice')).toThrow('Invalid site: Mars');
            expect(() => service.buildSubmission({ site: 'Austin' }, 'alice')).not.toThrow();
        });

        it('should turn an OS option into a select string', () => {
            expect(service.buildSubmission({ os: 'RHEL8' }, 'alice').lsf.os_select).toBe('rhel8');
            expect(() => service.buildSubmission({ os: 'Windows' }, 'alice')).toThrow('Invalid OS option: Windows');
        });

        it('should enforce the user override', () => {
            override = { cores: [1], memory: null, window_managers: null, queues: null, os_options: null };

            expect(() => service.buildSubmission({}, 'alice')).toThrow('Invalid number of cores: 2');
            expect(service.buildSubmission({ num_cores: 1 }, 'alice').lsf.num_cores).toBe(1);
        });

        it('should fall back to global options when the override lookup fails', () => {
            const failing = new VncSessionService({
                siteConfig,
                lsf,
                overrideLookup: () => { throw new Error('database is locked'); },
            });

            expect(failing.getUserOptions('alice').cores).toEqual([1, 2, 4]);
        });
    });

    describe('copySession', () => {
        it('should submit a copy with the source resources', async () => {
            jest.spyOn(lsf, 'listJobs').mockResolvedValue([makeJob({})]);
            const submit = jest.spyOn(lsf, 'submitJob').mockResolvedValue('5555');

            await expect(service.copySession('1001', 'alice')).resolves.toEqual({ job_id: '5555', status: 'pending' });
            expect(submit).toHaveBeenCalledWith(
                {
                    name: 'Copy of work',
                    resolution: '1920x1080',
                    color_depth: 24,
                    window_manager: 'gnome',
                    vncserver_path: '/usr/bin/vncserver',
                    xstartup_path: '',
                    use_custom_xstartup: false,
                },
                {
                    queue: 'normal',
                    num_cores: 4,
                    memory_gb: 8,
                    job_name: 'vnc_session',
                    host_filter: '',
                },
            );
        });

        it('should cut long copy names to 64 characters', async () => {
            jest.spyOn(lsf, 'listJobs').mockResolvedValue([makeJob({ name: 'x'.repeat(64) })]);
            const submit = jest.spyOn(lsf, 'submitJob').mockResolvedValue('5555');

            await service.copySession(1001, 'alice');

            expect(submit.mock.calls[0][0].name).toBe(`Copy of ${'x'.repeat(56)}`);
        });

        it('should raise NotFoundError for an unknown session', async () => {
            jest.spyOn(lsf, 'listJobs').mockResolvedValue([]);

            await expect(service.copySession('9999', 'alice')).rejects.toThrow('Session with ID 9999 not found');
            await expect(service.copySession('9999', 'alice')).rejects.toBeInstanceOf(NotFoundError);
        });
    });

    describe('listSessions', () => {
        it('should look up connection details for jobs without a port', async () => {
            jest.spyOn(lsf, 'listJobs').mockResolvedValue([
                makeJob({ job_id: '1' }),
                makeJob({ job_id: '2', host: '-', status: 'PEND' }),
                makeJob({ job_id: '3', display: 4, port: 5904 }),
            ]);
            const details = jest.spyOn(lsf, 'getConnectionDetails').mockResolvedValue({
                host: 'node07',
                display: 2,
                port: 5902,
                connection_string: 'node07:2',
            });

            const jobs = await service.listSessions();

            expect(details).toHaveBeenCalledTimes(1);
            expect(details).toHaveBeenCalledWith('1');
            expect(jobs[0]).toMatchObject({ host: 'node07', display: 2, port: 5902 });
            expect(jobs[1].port).toBeUndefined();
            expect(jobs[2].port).toBe(5904);
        });

        it('should keep listing when a lookup fails', async () => {
            jest.spyOn(lsf, 'listJobs').mockResolvedValue([makeJob({ job_id: '1' })]);
            jest.spyOn(lsf, 'getConnectionDetails').mockRejectedValue(new Error('ssh refused'));

            const jobs = await service.listSessions();
            expect(jobs).toHaveLength(1);
            expect(jobs[0].port).toBeUndefined();
        });
    });

    describe('killSession', () => {
        it('should report the bkill outcome', async () => {
            jest.spyOn(lsf, 'killJob').mockResolvedValue(true);
            await expect(service.killSession('1001', 'alice')).resolves.toBe(true);
        });
    });
});
