/**
 * Unit tests for bjobs, bsub and ps output parsers
 */

import {
    isDelimiterUnsupported, parseDelimitedJobs, parseWideJobs, cleanHost, sanitizeHost,
    parseStartedHost, parseExecHost, parseJobUser, parseWideRunHost, parseSessionName,
    parseCores, parseMemoryGb, parseSubmittedAt, parseSubmittedJobId, parseDisplay, displayToPort,
} from '../lib/lsf-parsers';
import {
    MOCK_BSUB_OUTPUT, MOCK_BJOBS_DELIMITED, MOCK_BJOBS_DETAIL, MOCK_BJOBS_WIDE,
    MOCK_BJOBS_STDERR, MOCK_PS_OUTPUT,
} from './__mocks__/lsfCommands';

describe('LSF output parsers', () => {
    describe('isDelimiterUnsupported', () => {
        it('should detect the old-LSF delimiter complaint', () => {
            expect(isDelimiterUnsupported(MOCK_BJOBS_STDERR.delimiterUnsupported)).toBe(true);
        });

        it('should not flag other stderr', () => {
            expect(isDelimiterUnsupported(MOCK_BJOBS_STDERR.noJobs)).toBe(false);
        });
    });

    describe('parseDelimitedJobs', () => {
        it('should parse a delimited bjobs row', () => {
            const rows = parseDelimitedJobs(MOCK_BJOBS_DELIMITED.running);

            expect(rows).toEqual([{
                jobId: '1001',
                status: 'RUN',
                user: 'testuser',
                queue: 'interactive',
                firstHost: '4*node12.example.org',
                runTimeRaw: '754 second(s)',
                command: '/usr/bin/vncserver -geometry 1920x1080 -depth 24 -name work',
            }]);
        });

        it('should keep semicolons inside the command', () => {
            const rows = parseDelimitedJobs('7;RUN;u;q;h;1 second(s);echo a;echo b');
            expect(rows[0].command).toBe('echo a;echo b');
        });

        it('should skip blank and short lines', () => {
            expect(parseDelimitedJobs('\n1;RUN;u\n\n')).toEqual([]);
        });
    });

    describe('parseWideJobs', () => {
        it('should skip the header and read each row', () => {
            const rows = parseWideJobs(MOCK_BJOBS_WIDE.list);

            expect(rows).toHaveLength(2);
            expect(rows[0]).toEqual({
                jobId: '2001',
                user: 'testuser',
                status: 'RUN',
                queue: 'interactive',
                fromHost: 'login01',
                execHost: 'node07',
                jobName: 'vnc_session',
                submitTimeRaw: 'Oct 19 08:15',
            });
            expect(rows[1].status).toBe('PEND');
            expect(rows[1].execHost).toBe('-');
        });

        it('should take the last two fields when no month precedes them', () => {
            const rows = parseWideJobs(`${MOCK_BJOBS_WIDE.header}\n3001 u RUN q h1 h2 name 19 08:15`);
            expect(rows[0].jobName).toBe('name');
            expect(rows[0].submitTimeRaw).toBe('19 08:15');
        });

        it('should keep the month and shift the job name when EXEC_HOST is blank', () => {
            const rows = parseWideJobs(MOCK_BJOBS_WIDE.blankExecHost);

            expect(rows).toEqual([{
                jobId: '1234',
                user: 'testuser',
                status: 'PEND',
                queue: 'interactive',
                fromHost: 'login01',
                execHost: '-',
                jobName: 'vnc_session',
                submitTimeRaw: 'Oct 19 08:15',
            }]);
        });

        it('should return no rows for a header only', () => {
            expect(parseWideJobs(MOCK_BJOBS_WIDE.header)).toEqual([]);
        });
    });

    describe('host helpers', () => {
        it('should reduce LSF host specs to a short hostname', () => {
            expect(cleanHost('4*node12.example.org:node13')).toBe('node12');
            expect(cleanHost('node12*2')).toBe('node12');
            expect(cleanHost('node12')).toBe('node12');
        });

        it('should strip characters that are not valid in hostnames', () => {
            expect(sanitizeHost(' node-1;rm ')).toBe('node-1rm');
        });

        it('should read the Started on host', () => {
            expect(parseStartedHost(MOCK_BJOBS_DETAIL.running)).toBe('node12.example.org');
            expect(parseStartedHost(MOCK_BJOBS_DETAIL.pending)).toBeNull();
        });

        it('should read EXEC_HOST without the port suffix', () => {
            expect(parseExecHost('EXEC_HOST: node05:node06')).toBe('node05');
            expect(parseExecHost('nothing here')).toBeNull();
        });

        it('should read the job owner', () => {
            expect(parseJobUser(MOCK_BJOBS_DETAIL.running)).toBe('testuser');
        });

        it('should read the run host from bjobs -w', () => {
            expect(parseWideRunHost(MOCK_BJOBS_WIDE.runningJob)).toBe('node12');
        });

        it('should return null for a pending job', () => {
            expect(parseWideRunHost(MOCK_BJOBS_WIDE.pendingJob)).toBeNull();
            expect(parseWideRunHost(MOCK_BJOBS_WIDE.header)).toBeNull();
        });
    });

    describe('parseSessionName', () => {
        it('should read -name from the command', () => {
            expect(parseSessionName('/usr/bin/vncserver -depth 24 -name work')).toBe('work');
        });

        it('should read a quoted name', () => {
            expect(parseSessionName('vncserver -name "my desk" -depth 24')).toBe('my desk');
        });

        it('should fall back to the job detail', () => {
            expect(parseSessionName('vncserver -depth 24', MOCK_BJOBS_DETAIL.running)).toBe('work');
        });

        it('should use the default name when absent', () => {
            expect(parseSessionName('vncserver -depth 24')).toBe('VNC Session');
        });
    });

    describe('resource parsers', () => {
        it('should read the task count', () => {
            expect(parseCores(MOCK_BJOBS_DETAIL.running)).toBe(4);
            expect(parseCores('no tasks')).toBe(2);
        });

        it('should convert rusage memory to GB', () => {
            expect(parseMemoryGb(MOCK_BJOBS_DETAIL.running)).toBe(8);
            expect(parseMemoryGb(MOCK_BJOBS_DETAIL.pending)).toBe(4);
            expect(parseMemoryGb('rusage[mem=512M]')).toBe(0.5);
            expect(parseMemoryGb('rusage[mem=1048576K]')).toBe(1);
            expect(parseMemoryGb('rusage[mem=32]')).toBe(32);
        });

        it('should default memory when rusage is missing', () => {
            expect(parseMemoryGb('nothing')).toBe(16);
        });

        it('should read the submission time from the detail', () => {
            expect(parseSubmittedAt(MOCK_BJOBS_DETAIL.running)).toBe('Oct 19 10:12');
            expect(parseSubmittedAt(MOCK_BJOBS_DETAIL.pending)).toBe('Oct 19 09:30');
            expect(parseSubmittedAt('no submit line')).toBeNull();
        });
    });

    describe('parseSubmittedJobId', () => {
        it('should read the job ID printed by bsub', () => {
            expect(parseSubmittedJobId(MOCK_BSUB_OUTPUT.submitted)).toBe('4321');
        });

        it('should return unknown when bsub printed no ID', () => {
            expect(parseSubmittedJobId(MOCK_BSUB_OUTPUT.noId)).toBe('unknown');
        });
    });

    describe('parseDisplay', () => {
        it('should find the Xvnc display', () => {
            expect(parseDisplay(MOCK_PS_OUTPUT.withXvnc)).toBe(3);
        });

        it('should find a display that follows other arguments', () => {
            expect(parseDisplay('123 Xvnc -geometry 1920x1080 :5')).toBe(5);
        });

        it('should return null when no Xvnc is running', () => {
            expect(parseDisplay(MOCK_PS_OUTPUT.withoutXvnc)).toBeNull();
        });

        it('should map a display to its VNC port', () => {
            expect(displayToPort(3)).toBe(5903);
        });
    });
});
