/**
 * Unit tests for command formatting and history
 */

import { CommandHistory, formatCommand } from '../lib/commands';

describe('formatCommand', () => {
    it('should join plain arguments with spaces', () => {
        expect(formatCommand('bkill', ['1001', '1002'])).toBe('bkill 1001 1002');
    });

    it('should quote arguments with spaces or separators', () => {
        expect(formatCommand('bjobs', ['-o', "jobid stat delimiter=';'"]))
            .toBe(`bjobs -o "jobid stat delimiter=';'"`);
    });

    it('should escape embedded double quotes', () => {
        expect(formatCommand('echo', ['say "hi"'])).toBe('echo "say \\"hi\\""');
    });
});

describe('CommandHistory', () => {
    it('should keep only the newest entries up to the limit', () => {
        const history = new CommandHistory(2);
        history.record('one', { success: true });
        history.record('two', { success: true });
        history.record('three', { stderr: 'boom', success: false });

        expect(history.list().map(e => e.command)).toEqual(['two', 'three']);
    });

    it('should return the most recent entries for a smaller limit', () => {
        const history = new CommandHistory(10);
        history.record('one', { success: true });
        history.record('two', { success: true });

        expect(history.list(1).map(e => e.command)).toEqual(['two']);
        expect(history.list(5)).toHaveLength(2);
    });

    it('should default missing output to empty strings', () => {
        const entry = new CommandHistory().record('bjobs', { success: true });

        expect(entry.stdout).toBe('');
        expect(entry.stderr).toBe('');
        expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    });

    it('should clear all entries', () => {
        const history = new CommandHistory();
        history.record('bjobs', { success: true });
        history.clear();
        expect(history.list()).toEqual([]);
    });
});
