import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { CaseLogger } from '../src/features/mystery/case-logger.js';
import { StatementLedger } from '../src/features/mystery/ledger.js';

describe('CaseLogger', () => {
    const dirs: string[] = [];

    afterEach(() => {
        dirs.splice(0).forEach(dir => fs.rmSync(dir, { recursive: true, force: true }));
    });

    it('appends typed entries to a per-session file', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'case-log-'));
        dirs.push(dir);
        const log = new CaseLogger('quiet-house', 'session-1', dir);

        const ledger = new StatementLedger();
        log.logStatement(ledger.append({
            speaker: 'ann',
            topic: { kind: 'whereabouts', subject: 'ann', time: 1200 },
            value: { type: 'location', id: 'library' },
            status: 'truthful',
        }));
        log.logFinding({
            kind: 'contradiction',
            rule: 'self',
            topicKey: 'whereabouts:ann@20:00',
            basis: { type: 'statements', earlier: 1, later: 2 },
            speakers: ['ann'],
        });

        expect(path.basename(log.file)).toMatch(/^quiet-house_.+\.log$/);
        const lines = fs.readFileSync(log.file, 'utf8').trim().split('\n').map(line => line.replace(/^\[[^\]]+\] /, ''));
        expect(lines).toEqual([
            '[STATUS] Logger initialized for case: quiet-house | DATA: {"sessionId":"session-1"}',
            '[STATEMENT] #1 ann on whereabouts:ann@20:00: library | DATA: {"status":"truthful"}',
            '[FINDING] contradiction (self) on whereabouts:ann@20:00 | DATA: {"type":"statements","earlier":1,"later":2}',
        ]);
    });
});
