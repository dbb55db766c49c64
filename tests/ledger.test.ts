import { describe, expect, it } from 'vitest';
import { LedgerOrderingError } from '../src/features/mystery/errors.js';
import { StatementLedger } from '../src/features/mystery/ledger.js';
import { describeValue, sameValue, topicKey } from '../src/features/mystery/topics.js';
import { StatementDraft, WhereaboutsTopic } from '../src/features/mystery/types.js';
import { T1900, T2000 } from './fixtures.js';

const annAt8: WhereaboutsTopic = { kind: 'whereabouts', subject: 'ann', time: T2000 };

function draft(overrides: Partial<StatementDraft> = {}): StatementDraft {
    return {
        speaker: 'ann',
        topic: annAt8,
        value: { type: 'location', id: 'library' },
        status: 'truthful',
        ...overrides,
    };
}

describe('topics', () => {
    it('builds canonical keys', () => {
        expect(topicKey(annAt8)).toBe('whereabouts:ann@20:00');
        expect(topicKey({ kind: 'relationship', subject: 'ann', other: 'vic' })).toBe('relationship:ann~vic');
        expect(topicKey({ kind: 'alibi', subject: 'ben', companion: 'cal', time: T1900 })).toBe('alibi:ben+cal@19:00');
        expect(topicKey({ kind: 'handled', subject: 'ben', weapon: 'knife' })).toBe('handled:ben#knife');
        expect(topicKey({ kind: 'arrival', subject: 'ann', location: 'hall' })).toBe('arrival:ann>hall');
        expect(topicKey({ kind: 'witnesses', subject: 'ann', time: T2000 })).toBe('witnesses:ann@20:00');
    });

    it('gives both sides of a pair the same key', () => {
        expect(topicKey({ kind: 'relationship', subject: 'vic', other: 'ann' })).toBe('relationship:ann~vic');
        expect(topicKey({ kind: 'alibi', subject: 'cal', companion: 'ben', time: T1900 })).toBe('alibi:ben+cal@19:00');
    });

    it('compares and describes values', () => {
        expect(sameValue({ type: 'flag', value: true }, { type: 'flag', value: true })).toBe(true);
        expect(sameValue({ type: 'time', minutes: 10 }, { type: 'flag', value: true })).toBe(false);
        expect(describeValue(null)).toBe('no answer');
        expect(describeValue({ type: 'flag', value: false })).toBe('no');
        expect(describeValue({ type: 'time', minutes: 1155 })).toBe('19:15');
        expect(describeValue({ type: 'persons', ids: [] })).toBe('nobody');
        expect(describeValue({ type: 'persons', ids: ['ben', 'cal'] })).toBe('ben, cal');
    });

    it('compares persons as sets', () => {
        expect(sameValue({ type: 'persons', ids: ['ben', 'cal'] }, { type: 'persons', ids: ['cal', 'ben'] })).toBe(true);
        expect(sameValue({ type: 'persons', ids: ['ben'] }, { type: 'persons', ids: ['ben', 'cal'] })).toBe(false);
        expect(sameValue({ type: 'persons', ids: [] }, { type: 'persons', ids: [] })).toBe(true);
    });
});

describe('StatementLedger', () => {
    it('numbers statements from 1 and freezes them', () => {
        const ledger = new StatementLedger();
        const first = ledger.append(draft());
        const second = ledger.append(draft({ speaker: 'ben' }));

        expect([first.sequence, second.sequence]).toEqual([1, 2]);
        expect(first.topicKey).toBe('whereabouts:ann@20:00');
        expect(Object.isFrozen(first)).toBe(true);
        expect(first.id).not.toBe(second.id);
        expect(ledger.size).toBe(2);
        expect(ledger.get(2)).toBe(second);
    });

    it('refuses to append the same draft twice', () => {
        const ledger = new StatementLedger();
        const once = draft();
        ledger.append(once);
        expect(() => ledger.append(once)).toThrow(LedgerOrderingError);
        expect(ledger.size).toBe(1);
    });

    it('refuses an explicit sequence that is not next', () => {
        const ledger = new StatementLedger();
        expect(() => ledger.append(draft({ sequence: 2 }))).toThrow('Expected sequence 1, got 2');
        expect(ledger.append(draft({ sequence: 1 })).sequence).toBe(1);
    });

    it('rejects values of the wrong type for the topic', () => {
        const ledger = new StatementLedger();
        expect(() => ledger.append(draft({ value: { type: 'flag', value: true } }))).toThrow(TypeError);
    });

    it('filters by speaker and topic in sequence order', () => {
        const ledger = new StatementLedger();
        ledger.append(draft());
        ledger.append(draft({ speaker: 'ben', topic: { kind: 'whereabouts', subject: 'ben', time: T2000 } }));
        ledger.append(draft({ value: { type: 'location', id: 'kitchen' }, status: 'lie' }));

        expect(ledger.allStatements({ speaker: 'ann' }).map(s => s.sequence)).toEqual([1, 3]);
        expect(ledger.allStatements({ topic: annAt8 }).map(s => s.sequence)).toEqual([1, 3]);
        expect(ledger.allStatements().map(s => s.speaker)).toEqual(['ann', 'ben', 'ann']);
        expect(ledger.before(3).map(s => s.sequence)).toEqual([1, 2]);
    });

    it('finds the latest committed statement of a status', () => {
        const ledger = new StatementLedger();
        ledger.append(draft({ value: { type: 'location', id: 'kitchen' }, status: 'lie' }));
        ledger.append(draft());
        ledger.append(draft({ value: null, status: 'evasive' }));

        expect(ledger.lastCommitted('ann', 'whereabouts:ann@20:00')?.sequence).toBe(2);
        expect(ledger.lastCommitted('ann', 'whereabouts:ann@20:00', 'lie')?.sequence).toBe(1);
        expect(ledger.lastCommitted('ben', 'whereabouts:ann@20:00')).toBeUndefined();
    });
});
