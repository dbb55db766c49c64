import { describe, expect, it } from 'vitest';
import { SuspicionTracker } from '../src/features/mystery/suspicion.js';
import { Finding } from '../src/features/mystery/types.js';

const weights = { contradiction: 0.15, evasion: 0.05, corroboration: 0.03, min: 0, max: 1 };

const contradiction = (speakers: string[]): Finding => ({
    kind: 'contradiction',
    rule: 'cross-suspect',
    topicKey: 'whereabouts:ben@19:30',
    basis: { type: 'statements', earlier: 1, later: 2 },
    speakers,
});

const corroboration = (speakers: string[]): Finding => ({
    kind: 'corroboration',
    rule: 'agreement',
    topicKey: 'alibi:ben+cal@19:00',
    basis: { type: 'statements', earlier: 1, later: 2 },
    speakers,
});

describe('SuspicionTracker', () => {
    it('raises every speaker involved in a contradiction', () => {
        const tracker = new SuspicionTracker(weights);
        expect(tracker.update('cal', [contradiction(['ben', 'cal'])], false)).toBeCloseTo(0.15, 10);
        expect(tracker.score('ben')).toBeCloseTo(0.15, 10);
    });

    it('adds a smaller increment for an evasion', () => {
        const tracker = new SuspicionTracker(weights);
        expect(tracker.update('ann', [], true)).toBeCloseTo(0.05, 10);
    });

    it('lowers scores on corroboration but never below the floor', () => {
        const tracker = new SuspicionTracker(weights);
        expect(tracker.update('ben', [corroboration(['ben', 'cal'])], false)).toBe(0);

        tracker.update('ben', [contradiction(['ben'])], false);
        expect(tracker.update('ben', [corroboration(['ben', 'cal'])], false)).toBeCloseTo(0.12, 10);
        expect(tracker.score('cal')).toBe(0);
    });

    it('clamps at the ceiling', () => {
        const tracker = new SuspicionTracker(weights);
        for (let i = 0; i < 7; i++) {
            tracker.update('ann', [contradiction(['ann'])], false);
        }
        expect(tracker.score('ann')).toBe(1);
    });

    it('lists and resets scores', () => {
        const tracker = new SuspicionTracker(weights);
        tracker.update('ann', [], true);
        expect(Object.keys(tracker.scores())).toEqual(['ann']);
        tracker.reset();
        expect(tracker.scores()).toEqual({});
        expect(tracker.score('ann')).toBe(0);
    });
});
