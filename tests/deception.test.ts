import { describe, expect, it } from 'vitest';
import { DeceptionPolicy } from '../src/features/mystery/deception.js';
import { PolicyDegeneracyError } from '../src/features/mystery/errors.js';
import { SuspectProfile, Topic } from '../src/features/mystery/types.js';
import { scripted, T2000 } from './fixtures.js';

const topic: Topic = { kind: 'whereabouts', subject: 'ann', time: T2000 };

function profile(overrides: Partial<SuspectProfile> = {}): SuspectProfile {
    return { id: 'ann', reliability: 0.5, traits: [], liar: 'consistent', pressure: 0, ...overrides };
}

function policy(values: number[] = []): DeceptionPolicy {
    return new DeceptionPolicy({ random: scripted(values), minEvasive: 0.05 });
}

describe('DeceptionPolicy construction', () => {
    it('refuses an evasive floor outside (0, 1)', () => {
        for (const minEvasive of [0, -0.1, 1, 2]) {
            expect(() => new DeceptionPolicy({ random: scripted([]), minEvasive })).toThrow(PolicyDegeneracyError);
        }
        expect(() => new DeceptionPolicy({ random: scripted([]), minEvasive: 0.5 })).not.toThrow();
    });

    it('reports a bad setting without blaming a suspect', () => {
        expect(() => new DeceptionPolicy({ random: scripted([]), minEvasive: 1 }))
            .toThrow('Degenerate deception policy: minimum evasive share 1 is outside (0, 1)');
    });
});

describe('DeceptionPolicy.distribution', () => {
    it('weighs reliability against lying', () => {
        const shares = policy().distribution(profile(), false);
        expect(shares.truthful).toBeCloseTo(0.8 / 1.35, 10);
        expect(shares.lie).toBeCloseTo(0.4 / 1.35, 10);
        expect(shares.evasive).toBeCloseTo(0.15 / 1.35, 10);
    });

    it('shifts toward lies and evasion on sensitive topics', () => {
        const shares = policy().distribution(profile(), true);
        expect(shares.truthful).toBeCloseTo(0.4 / 1.45, 10);
        expect(shares.lie).toBeCloseTo(0.7 / 1.45, 10);
        expect(shares.evasive).toBeCloseTo(0.35 / 1.45, 10);
    });

    it('raises evasion with pressure', () => {
        const shares = policy().distribution(profile({ pressure: 1 }), false);
        expect(shares.evasive).toBeCloseTo(0.35 / 1.55, 10);
    });

    it('applies trait modifiers', () => {
        const shares = policy().distribution(profile({ traits: ['nervous'] }), false);
        expect(shares.truthful).toBeCloseTo(0.8 / 1.55, 10);
        expect(shares.lie).toBeCloseTo(0.45 / 1.55, 10);
        expect(shares.evasive).toBeCloseTo(0.3 / 1.55, 10);
    });

    it('keeps a floor under evasion on sensitive topics', () => {
        const stoic = new DeceptionPolicy({
            random: scripted([]),
            minEvasive: 0.05,
            traits: { stoic: { truth: 20, evasive: -0.15 } },
        });
        const shares = stoic.distribution(profile({ traits: ['stoic'] }), true);

        expect(shares.evasive).toBe(0.05);
        expect(shares.truthful).toBeCloseTo(20.4 * 0.95 / 21.1, 10);
        expect(shares.lie).toBeCloseTo(0.7 * 0.95 / 21.1, 10);
    });

    it('never lets a sensitive answer be a certain lie or never evasive', () => {
        const p = policy();
        const traitSets = [[], ['nervous'], ['composed'], ['hostile'], ['cooperative'], ['deceitful'], ['deceitful', 'hostile']];
        for (const reliability of [0, 0.25, 0.5, 0.75, 1]) {
            for (const pressure of [0, 0.5, 1]) {
                for (const traits of traitSets) {
                    const shares = p.distribution(profile({ reliability, pressure, traits }), true);
                    expect(shares.lie).toBeLessThan(1);
                    expect(shares.evasive).toBeGreaterThanOrEqual(0.05 - 1e-12);
                    expect(shares.truthful + shares.lie + shares.evasive).toBeCloseTo(1, 10);
                }
            }
        }
    });
});

describe('DeceptionPolicy degeneracy', () => {
    it('rejects unknown traits', () => {
        expect(() => policy().distribution(profile({ traits: ['psychic'] }), false))
            .toThrow("Suspect 'ann' has a degenerate deception profile: unknown trait 'psychic'");
    });

    it('rejects reliability outside [0, 1]', () => {
        expect(() => policy().distribution(profile({ reliability: 1.5 }), false)).toThrow(PolicyDegeneracyError);
    });

    it('rejects traits that drive a weight negative', () => {
        const harsh = new DeceptionPolicy({ random: scripted([]), traits: { broken: { truth: -2 } } });
        expect(() => harsh.distribution(profile({ traits: ['broken'] }), false)).toThrow('truth weight is');
    });

    it('validates every profile for both sensitivities', () => {
        const fragile = new DeceptionPolicy({ random: scripted([]), traits: { calm: { evasive: -0.3 } } });
        // 0.15 - 0.3 < 0 when not sensitive, 0.35 - 0.3 > 0 when sensitive
        expect(() => fragile.validate([profile({ traits: ['calm'] })])).toThrow(PolicyDegeneracyError);
        expect(() => fragile.validate([profile()])).not.toThrow();
    });
});

describe('DeceptionPolicy.decide', () => {
    it('draws truthful, lie and evasive in that order', () => {
        const p = policy([0.5, 0.6, 0.95]);
        expect(p.decide(profile(), topic, false)).toBe('truthful');
        expect(p.decide(profile(), topic, false)).toBe('lie');
        expect(p.decide(profile(), topic, false)).toBe('evasive');
    });

    it('reports the liar style', () => {
        expect(policy().liarStyle(profile({ liar: 'inconsistent' }))).toBe('inconsistent');
    });
});
