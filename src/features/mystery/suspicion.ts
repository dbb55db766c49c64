import { config } from '../../config.js';
import { Finding, PersonId } from './types.js';

export interface SuspicionWeights {
    contradiction: number;
    evasion: number;
    corroboration: number;
    min: number;
    max: number;
}

/**
 * Per-suspect suspicion, a cache derived from the findings.
 * Replaying the same findings in the same order gives the same scores.
 */
export class SuspicionTracker {
    private values = new Map<PersonId, number>();

    constructor(private weights: SuspicionWeights = config.suspicion) { }

    update(speaker: PersonId, findings: Finding[], evaded: boolean): number {
        for (const finding of findings) {
            const delta = finding.kind === 'contradiction'
                ? this.weights.contradiction
                : -this.weights.corroboration;
            for (const id of new Set(finding.speakers)) {
                this.adjust(id, delta);
            }
        }
        if (evaded) this.adjust(speaker, this.weights.evasion);
        return this.score(speaker);
    }

    score(id: PersonId): number {
        return this.values.get(id) ?? this.weights.min;
    }

    scores(): Record<PersonId, number> {
        return Object.fromEntries(this.values);
    }

    reset(): void {
        this.values.clear();
    }

    private adjust(id: PersonId, delta: number): void {
        const next = Math.min(this.weights.max, Math.max(this.weights.min, this.score(id) + delta));
        this.values.set(id, next);
    }
}
