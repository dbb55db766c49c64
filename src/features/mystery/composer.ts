import { pick, Random, weightedIndex } from '../../utils/random.js';
import { StatementLedger } from './ledger.js';
import { topicKey } from './topics.js';
import {
    FactValue,
    Finding,
    LocationId,
    PersonId,
    RelationshipKind,
    Statement,
    StatementDraft,
    SuspectProfile,
    Topic,
    TruthStatus,
} from './types.js';
import CaseWorld from './world.js';

/** Relationships a liar claims to play down a connection */
const BENIGN_RELATIONS: RelationshipKind[] = ['friend', 'colleague', 'stranger'];

const MINUTES_PER_DAY = 1440;

export interface ComposedAnswer {
    statement: Statement;
    findings: Finding[];
    suspicion: number;
}

/**
 * Settles a drafted statement: ledger append, consistency check,
 * suspicion update and logging, in that order.
 */
export interface StatementRecorder {
    record(draft: StatementDraft): ComposedAnswer;
}

/**
 * ResponseComposer - turns a truth status into a concrete claim.
 */
export class ResponseComposer {
    constructor(
        private world: CaseWorld,
        private ledger: StatementLedger,
        private recorder: StatementRecorder,
        private random: Random
    ) { }

    compose(profile: SuspectProfile, topic: Topic, status: TruthStatus): ComposedAnswer {
        let value: FactValue | null = null;
        let settled = status;

        if (status === 'truthful') {
            const resolution = this.world.resolve(topic, profile.id);
            value = resolution.status === 'known' ? resolution.value : null;
        } else if (status === 'lie') {
            value = this.fabricate(profile, topic);
            // Nothing believable to say: the suspect dodges instead
            if (value === null) settled = 'evasive';
        }

        return this.recorder.record({ speaker: profile.id, topic, value, status: settled });
    }

    private fabricate(profile: SuspectProfile, topic: Topic): FactValue | null {
        if (profile.liar === 'consistent') {
            const previous = this.ledger.lastCommitted(profile.id, topicKey(topic), 'lie');
            if (previous?.value) return previous.value;
        }

        const resolution = this.world.resolve(topic, profile.id);
        if (resolution.status !== 'known') return null;
        const truth = resolution.value;

        switch (truth.type) {
            case 'location': {
                const id = this.plausibleLocation(topic.subject, truth.id);
                return id === undefined ? null : { type: 'location', id };
            }
            case 'relation': {
                const relation = pick(BENIGN_RELATIONS.filter(r => r !== truth.relation), this.random);
                return relation === undefined ? null : { type: 'relation', relation };
            }
            case 'flag':
                return { type: 'flag', value: !truth.value };
            case 'time':
                return { type: 'time', minutes: this.shiftedTime(truth.minutes) };
            case 'persons': {
                if (truth.ids.length > 0) return { type: 'persons', ids: [] };
                const witness = pick(this.world.suspects.filter(p => p.id !== topic.subject), this.random);
                return witness === undefined ? null : { type: 'persons', ids: [witness.id] };
            }
        }
    }

    /**
     * Somewhere the subject could believably have been instead: places they
     * actually visited and rooms next to the true one score higher, the crime
     * scene lower. Rooms the subject cannot enter are never offered.
     */
    private plausibleLocation(subject: PersonId, trueLocation: LocationId): LocationId | undefined {
        const visited = this.world.visitedLocations(subject);
        const adjacent = new Set(this.world.neighbours(trueLocation));
        const score = (id: LocationId) => Math.max(0, 0.5
            + (visited.has(id) ? 0.3 : 0)
            + (adjacent.has(id) ? 0.2 : 0)
            - (id === this.world.crimeScene ? 0.5 : 0));

        const candidates = this.world.locations
            .filter(l => l.id !== trueLocation && this.world.canEnter(subject, l.id))
            .map(l => ({ id: l.id, score: score(l.id) }))
            .sort((a, b) => b.score - a.score)
            .slice(0, 3);

        const index = weightedIndex(candidates.map(c => c.score), this.random);
        return index < 0 ? undefined : candidates[index].id;
    }

    /**
     * The true time moved 15 to 45 minutes, in 5-minute steps, staying within the day
     */
    private shiftedTime(minutes: number): number {
        const offset = 15 + 5 * Math.floor(this.random() * 7);
        const sign = this.random() < 0.5 ? -1 : 1;
        const shifted = minutes + sign * offset;
        return shifted >= 0 && shifted < MINUTES_PER_DAY ? shifted : minutes - sign * offset;
    }
}
