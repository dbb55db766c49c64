import { v4 as uuidv4 } from 'uuid';
import { LedgerOrderingError } from './errors.js';
import { fitsTopic, topicKey } from './topics.js';
import { FactValue, PersonId, Statement, StatementDraft, Topic, TruthStatus } from './types.js';

export interface StatementFilter {
    speaker?: PersonId;
    topic?: Topic;
}

function freezeValue(value: FactValue): FactValue {
    if (value.type === 'persons') {
        return Object.freeze({ type: value.type, ids: Object.freeze([...value.ids]) });
    }
    return Object.freeze({ ...value });
}

/**
 * StatementLedger - append-only record of everything every suspect has said.
 *
 * Sequence numbers start at 1 and grow by one per append. Statements are
 * frozen on the way in and never edited or removed.
 */
export class StatementLedger {
    private statements: Statement[] = [];
    private appended = new WeakSet<StatementDraft>();

    get size(): number {
        return this.statements.length;
    }

    get nextSequence(): number {
        return this.statements.length + 1;
    }

    append(draft: StatementDraft): Statement {
        if (this.appended.has(draft)) {
            throw new LedgerOrderingError(`Statement draft from '${draft.speaker}' was already appended`);
        }
        const sequence = this.nextSequence;
        if (draft.sequence !== undefined && draft.sequence !== sequence) {
            throw new LedgerOrderingError(`Expected sequence ${sequence}, got ${draft.sequence}`);
        }
        if (draft.value !== null && !fitsTopic(draft.topic, draft.value)) {
            throw new TypeError(`A ${draft.value.type} value does not answer a ${draft.topic.kind} topic`);
        }

        const statement: Statement = Object.freeze({
            id: uuidv4(),
            sequence,
            speaker: draft.speaker,
            topic: Object.freeze({ ...draft.topic }),
            topicKey: topicKey(draft.topic),
            value: draft.value ? freezeValue(draft.value) : null,
            status: draft.status,
            recordedAt: new Date(),
        });

        this.statements.push(statement);
        this.appended.add(draft);
        return statement;
    }

    /**
     * Statements in sequence order, optionally narrowed to a speaker and/or topic
     */
    allStatements(filter: StatementFilter = {}): Statement[] {
        const key = filter.topic ? topicKey(filter.topic) : undefined;
        return this.statements.filter(s =>
            (filter.speaker === undefined || s.speaker === filter.speaker)
            && (key === undefined || s.topicKey === key)
        );
    }

    get(sequence: number): Statement | undefined {
        return this.statements[sequence - 1];
    }

    /**
     * Statements recorded before the given sequence number
     */
    before(sequence: number): Statement[] {
        return this.statements.slice(0, Math.max(0, sequence - 1));
    }

    /**
     * The speaker's latest committed statement on a topic, optionally of one status
     */
    lastCommitted(speaker: PersonId, key: string, status?: TruthStatus): Statement | undefined {
        for (let i = this.statements.length - 1; i >= 0; i--) {
            const s = this.statements[i];
            if (s.speaker !== speaker || s.topicKey !== key || s.value === null) continue;
            if (status === undefined || s.status === status) return s;
        }
        return undefined;
    }
}
