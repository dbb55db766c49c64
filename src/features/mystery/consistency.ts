import { StatementLedger } from './ledger.js';
import { sameValue, topicPersons } from './topics.js';
import { Contradiction, Corroboration, Finding, Statement } from './types.js';
import CaseWorld from './world.js';

/**
 * ConsistencyEngine - compares a new statement against everything said
 * before it and against the recorded facts of the case.
 *
 * Findings are derived data: checking the same ledger again yields the same
 * findings, which is what lets suspicion be replayed.
 */
export class ConsistencyEngine {
    constructor(private world: CaseWorld) { }

    check(statement: Statement, ledger: StatementLedger): Finding[] {
        if (statement.status === 'evasive' || statement.value === null) return [];

        const value = statement.value;
        const priors = ledger.before(statement.sequence).filter(s => s.value !== null);
        const findings: Finding[] = [];

        // 1. Self-contradiction
        for (const prior of priors) {
            if (prior.speaker !== statement.speaker || prior.topicKey !== statement.topicKey) continue;
            if (prior.value && !sameValue(prior.value, value)) {
                findings.push(this.contradiction('self', statement, prior));
            }
        }

        // 2. Cross-suspect contradiction
        for (const prior of priors) {
            if (prior.speaker === statement.speaker || !prior.value) continue;
            const conflicting = prior.topicKey === statement.topicKey
                ? !sameValue(prior.value, value)
                : this.world.areExclusive(prior, statement);
            if (conflicting) {
                findings.push(this.contradiction('cross-suspect', statement, prior));
            }
        }

        // 3. Ground truth; everyone a topic is about knows their own part in it
        const record = this.world.recordFor(statement.topic);
        const aware = record !== null && (
            topicPersons(statement.topic).includes(statement.speaker)
            || record.event.participants.includes(statement.speaker)
        );
        if (record && aware && !sameValue(record.value, value)) {
            findings.push({
                kind: 'contradiction',
                rule: 'ground-truth',
                topicKey: statement.topicKey,
                basis: { type: 'event', statement: statement.sequence, eventId: record.event.id },
                speakers: [statement.speaker],
            });
        }

        // 4. Corroboration
        for (const prior of priors) {
            if (prior.speaker === statement.speaker || !prior.value) continue;
            if (prior.topicKey === statement.topicKey && sameValue(prior.value, value)) {
                findings.push(this.corroboration('agreement', statement, {
                    type: 'statements', earlier: prior.sequence, later: statement.sequence,
                }, [prior.speaker, statement.speaker]));
            }
        }
        if (record && sameValue(record.value, value)) {
            findings.push(this.corroboration('record', statement, {
                type: 'event', statement: statement.sequence, eventId: record.event.id,
            }, [statement.speaker]));
        }

        return findings;
    }

    /**
     * Every finding in the ledger, recomputed in sequence order
     */
    replay(ledger: StatementLedger): Finding[] {
        return ledger.allStatements().flatMap(s => this.check(s, ledger));
    }

    private contradiction(rule: Contradiction['rule'], later: Statement, earlier: Statement): Contradiction {
        const speakers = earlier.speaker === later.speaker ? [later.speaker] : [earlier.speaker, later.speaker];
        return {
            kind: 'contradiction',
            rule,
            topicKey: later.topicKey,
            basis: { type: 'statements', earlier: earlier.sequence, later: later.sequence },
            speakers,
        };
    }

    private corroboration(
        rule: Corroboration['rule'],
        statement: Statement,
        basis: Corroboration['basis'],
        speakers: string[]
    ): Corroboration {
        return { kind: 'corroboration', rule, topicKey: statement.topicKey, basis, speakers };
    }
}
