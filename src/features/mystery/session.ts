import { v4 as uuidv4 } from 'uuid';
import { config } from '../../config.js';
import { logger } from '../../utils/logger.js';
import { createRandom, Random } from '../../utils/random.js';
import { Accusation, AccusationDesk, AccusationResult } from './accusation.js';
import { analyzeTestimony, TestimonyAnalysis } from './analysis.js';
import { CaseFile, readCaseFile } from './case-file.js';
import { CaseLogger } from './case-logger.js';
import { ComposedAnswer, ResponseComposer } from './composer.js';
import { ConsistencyEngine } from './consistency.js';
import { DeceptionPolicy } from './deception.js';
import { SessionClosedError } from './errors.js';
import { StatementFilter, StatementLedger } from './ledger.js';
import { SuspicionTracker, SuspicionWeights } from './suspicion.js';
import { describeValue } from './topics.js';
import {
    Finding,
    PersonId,
    Question,
    Statement,
    StatementDraft,
    SuspectProfile,
    TruthStatus,
} from './types.js';
import CaseWorld, { NotApplicableReason } from './world.js';

export interface SessionOptions {
    /** Source of randomness; defaults to a generator seeded with `seed` */
    random?: Random;
    seed?: number;
    /** Write a per-session case log (defaults to SESSION_LOGS) */
    sessionLog?: boolean;
    suspicion?: SuspicionWeights;
    minEvasive?: number;
    /** Contradictions needed before a suspect is under full pressure */
    pressureCap?: number;
}

export type Answer =
    | ({ kind: 'answered' } & ComposedAnswer)
    | { kind: 'not-applicable'; reason: NotApplicableReason };

export type ProfileUpdate = Partial<Pick<SuspectProfile, 'reliability' | 'traits' | 'liar' | 'pressure'>>;

export interface TimelineEntry {
    sequence: number;
    speaker: PersonId;
    speakerName: string;
    topicKey: string;
    claim: string;
    status: TruthStatus;
    recordedAt: Date;
}

/**
 * InterrogationSession - one playthrough of one case.
 *
 * Owns its world, ledger, tracker and suspect profiles; two sessions share
 * nothing. Every question is fully settled (decision, composition, append,
 * consistency check, suspicion update) before `ask` returns.
 */
export class InterrogationSession {
    readonly id: string = uuidv4();
    readonly world: CaseWorld;

    private ledger = new StatementLedger();
    private engine: ConsistencyEngine;
    private tracker: SuspicionTracker;
    private weights: SuspicionWeights;
    private policy: DeceptionPolicy;
    private composer: ResponseComposer;
    private desk: AccusationDesk;
    private profiles = new Map<PersonId, SuspectProfile>();
    private contradictionCounts = new Map<PersonId, number>();
    private pressureCap: number;
    private caseLog?: CaseLogger;
    private closed = false;

    constructor(file: CaseFile, options: SessionOptions = {}) {
        this.world = CaseWorld.fromConfig(file);
        this.desk = new AccusationDesk(file.solution);

        const random = options.random ?? createRandom(options.seed ?? config.session.seed);
        this.weights = options.suspicion ?? config.suspicion;
        this.pressureCap = options.pressureCap ?? config.policy.pressureCap;

        this.engine = new ConsistencyEngine(this.world);
        this.tracker = new SuspicionTracker(this.weights);
        this.policy = new DeceptionPolicy({
            random,
            traits: this.world.traitModifiers,
            minEvasive: options.minEvasive,
        });
        this.composer = new ResponseComposer(
            this.world,
            this.ledger,
            { record: draft => this.settle(draft) },
            random
        );

        for (const suspect of this.world.suspects) {
            this.profiles.set(suspect.id, {
                id: suspect.id,
                reliability: suspect.reliability,
                traits: [...suspect.traits],
                liar: suspect.liar,
                pressure: 0,
            });
        }
        this.policy.validate(this.profiles.values());

        if (options.sessionLog ?? config.logging.sessionLogs) {
            this.caseLog = new CaseLogger(this.world.id, this.id);
        }

        logger.info(`Session ${this.id} opened for case '${this.world.id}' (${this.profiles.size} suspects)`);
    }

    /**
     * Open a session on the case stored in a directory
     */
    static open(caseDir: string, options: SessionOptions = {}): InterrogationSession {
        return new InterrogationSession(readCaseFile(caseDir), options);
    }

    get isClosed(): boolean {
        return this.closed;
    }

    get questionCount(): number {
        return this.ledger.size;
    }

    ask(question: Question): Answer {
        if (this.closed) throw new SessionClosedError(this.id);

        const profile = this.profiles.get(question.speaker);
        if (!profile) return { kind: 'not-applicable', reason: 'unknown-entity' };

        const invalid = this.world.checkTopic(question.topic);
        if (invalid) return { kind: 'not-applicable', reason: invalid };

        const sensitive = (question.sensitive ?? false) || this.world.isSensitive(profile.id, question.topic);
        const status = this.policy.decide(profile, question.topic, sensitive);
        return { kind: 'answered', ...this.composer.compose(profile, question.topic, status) };
    }

    private settle(draft: StatementDraft): ComposedAnswer {
        const statement = this.ledger.append(draft);
        const findings = this.engine.check(statement, this.ledger);
        const suspicion = this.tracker.update(statement.speaker, findings, statement.status === 'evasive');
        this.applyPressure(findings);

        this.caseLog?.logStatement(statement);
        findings.forEach(f => this.caseLog?.logFinding(f));

        return { statement, findings, suspicion };
    }

    private applyPressure(findings: Finding[]): void {
        for (const finding of findings) {
            if (finding.kind !== 'contradiction') continue;
            for (const id of new Set(finding.speakers)) {
                const count = (this.contradictionCounts.get(id) ?? 0) + 1;
                this.contradictionCounts.set(id, count);
                const profile = this.profiles.get(id);
                if (profile) profile.pressure = Math.min(1, count / this.pressureCap);
            }
        }
    }

    // -----------------------------------------------------------------------
    // Read surfaces
    // -----------------------------------------------------------------------

    statements(filter?: StatementFilter): Statement[] {
        return this.ledger.allStatements(filter);
    }

    profile(id: PersonId): SuspectProfile | undefined {
        const profile = this.profiles.get(id);
        return profile ? { ...profile, traits: [...profile.traits] } : undefined;
    }

    suspicion(): Record<PersonId, number> {
        return this.scoresFrom(this.tracker);
    }

    /**
     * All findings, recomputed from the ledger
     */
    findings(): Finding[] {
        return this.engine.replay(this.ledger);
    }

    /**
     * Suspicion rebuilt from scratch by replaying the ledger; always equals `suspicion()`
     */
    replaySuspicion(): Record<PersonId, number> {
        const tracker = new SuspicionTracker(this.weights);
        for (const statement of this.ledger.allStatements()) {
            tracker.update(statement.speaker, this.engine.check(statement, this.ledger), statement.status === 'evasive');
        }
        return this.scoresFrom(tracker);
    }

    timeline(): TimelineEntry[] {
        return this.ledger.allStatements().map(s => ({
            sequence: s.sequence,
            speaker: s.speaker,
            speakerName: this.world.nameOf(s.speaker),
            topicKey: s.topicKey,
            claim: this.claimOf(s),
            status: s.status,
            recordedAt: s.recordedAt,
        }));
    }

    private claimOf(statement: Statement): string {
        const { value } = statement;
        if (value?.type === 'location') return this.world.nameOf(value.id);
        if (value?.type === 'persons' && value.ids.length > 0) {
            return value.ids.map(id => this.world.nameOf(id)).join(', ');
        }
        return describeValue(value);
    }

    analysis(): TestimonyAnalysis {
        return analyzeTestimony(this.ledger.allStatements(), this.findings(), this.world.suspects);
    }

    /**
     * Apply an external progression rule to a suspect. The profile is only
     * replaced when the policy accepts it.
     */
    updateProfile(id: PersonId, update: ProfileUpdate): SuspectProfile | undefined {
        const current = this.profiles.get(id);
        if (!current) return undefined;

        const next: SuspectProfile = { ...current, ...update, id };
        this.policy.validate([next]);
        this.profiles.set(id, next);
        return this.profile(id);
    }

    accuse(accusation: Accusation): AccusationResult {
        if (this.closed) throw new SessionClosedError(this.id);

        const findings = this.findings();
        const result = this.desk.evaluate(accusation, findings, {
            questions: this.ledger.size,
            contradictions: findings.filter(f => f.kind === 'contradiction').length,
            corroborations: findings.filter(f => f.kind === 'corroboration').length,
            evasions: this.ledger.allStatements().filter(s => s.status === 'evasive').length,
        });
        this.closed = true;

        this.caseLog?.logAccusation(result);
        logger.info(`Session ${this.id} closed: ${result.correct ? 'SOLVED' : 'FAILED'} (score ${result.score})`);
        return result;
    }

    private scoresFrom(tracker: SuspicionTracker): Record<PersonId, number> {
        return Object.fromEntries(this.world.suspects.map(p => [p.id, tracker.score(p.id)]));
    }
}
