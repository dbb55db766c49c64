import { Contradiction, Finding, Person, PersonId, Statement, TruthStatus } from './types.js';

export interface SuspectTestimony {
    id: PersonId;
    name: string;
    statements: number;
    truthful: number;
    lie: number;
    evasive: number;
    contradictions: number;
    corroborations: number;
}

export interface TestimonyAnalysis {
    totalStatements: number;
    distribution: Record<TruthStatus, number>;
    suspects: SuspectTestimony[];
    contradictions: Contradiction[];
}

/**
 * Summary of everything said so far, for the analysis view.
 * Truth labels are included; callers decide what to show the player.
 */
export function analyzeTestimony(statements: Statement[], findings: Finding[], suspects: Person[]): TestimonyAnalysis {
    const distribution: Record<TruthStatus, number> = { truthful: 0, lie: 0, evasive: 0 };
    for (const statement of statements) {
        distribution[statement.status]++;
    }

    const contradictions = findings.filter((f): f is Contradiction => f.kind === 'contradiction');

    return {
        totalStatements: statements.length,
        distribution,
        suspects: suspects.map(person => {
            const own = statements.filter(s => s.speaker === person.id);
            const involved = findings.filter(f => f.speakers.includes(person.id));
            return {
                id: person.id,
                name: person.name,
                statements: own.length,
                truthful: own.filter(s => s.status === 'truthful').length,
                lie: own.filter(s => s.status === 'lie').length,
                evasive: own.filter(s => s.status === 'evasive').length,
                contradictions: involved.filter(f => f.kind === 'contradiction').length,
                corroborations: involved.filter(f => f.kind === 'corroboration').length,
            };
        }),
        contradictions,
    };
}
