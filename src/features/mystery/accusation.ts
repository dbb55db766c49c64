import { Finding, LocationId, MotiveId, PersonId, Solution, WeaponId } from './types.js';

export interface Accusation {
    culprit: PersonId;
    weapon: WeaponId;
    location: LocationId;
    motive?: MotiveId;
}

export interface InvestigationStats {
    questions: number;
    contradictions: number;
    corroborations: number;
    evasions: number;
}

export interface AccusationResult {
    correct: boolean;
    matches: {
        culprit: boolean;
        weapon: boolean;
        location: boolean;
        motive?: boolean;
    };
    solution: Solution;
    findings: Finding[];
    stats: InvestigationStats;
    score: number;
}

/**
 * Holds the solution for the lifetime of a session and reveals it only when
 * an accusation is evaluated.
 */
export class AccusationDesk {
    private readonly solution: Solution;

    constructor(solution: Solution) {
        this.solution = Object.freeze({ ...solution });
    }

    evaluate(accusation: Accusation, findings: Finding[], stats: InvestigationStats): AccusationResult {
        const matches: AccusationResult['matches'] = {
            culprit: accusation.culprit === this.solution.culprit,
            weapon: accusation.weapon === this.solution.weapon,
            location: accusation.location === this.solution.location,
        };
        if (accusation.motive !== undefined) {
            matches.motive = accusation.motive === this.solution.motive;
        }
        const correct = matches.culprit && matches.weapon && matches.location;

        return {
            correct,
            matches,
            solution: this.solution,
            findings,
            stats,
            score: scoreInvestigation(correct, stats),
        };
    }
}

/**
 * 100 to start, -50 for a wrong accusation, a bonus for a short
 * investigation and +5 per contradiction uncovered. Never below 0.
 */
export function scoreInvestigation(correct: boolean, stats: InvestigationStats): number {
    let score = 100;
    if (!correct) score -= 50;
    if (stats.questions < 10) {
        score += 20;
    } else if (stats.questions < 20) {
        score += 10;
    }
    score += stats.contradictions * 5;
    return Math.max(0, score);
}
