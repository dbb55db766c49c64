import { config } from '../../config.js';
import { Random } from '../../utils/random.js';
import { logger } from '../../utils/logger.js';
import { TraitModifier } from './case-file.js';
import { PolicyDegeneracyError } from './errors.js';
import { topicKey } from './topics.js';
import { LiarStyle, SuspectProfile, Topic, TruthStatus } from './types.js';

/**
 * Shares of each truth status for one answer. Always sums to 1.
 */
export interface Distribution {
    truthful: number;
    lie: number;
    evasive: number;
}

export const DEFAULT_TRAITS: Readonly<Record<string, TraitModifier>> = {
    nervous: { evasive: 0.15, lie: 0.05 },
    composed: { truth: 0.1, evasive: -0.1 },
    hostile: { truth: -0.1, evasive: 0.2 },
    cooperative: { truth: 0.2, lieScale: 0.5 },
    deceitful: { lie: 0.2, lieScale: 1.5 },
};

export interface DeceptionPolicyOptions {
    random: Random;
    /** Case-specific traits, merged over the defaults */
    traits?: Record<string, TraitModifier>;
    /** Lowest evasive share on a sensitive topic */
    minEvasive?: number;
}

/**
 * DeceptionPolicy - decides whether a suspect answers truthfully, lies or
 * evades.
 *
 * The decision depends only on the suspect's profile and whether the topic
 * is sensitive; it never looks at the solution. On sensitive topics the
 * evasive share has a floor, so a culprit pressed often enough will
 * eventually stop telling the plain truth.
 */
export class DeceptionPolicy {
    private traits: Record<string, TraitModifier>;
    private random: Random;
    private minEvasive: number;

    constructor(options: DeceptionPolicyOptions) {
        this.random = options.random;
        this.traits = { ...DEFAULT_TRAITS, ...(options.traits ?? {}) };
        this.minEvasive = options.minEvasive ?? config.policy.minEvasive;
        if (!(this.minEvasive > 0 && this.minEvasive < 1)) {
            throw new PolicyDegeneracyError(null, `minimum evasive share ${this.minEvasive} is outside (0, 1)`);
        }
    }

    distribution(profile: SuspectProfile, sensitive: boolean): Distribution {
        if (!(profile.reliability >= 0 && profile.reliability <= 1)) {
            throw new PolicyDegeneracyError(profile.id, `reliability ${profile.reliability} is outside [0, 1]`);
        }
        if (!(profile.pressure >= 0 && profile.pressure <= 1)) {
            throw new PolicyDegeneracyError(profile.id, `pressure ${profile.pressure} is outside [0, 1]`);
        }

        let truth = 0.3 + profile.reliability;
        let lie = (1 - profile.reliability) * 0.8;
        let evasive = 0.15 + profile.pressure * 0.2;

        if (sensitive) {
            truth *= 0.5;
            lie += 0.3;
            evasive += 0.2;
        }

        for (const name of profile.traits) {
            const trait = this.traits[name];
            if (!trait) {
                throw new PolicyDegeneracyError(profile.id, `unknown trait '${name}'`);
            }
            truth += trait.truth ?? 0;
            lie = (lie + (trait.lie ?? 0)) * (trait.lieScale ?? 1);
            evasive += trait.evasive ?? 0;
        }

        const weights = { truth, lie, evasive };
        for (const [label, weight] of Object.entries(weights)) {
            if (!Number.isFinite(weight) || weight < 0) {
                throw new PolicyDegeneracyError(profile.id, `${label} weight is ${weight}`);
            }
        }
        const total = truth + lie + evasive;
        if (total <= 0) {
            throw new PolicyDegeneracyError(profile.id, 'all weights are zero');
        }

        const shares: Distribution = { truthful: truth / total, lie: lie / total, evasive: evasive / total };
        if (sensitive && shares.evasive < this.minEvasive) {
            // Take the missing evasive mass proportionally from truth and lie
            const scale = (1 - this.minEvasive) / (shares.truthful + shares.lie);
            shares.truthful *= scale;
            shares.lie *= scale;
            shares.evasive = this.minEvasive;
        }
        return shares;
    }

    decide(profile: SuspectProfile, topic: Topic, sensitive: boolean): TruthStatus {
        const shares = this.distribution(profile, sensitive);
        const roll = this.random();

        let status: TruthStatus = 'evasive';
        if (roll < shares.truthful) {
            status = 'truthful';
        } else if (roll < shares.truthful + shares.lie) {
            status = 'lie';
        }

        logger.debug(`${profile.id} on ${topicKey(topic)}${sensitive ? ' (sensitive)' : ''}: ${status}`);
        return status;
    }

    /**
     * Check every profile for both sensitivity values; throws on the first degenerate one
     */
    validate(profiles: Iterable<SuspectProfile>): void {
        for (const profile of profiles) {
            this.distribution(profile, false);
            this.distribution(profile, true);
        }
    }

    liarStyle(profile: SuspectProfile): LiarStyle {
        return profile.liar;
    }
}
