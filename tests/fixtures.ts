import { CaseFile, CaseFileInput, parseCaseFile } from '../src/features/mystery/case-file.js';
import { Random } from '../src/utils/random.js';

/**
 * A small case:
 *
 * 18:00 everyone in the hall (recorded)
 * 19:00 ann in the library; ben and cal in the kitchen
 * 19:30 cal alone in the closet (sole occupancy)
 * 19:45 ben picks up the knife in the kitchen (recorded)
 * 20:00 ann kills vic with the rope in the library; ben in the hall (recorded); cal in the kitchen
 */
export function caseInput(): CaseFileInput {
    return {
        id: 'quiet-house',
        name: 'The Quiet House',
        victim: 'vic',
        persons: [
            { id: 'vic', name: 'Victor' },
            { id: 'ann', name: 'Ann', reliability: 0.2, liar: 'consistent' },
            { id: 'ben', name: 'Ben', reliability: 0.5, traits: ['nervous'], liar: 'inconsistent' },
            { id: 'cal', name: 'Cal', reliability: 0.9, traits: ['composed'] },
        ],
        locations: [
            { id: 'hall', name: 'Hall', connects_to: ['library', 'kitchen'] },
            { id: 'library', name: 'Library', connects_to: ['vault'] },
            { id: 'kitchen', name: 'Kitchen', connects_to: ['closet'] },
            { id: 'closet', name: 'Closet', capacity: 1 },
            { id: 'vault', name: 'Vault', access: ['ann'] },
        ],
        weapons: [
            { id: 'rope', name: 'Rope' },
            { id: 'knife', name: 'Knife' },
        ],
        motives: [
            { id: 'greed', name: 'Greed' },
            { id: 'revenge', name: 'Revenge' },
        ],
        relationships: [
            { id: 'rel_ann_vic', between: ['ann', 'vic'], kind: 'family' },
            { id: 'rel_ben_cal', between: ['ben', 'cal'], kind: 'friend' },
        ],
        events: [
            { id: 'ev_arrive', time: '18:00', location: 'hall', participants: ['vic', 'ann', 'ben', 'cal'], recorded: true },
            { id: 'ev_ann_lib', time: '19:00', location: 'library', participants: ['ann'] },
            { id: 'ev_ben_kitchen', time: '19:00', location: 'kitchen', participants: ['ben', 'cal'] },
            { id: 'ev_cal_closet', time: '19:30', location: 'closet', participants: ['cal'] },
            { id: 'ev_knife', time: '19:45', location: 'kitchen', participants: ['ben'], actor: 'ben', weapon: 'knife', recorded: true },
            { id: 'ev_crime', time: '20:00', location: 'library', participants: ['ann', 'vic'], actor: 'ann', weapon: 'rope', crime: true },
            { id: 'ev_ben_hall', time: '20:00', location: 'hall', participants: ['ben'], recorded: true },
            { id: 'ev_cal_kitchen', time: '20:00', location: 'kitchen', participants: ['cal'] },
        ],
        solution: { culprit: 'ann', weapon: 'rope', location: 'library', motive: 'greed' },
    };
}

export function caseFile(edit?: (input: CaseFileInput) => void): CaseFile {
    const input = caseInput();
    edit?.(input);
    return parseCaseFile(input);
}

/**
 * Replays a fixed list of draws and fails loudly when a test consumes more
 */
export function scripted(values: number[]): Random {
    let index = 0;
    return () => {
        if (index >= values.length) {
            throw new Error(`Scripted random exhausted after ${values.length} draws`);
        }
        return values[index++];
    };
}

/** 19:00, 19:30 and 20:00 in minutes */
export const T1900 = 1140;
export const T1930 = 1170;
export const T2000 = 1200;
