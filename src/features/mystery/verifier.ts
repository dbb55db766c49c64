import { formatMinutes, parseTimeToMinutes } from '../../utils/time.js';
import { CaseFile } from './case-file.js';

export interface VerificationResult {
    isValid: boolean;
    issues: string[];
}

/**
 * Structural checks a case file must pass before a world is built from it:
 * unique ids, resolvable references, one crime matching the solution and a
 * physically possible timeline.
 */
export class WorldVerifier {
    verify(file: CaseFile): VerificationResult {
        const issues: string[] = [];

        // 1. Unique ids across every entity kind
        const seen = new Set<string>();
        const allIds = [
            ...file.persons.map(p => p.id),
            ...file.locations.map(l => l.id),
            ...file.weapons.map(w => w.id),
            ...file.motives.map(m => m.id),
            ...file.relationships.map(r => r.id),
            ...file.events.map(e => e.id),
        ];
        for (const id of allIds) {
            if (seen.has(id)) issues.push(`Duplicate id '${id}'`);
            seen.add(id);
        }

        const persons = new Set(file.persons.map(p => p.id));
        const locations = new Map(file.locations.map((l): [string, CaseFile['locations'][number]] => [l.id, l]));
        const weapons = new Set(file.weapons.map(w => w.id));
        const motives = new Set(file.motives.map(m => m.id));

        // 2. References
        if (!persons.has(file.victim)) {
            issues.push(`Victim '${file.victim}' is not a person`);
        }

        for (const location of file.locations) {
            for (const target of location.connects_to) {
                if (!locations.has(target)) {
                    issues.push(`Location '${location.id}' connects to unknown location '${target}'`);
                }
            }
            for (const personId of location.access ?? []) {
                if (!persons.has(personId)) {
                    issues.push(`Location '${location.id}' grants access to unknown person '${personId}'`);
                }
            }
        }

        for (const rel of file.relationships) {
            const [a, b] = rel.between;
            if (!persons.has(a) || !persons.has(b)) {
                issues.push(`Relationship '${rel.id}' references an unknown person`);
            } else if (a === b) {
                issues.push(`Relationship '${rel.id}' relates '${a}' to themself`);
            }
        }

        for (const event of file.events) {
            if (!locations.has(event.location)) {
                issues.push(`Event '${event.id}' takes place at unknown location '${event.location}'`);
            }
            for (const personId of event.participants) {
                if (!persons.has(personId)) {
                    issues.push(`Event '${event.id}' involves unknown person '${personId}'`);
                }
            }
            if (event.actor !== undefined && !event.participants.includes(event.actor)) {
                issues.push(`Event '${event.id}' actor '${event.actor}' is not a participant`);
            }
            if (event.weapon !== undefined) {
                if (!weapons.has(event.weapon)) {
                    issues.push(`Event '${event.id}' uses unknown weapon '${event.weapon}'`);
                }
                if (event.actor === undefined) {
                    issues.push(`Event '${event.id}' handles a weapon but names no actor`);
                }
            }
            const restricted = locations.get(event.location)?.access;
            if (restricted) {
                for (const personId of event.participants) {
                    if (!restricted.includes(personId)) {
                        issues.push(`Event '${event.id}' puts '${personId}' inside restricted '${event.location}'`);
                    }
                }
            }
        }

        // 3. Solution and the crime event
        const { solution } = file;
        if (!persons.has(solution.culprit)) {
            issues.push(`Solution culprit '${solution.culprit}' is not a person`);
        } else if (solution.culprit === file.victim) {
            issues.push('Solution culprit is the victim');
        }
        if (!weapons.has(solution.weapon)) issues.push(`Solution weapon '${solution.weapon}' is not a weapon`);
        if (!locations.has(solution.location)) issues.push(`Solution location '${solution.location}' is not a location`);
        if (!motives.has(solution.motive)) issues.push(`Solution motive '${solution.motive}' is not a motive`);

        const crimes = file.events.filter(e => e.crime);
        if (crimes.length !== 1) {
            issues.push(`Expected exactly one crime event, found ${crimes.length}`);
        } else {
            const crime = crimes[0];
            if (!crime.participants.includes(solution.culprit)) {
                issues.push(`Crime event '${crime.id}' does not include the culprit`);
            }
            if (!crime.participants.includes(file.victim)) {
                issues.push(`Crime event '${crime.id}' does not include the victim`);
            }
            if (crime.location !== solution.location) {
                issues.push(`Crime event '${crime.id}' is not at the solution location`);
            }
            if (crime.weapon !== undefined && crime.weapon !== solution.weapon) {
                issues.push(`Crime event '${crime.id}' uses a weapon other than the solution weapon`);
            }
            if (crime.actor !== undefined && crime.actor !== solution.culprit) {
                issues.push(`Crime event '${crime.id}' actor is not the culprit`);
            }

            // The victim cannot turn up anywhere after the time of death
            const deathTime = parseTimeToMinutes(crime.time) ?? 0;
            for (const event of file.events) {
                const time = parseTimeToMinutes(event.time) ?? 0;
                if (event !== crime && time > deathTime && event.participants.includes(file.victim)) {
                    issues.push(`Victim appears in event '${event.id}' after the time of death`);
                }
            }
        }

        // 4. Timeline physics: one place per person per moment, room capacity
        const placeAt = new Map<string, string>();
        const occupancy = new Map<string, Set<string>>();
        for (const event of file.events) {
            const time = parseTimeToMinutes(event.time) ?? 0;
            for (const personId of event.participants) {
                const key = `${personId}@${time}`;
                const previous = placeAt.get(key);
                if (previous !== undefined && previous !== event.location) {
                    issues.push(
                        `Timeline violation: '${personId}' is at '${previous}' and '${event.location}' at ${formatMinutes(time)}`
                    );
                }
                placeAt.set(key, event.location);
            }

            const roomKey = `${event.location}@${time}`;
            const present = occupancy.get(roomKey) ?? new Set<string>();
            event.participants.forEach(p => present.add(p));
            occupancy.set(roomKey, present);
        }
        for (const [roomKey, present] of occupancy) {
            const [locationId] = roomKey.split('@');
            const capacity = locations.get(locationId)?.capacity;
            if (capacity !== undefined && present.size > capacity) {
                issues.push(`Capacity violation: ${present.size} people in '${locationId}' (capacity ${capacity})`);
            }
        }

        return {
            isValid: issues.length === 0,
            issues,
        };
    }
}
