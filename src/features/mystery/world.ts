import { parseTimeToMinutes } from '../../utils/time.js';
import { CaseFile, readCaseFile, TraitModifier } from './case-file.js';
import { WorldIntegrityError } from './errors.js';
import { topicPersons } from './topics.js';
import { WorldVerifier } from './verifier.js';
import {
    CaseEvent,
    EventId,
    FactValue,
    Location,
    LocationId,
    Motive,
    Person,
    PersonId,
    Relationship,
    Timestamp,
    Topic,
    Weapon,
} from './types.js';

export type NotApplicableReason = 'unknown-entity' | 'invalid-topic' | 'no-knowledge' | 'no-record';

/**
 * Outcome of asking the world what a person knows about a topic
 */
export type Resolution =
    | { status: 'known'; value: FactValue; eventId?: EventId }
    | { status: 'not-applicable'; reason: NotApplicableReason };

/**
 * A fact established by a recorded (footage/keycard/log) event
 */
export interface RecordedFact {
    value: FactValue;
    event: CaseEvent;
}

/** Minutes either side of the time of death in which one's own whereabouts are sensitive */
const SENSITIVE_WINDOW = 30;
const MINUTES_PER_DAY = 1440;

function notApplicable(reason: NotApplicableReason): Resolution {
    return { status: 'not-applicable', reason };
}

/**
 * CaseWorld - immutable ground truth of one case.
 *
 * Built once per session from a validated case file. The solution record is
 * checked during construction but never stored here; only the accusation desk
 * holds it.
 */
export default class CaseWorld {
    readonly id: string;
    readonly name: string;
    readonly description: string;
    readonly victim: PersonId;
    readonly timeOfDeath: Timestamp;
    /** Where the body was found; public, like the time of death */
    readonly crimeScene: LocationId | undefined;
    /** Case-specific trait modifiers for the deception policy */
    readonly traitModifiers: Readonly<Record<string, TraitModifier>>;

    private readonly _persons: Map<PersonId, Person>;
    private readonly _locations: Map<LocationId, Location>;
    private readonly _weapons: Map<string, Weapon>;
    private readonly _motives: Map<string, Motive>;
    private readonly _relationships: Relationship[];
    private readonly _events: CaseEvent[];
    private readonly _neighbours: Map<LocationId, Set<LocationId>>;

    private constructor(file: CaseFile) {
        this.id = file.id;
        this.name = file.name;
        this.description = file.description ?? '';
        this.victim = file.victim;
        this.traitModifiers = Object.freeze({ ...(file.traits ?? {}) });

        this._persons = new Map(file.persons.map((p): [PersonId, Person] => [p.id, Object.freeze({
            id: p.id,
            name: p.name,
            role: p.role,
            reliability: p.reliability,
            traits: [...p.traits],
            liar: p.liar,
            isVictim: p.id === file.victim,
        })]));

        this._locations = new Map(file.locations.map((l): [LocationId, Location] => [l.id, Object.freeze({
            id: l.id,
            name: l.name,
            description: l.description,
            connectsTo: [...l.connects_to],
            capacity: l.capacity,
            access: l.access ? [...l.access] : undefined,
        })]));

        this._weapons = new Map(file.weapons.map((w): [string, Weapon] => [w.id, Object.freeze({ ...w })]));
        this._motives = new Map(file.motives.map((m): [string, Motive] => [m.id, Object.freeze({ ...m })]));
        this._relationships = file.relationships.map((r): Relationship => Object.freeze<Relationship>({
            id: r.id,
            between: [r.between[0], r.between[1]],
            kind: r.kind,
        }));

        // Chronological; Array.prototype.sort is stable so same-time events keep file order
        this._events = file.events
            .map((e): CaseEvent => Object.freeze({
                id: e.id,
                time: parseTimeToMinutes(e.time) ?? 0,
                location: e.location,
                participants: [...e.participants],
                actor: e.actor,
                description: e.description,
                weapon: e.weapon,
                recorded: e.recorded,
                crime: e.crime,
            }))
            .sort((a, b) => a.time - b.time);

        const crime = this._events.find(e => e.crime);
        this.timeOfDeath = crime ? crime.time : 0;
        this.crimeScene = crime?.location;

        // Adjacency is symmetric even when the file lists one direction only
        this._neighbours = new Map();
        for (const location of this._locations.values()) {
            for (const target of location.connectsTo) {
                this.link(location.id, target);
                this.link(target, location.id);
            }
        }
    }

    private link(from: LocationId, to: LocationId): void {
        const set = this._neighbours.get(from) ?? new Set<LocationId>();
        set.add(to);
        this._neighbours.set(from, set);
    }

    /**
     * Build a world from a parsed case file, enforcing referential integrity
     */
    static fromConfig(file: CaseFile): CaseWorld {
        const result = new WorldVerifier().verify(file);
        if (!result.isValid) {
            throw new WorldIntegrityError(file.id, result.issues);
        }
        return new CaseWorld(file);
    }

    /**
     * Load a world from a case directory (case.yaml or case.json)
     */
    static load(caseDir: string): CaseWorld {
        return CaseWorld.fromConfig(readCaseFile(caseDir));
    }

    // -----------------------------------------------------------------------
    // Entity lookups
    // -----------------------------------------------------------------------

    get persons(): Person[] {
        return Array.from(this._persons.values());
    }

    /** Everyone who can be questioned */
    get suspects(): Person[] {
        return this.persons.filter(p => !p.isVictim);
    }

    get locations(): Location[] {
        return Array.from(this._locations.values());
    }

    get weapons(): Weapon[] {
        return Array.from(this._weapons.values());
    }

    get motives(): Motive[] {
        return Array.from(this._motives.values());
    }

    /** The full timeline, in chronological order */
    get events(): CaseEvent[] {
        return [...this._events];
    }

    person(id: PersonId): Person | undefined {
        return this._persons.get(id);
    }

    location(id: LocationId): Location | undefined {
        return this._locations.get(id);
    }

    hasWeapon(id: string): boolean {
        return this._weapons.has(id);
    }

    hasMotive(id: string): boolean {
        return this._motives.has(id);
    }

    /**
     * Display name of any entity, falling back to its id
     */
    nameOf(id: string): string {
        return this._persons.get(id)?.name
            ?? this._locations.get(id)?.name
            ?? this._weapons.get(id)?.name
            ?? this._motives.get(id)?.name
            ?? id;
    }

    neighbours(id: LocationId): LocationId[] {
        return Array.from(this._neighbours.get(id) ?? []);
    }

    canEnter(personId: PersonId, locationId: LocationId): boolean {
        const location = this._locations.get(locationId);
        if (!location) return false;
        return !location.access || location.access.includes(personId);
    }

    /**
     * Locations a person appears at anywhere in the timeline
     */
    visitedLocations(personId: PersonId): Set<LocationId> {
        return new Set(this._events.filter(e => e.participants.includes(personId)).map(e => e.location));
    }

    /**
     * Events captured by footage or logs; these are public evidence
     */
    recordedEvents(): CaseEvent[] {
        return this._events.filter(e => e.recorded);
    }

    /**
     * The latest event at or before `time` that involves the person
     */
    whereabouts(personId: PersonId, time: Timestamp): CaseEvent | undefined {
        let latest: CaseEvent | undefined;
        for (const event of this._events) {
            if (event.time > time) break;
            if (event.participants.includes(personId)) latest = event;
        }
        return latest;
    }

    // -----------------------------------------------------------------------
    // Topic resolution
    // -----------------------------------------------------------------------

    /**
     * Check that every entity a topic mentions exists and the topic is well formed
     */
    checkTopic(topic: Topic): NotApplicableReason | null {
        if (topicPersons(topic).some(id => !this._persons.has(id))) return 'unknown-entity';

        switch (topic.kind) {
            case 'whereabouts':
                return this.isClockTime(topic.time) ? null : 'invalid-topic';
            case 'relationship':
                return topic.subject === topic.other ? 'invalid-topic' : null;
            case 'alibi':
                if (topic.subject === topic.companion) return 'invalid-topic';
                return this.isClockTime(topic.time) ? null : 'invalid-topic';
            case 'handled':
                return this._weapons.has(topic.weapon) ? null : 'unknown-entity';
            case 'arrival':
                return this._locations.has(topic.location) ? null : 'unknown-entity';
            case 'witnesses':
                return this.isClockTime(topic.time) ? null : 'invalid-topic';
        }
    }

    /** Questions are asked about whole minutes of the day */
    private isClockTime(time: number): boolean {
        return Number.isInteger(time) && time >= 0 && time < MINUTES_PER_DAY;
    }

    /**
     * What the knower truthfully knows about a topic.
     *
     * Total over the topic space: a person knows facts about themself, and
     * facts about others only when they took part in the establishing event.
     */
    resolve(topic: Topic, knower: PersonId): Resolution {
        const invalid = this.checkTopic(topic);
        if (invalid) return notApplicable(invalid);
        if (!this._persons.has(knower)) return notApplicable('unknown-entity');

        switch (topic.kind) {
            case 'whereabouts': {
                const event = this.whereabouts(topic.subject, topic.time);
                if (!event) return notApplicable('no-record');
                if (knower !== topic.subject && !event.participants.includes(knower)) {
                    return notApplicable('no-knowledge');
                }
                return { status: 'known', value: { type: 'location', id: event.location }, eventId: event.id };
            }
            case 'relationship': {
                if (knower !== topic.subject && knower !== topic.other) return notApplicable('no-knowledge');
                const rel = this.relationshipBetween(topic.subject, topic.other);
                return { status: 'known', value: { type: 'relation', relation: rel?.kind ?? 'stranger' } };
            }
            case 'alibi': {
                if (knower !== topic.subject && knower !== topic.companion) return notApplicable('no-knowledge');
                const own = this.whereabouts(topic.subject, topic.time);
                const other = this.whereabouts(topic.companion, topic.time);
                if (!own || !other) return notApplicable('no-record');
                return {
                    status: 'known',
                    value: { type: 'flag', value: own.location === other.location },
                    eventId: own.id,
                };
            }
            case 'handled': {
                const handlings = this._events.filter(e => e.weapon === topic.weapon && e.actor === topic.subject);
                if (knower === topic.subject) {
                    return { status: 'known', value: { type: 'flag', value: handlings.length > 0 }, eventId: handlings[0]?.id };
                }
                const witnessed = handlings.find(e => e.participants.includes(knower));
                if (!witnessed) return notApplicable('no-knowledge');
                return { status: 'known', value: { type: 'flag', value: true }, eventId: witnessed.id };
            }
            case 'arrival': {
                const first = this._events.find(e => e.location === topic.location && e.participants.includes(topic.subject));
                if (!first) return notApplicable('no-record');
                if (knower !== topic.subject && !first.participants.includes(knower)) {
                    return notApplicable('no-knowledge');
                }
                return { status: 'known', value: { type: 'time', minutes: first.time }, eventId: first.id };
            }
            case 'witnesses': {
                const event = this.whereabouts(topic.subject, topic.time);
                if (!event) return notApplicable('no-record');
                if (knower !== topic.subject && !event.participants.includes(knower)) {
                    return notApplicable('no-knowledge');
                }
                return { status: 'known', value: this.witnessesOf(topic.subject, event), eventId: event.id };
            }
        }
    }

    private witnessesOf(subject: PersonId, event: CaseEvent): FactValue {
        return { type: 'persons', ids: event.participants.filter(id => id !== subject).sort() };
    }

    /**
     * The recorded event establishing a topic's fact, if the topic has one
     */
    recordFor(topic: Topic): RecordedFact | null {
        if (this.checkTopic(topic)) return null;

        switch (topic.kind) {
            case 'whereabouts': {
                const event = this.whereabouts(topic.subject, topic.time);
                return event?.recorded ? { value: { type: 'location', id: event.location }, event } : null;
            }
            case 'alibi': {
                const own = this.whereabouts(topic.subject, topic.time);
                const other = this.whereabouts(topic.companion, topic.time);
                if (!own?.recorded || !other?.recorded) return null;
                return { value: { type: 'flag', value: own.location === other.location }, event: own };
            }
            case 'handled': {
                const event = this._events.find(e =>
                    e.recorded && e.weapon === topic.weapon && e.actor === topic.subject
                );
                return event ? { value: { type: 'flag', value: true }, event } : null;
            }
            case 'arrival': {
                const first = this._events.find(e => e.location === topic.location && e.participants.includes(topic.subject));
                return first?.recorded ? { value: { type: 'time', minutes: first.time }, event: first } : null;
            }
            case 'witnesses': {
                const event = this.whereabouts(topic.subject, topic.time);
                return event?.recorded ? { value: this.witnessesOf(topic.subject, event), event } : null;
            }
            case 'relationship':
                return null;
        }
    }

    /**
     * Whether a question directly implicates the speaker in the murder:
     * their own movements around the time of death, their tie to the
     * victim, or their handling of a weapon.
     */
    isSensitive(speaker: PersonId, topic: Topic): boolean {
        const nearDeath = (time: Timestamp) => Math.abs(time - this.timeOfDeath) <= SENSITIVE_WINDOW;

        switch (topic.kind) {
            case 'whereabouts':
            case 'witnesses':
                return topic.subject === speaker && nearDeath(topic.time);
            case 'alibi':
                return (topic.subject === speaker || topic.companion === speaker) && nearDeath(topic.time);
            case 'relationship': {
                const pair = [topic.subject, topic.other];
                return pair.includes(speaker) && pair.includes(this.victim);
            }
            case 'handled':
                return topic.subject === speaker;
            case 'arrival':
                return false;
        }
    }

    /**
     * Whether two committed claims on different topics cannot both be true:
     * two people alone in a sole-occupancy room at once.
     */
    areExclusive(
        a: { topic: Topic; value: FactValue | null },
        b: { topic: Topic; value: FactValue | null }
    ): boolean {
        if (a.value === null || b.value === null) return false;

        if (a.topic.kind === 'whereabouts' && b.topic.kind === 'whereabouts'
            && a.value.type === 'location' && b.value.type === 'location') {
            if (a.topic.subject === b.topic.subject || a.topic.time !== b.topic.time) return false;
            if (a.value.id !== b.value.id) return false;
            return this._locations.get(a.value.id)?.capacity === 1;
        }

        return false;
    }

    private relationshipBetween(a: PersonId, b: PersonId): Relationship | undefined {
        return this._relationships.find(r =>
            (r.between[0] === a && r.between[1] === b) || (r.between[0] === b && r.between[1] === a)
        );
    }
}
