export type PersonId = string;
export type LocationId = string;
export type WeaponId = string;
export type EventId = string;
export type MotiveId = string;
export type RelationshipId = string;

/** Minutes since midnight */
export type Timestamp = number;

export const RELATIONSHIP_KINDS = [
    'friend', 'rival', 'lover', 'family', 'colleague', 'stranger', 'debtor', 'creditor',
] as const;
export type RelationshipKind = typeof RELATIONSHIP_KINDS[number];

export const LIAR_STYLES = ['consistent', 'inconsistent'] as const;
/** Whether a liar repeats the same story or re-invents it on every ask */
export type LiarStyle = typeof LIAR_STYLES[number];

export type TruthStatus = 'truthful' | 'lie' | 'evasive';

export interface Person {
    id: PersonId;
    name: string;
    role?: string;
    reliability: number;
    traits: string[];
    liar: LiarStyle;
    isVictim: boolean;
}

export interface Location {
    id: LocationId;
    name: string;
    description?: string;
    connectsTo: LocationId[];
    /** 1 marks a sole-occupancy room */
    capacity?: number;
    /** Restricted room: only these persons can get in */
    access?: PersonId[];
}

export interface Weapon {
    id: WeaponId;
    name: string;
    description?: string;
}

export interface Motive {
    id: MotiveId;
    name: string;
    description?: string;
}

export interface Relationship {
    id: RelationshipId;
    between: [PersonId, PersonId];
    kind: RelationshipKind;
}

export interface CaseEvent {
    id: EventId;
    time: Timestamp;
    location: LocationId;
    participants: PersonId[];
    actor?: PersonId;
    description: string;
    weapon?: WeaponId;
    /** Captured by footage, keycard or logs: nobody involved can deny it */
    recorded: boolean;
    crime: boolean;
}

export interface Solution {
    culprit: PersonId;
    weapon: WeaponId;
    location: LocationId;
    motive: MotiveId;
}

// ---------------------------------------------------------------------------
// Topics
// ---------------------------------------------------------------------------

export interface WhereaboutsTopic {
    kind: 'whereabouts';
    subject: PersonId;
    time: Timestamp;
}

export interface RelationshipTopic {
    kind: 'relationship';
    subject: PersonId;
    other: PersonId;
}

/** Were subject and companion together at the given time? */
export interface AlibiTopic {
    kind: 'alibi';
    subject: PersonId;
    companion: PersonId;
    time: Timestamp;
}

export interface HandledTopic {
    kind: 'handled';
    subject: PersonId;
    weapon: WeaponId;
}

export interface ArrivalTopic {
    kind: 'arrival';
    subject: PersonId;
    location: LocationId;
}

/** Who saw the subject at the given time? */
export interface WitnessesTopic {
    kind: 'witnesses';
    subject: PersonId;
    time: Timestamp;
}

export type Topic = WhereaboutsTopic | RelationshipTopic | AlibiTopic | HandledTopic | ArrivalTopic | WitnessesTopic;
export type TopicKind = Topic['kind'];

export interface LocationValue {
    type: 'location';
    id: LocationId;
}

export interface RelationValue {
    type: 'relation';
    relation: RelationshipKind;
}

export interface FlagValue {
    type: 'flag';
    value: boolean;
}

export interface TimeValue {
    type: 'time';
    minutes: Timestamp;
}

/** An unordered set of persons; empty means nobody */
export interface PersonsValue {
    type: 'persons';
    ids: readonly PersonId[];
}

export type FactValue = LocationValue | RelationValue | FlagValue | TimeValue | PersonsValue;

export interface TopicValueMap {
    whereabouts: LocationValue;
    relationship: RelationValue;
    alibi: FlagValue;
    handled: FlagValue;
    arrival: TimeValue;
    witnesses: PersonsValue;
}

// ---------------------------------------------------------------------------
// Statements and findings
// ---------------------------------------------------------------------------

export interface StatementDraft {
    speaker: PersonId;
    topic: Topic;
    /** null = no commitment */
    value: FactValue | null;
    status: TruthStatus;
    /** Only set when re-appending a known history; must equal the next sequence */
    sequence?: number;
}

export interface Statement {
    readonly id: string;
    readonly sequence: number;
    readonly speaker: PersonId;
    readonly topic: Topic;
    readonly topicKey: string;
    readonly value: FactValue | null;
    readonly status: TruthStatus;
    readonly recordedAt: Date;
}

export type ContradictionRule = 'self' | 'cross-suspect' | 'ground-truth';
export type CorroborationRule = 'agreement' | 'record';

export type FindingBasis =
    | { type: 'statements'; earlier: number; later: number }
    | { type: 'event'; statement: number; eventId: EventId };

export interface Contradiction {
    kind: 'contradiction';
    rule: ContradictionRule;
    topicKey: string;
    basis: FindingBasis;
    speakers: PersonId[];
}

export interface Corroboration {
    kind: 'corroboration';
    rule: CorroborationRule;
    topicKey: string;
    basis: FindingBasis;
    speakers: PersonId[];
}

export type Finding = Contradiction | Corroboration;

// ---------------------------------------------------------------------------
// Suspects
// ---------------------------------------------------------------------------

/**
 * Per-suspect parameters read by the deception policy.
 */
export interface SuspectProfile {
    id: PersonId;
    reliability: number;
    traits: string[];
    liar: LiarStyle;
    /** 0 = relaxed, 1 = cornered; raised by accumulated contradictions */
    pressure: number;
}

/**
 * One question, already reduced to a topic by the caller.
 */
export interface Question {
    speaker: PersonId;
    topic: Topic;
    sensitive?: boolean;
}
