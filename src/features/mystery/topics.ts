import { formatMinutes } from '../../utils/time.js';
import { FactValue, PersonId, Topic, TopicKind, TopicValueMap } from './types.js';

const VALUE_TYPES: { [K in TopicKind]: TopicValueMap[K]['type'] } = {
    whereabouts: 'location',
    relationship: 'relation',
    alibi: 'flag',
    handled: 'flag',
    arrival: 'time',
    witnesses: 'persons',
};

/** Pair topics describe one shared fact, so the key does not depend on who is named first */
function pairKey(a: PersonId, b: PersonId, separator: string): string {
    return a < b ? `${a}${separator}${b}` : `${b}${separator}${a}`;
}

/**
 * Canonical key of a topic. Two topics are the same topic iff their keys match.
 * Topic times are whole minutes (see `CaseWorld.checkTopic`).
 */
export function topicKey(topic: Topic): string {
    switch (topic.kind) {
        case 'whereabouts':
            return `whereabouts:${topic.subject}@${formatMinutes(topic.time)}`;
        case 'relationship':
            return `relationship:${pairKey(topic.subject, topic.other, '~')}`;
        case 'alibi':
            return `alibi:${pairKey(topic.subject, topic.companion, '+')}@${formatMinutes(topic.time)}`;
        case 'handled':
            return `handled:${topic.subject}#${topic.weapon}`;
        case 'arrival':
            return `arrival:${topic.subject}>${topic.location}`;
        case 'witnesses':
            return `witnesses:${topic.subject}@${formatMinutes(topic.time)}`;
    }
}

/**
 * The value type a topic's facts must carry.
 */
export function valueTypeOf(topic: Topic): FactValue['type'] {
    return VALUE_TYPES[topic.kind];
}

export function fitsTopic(topic: Topic, value: FactValue): boolean {
    return valueTypeOf(topic) === value.type;
}

export function sameValue(a: FactValue, b: FactValue): boolean {
    switch (a.type) {
        case 'location':
            return b.type === 'location' && a.id === b.id;
        case 'relation':
            return b.type === 'relation' && a.relation === b.relation;
        case 'flag':
            return b.type === 'flag' && a.value === b.value;
        case 'time':
            return b.type === 'time' && a.minutes === b.minutes;
        case 'persons':
            return b.type === 'persons'
                && a.ids.length === b.ids.length
                && a.ids.every(id => b.ids.includes(id));
    }
}

/**
 * Every person a topic refers to.
 */
export function topicPersons(topic: Topic): string[] {
    switch (topic.kind) {
        case 'relationship':
            return [topic.subject, topic.other];
        case 'alibi':
            return [topic.subject, topic.companion];
        default:
            return [topic.subject];
    }
}

export function describeValue(value: FactValue | null): string {
    if (value === null) return 'no answer';
    switch (value.type) {
        case 'location':
            return value.id;
        case 'relation':
            return value.relation;
        case 'flag':
            return value.value ? 'yes' : 'no';
        case 'time':
            return formatMinutes(value.minutes);
        case 'persons':
            return value.ids.length > 0 ? value.ids.join(', ') : 'nobody';
    }
}
