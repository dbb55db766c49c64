import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { parseTimeToMinutes } from '../../utils/time.js';
import { CaseFileError } from './errors.js';
import { LIAR_STYLES, RELATIONSHIP_KINDS } from './types.js';

const Id = z.string().min(1);

const ClockTime = z.string().refine(value => parseTimeToMinutes(value) !== null, {
    message: 'Expected a clock time (HH:MM)',
});

export const TraitModifierSchema = z.object({
    truth: z.number().optional(),
    lie: z.number().optional(),
    lieScale: z.number().optional(),
    evasive: z.number().optional(),
});

export const PersonSchema = z.object({
    id: Id,
    name: z.string().min(1),
    role: z.string().optional(),
    reliability: z.number().min(0).max(1).default(0.5),
    traits: z.array(z.string()).default([]),
    liar: z.enum(LIAR_STYLES).default('consistent'),
});

export const LocationSchema = z.object({
    id: Id,
    name: z.string().min(1),
    description: z.string().optional(),
    connects_to: z.array(Id).default([]),
    capacity: z.number().int().positive().optional(),
    access: z.array(Id).optional(),
});

const NamedEntitySchema = z.object({
    id: Id,
    name: z.string().min(1),
    description: z.string().optional(),
});

export const RelationshipSchema = z.object({
    id: Id,
    between: z.tuple([Id, Id]),
    kind: z.enum(RELATIONSHIP_KINDS),
});

export const EventSchema = z.object({
    id: Id,
    time: ClockTime,
    location: Id,
    participants: z.array(Id).min(1),
    /** The participant performing the action (and handling the weapon, if any) */
    actor: Id.optional(),
    description: z.string().default(''),
    weapon: Id.optional(),
    recorded: z.boolean().default(false),
    crime: z.boolean().default(false),
});

export const CaseFileSchema = z.object({
    id: Id,
    name: z.string().min(1),
    description: z.string().optional(),
    victim: Id,
    persons: z.array(PersonSchema).min(2),
    locations: z.array(LocationSchema).min(1),
    weapons: z.array(NamedEntitySchema).min(1),
    motives: z.array(NamedEntitySchema).min(1),
    relationships: z.array(RelationshipSchema).default([]),
    events: z.array(EventSchema).min(1),
    solution: z.object({
        culprit: Id,
        weapon: Id,
        location: Id,
        motive: Id,
    }),
    /** Case-specific trait modifiers, merged over the default trait table */
    traits: z.record(TraitModifierSchema).optional(),
});

/** A validated case file */
export type CaseFile = z.infer<typeof CaseFileSchema>;
/** A case file as written, before defaults are applied */
export type CaseFileInput = z.input<typeof CaseFileSchema>;
export type TraitModifier = z.infer<typeof TraitModifierSchema>;

/**
 * Validate raw case data, reporting every offending path.
 */
export function parseCaseFile(raw: unknown, source: string = 'inline'): CaseFile {
    const result = CaseFileSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(issue =>
            `${issue.path.length > 0 ? issue.path.join('.') : 'root'}: ${issue.message}`
        );
        throw new CaseFileError(source, issues);
    }
    return result.data;
}

/**
 * Read case.yaml (or case.json) from a case directory.
 */
export function readCaseFile(caseDir: string): CaseFile {
    let configPath = path.join(caseDir, 'case.yaml');
    if (!fs.existsSync(configPath)) {
        configPath = path.join(caseDir, 'case.json');
    }
    if (!fs.existsSync(configPath)) {
        throw new CaseFileError(caseDir, ['case.yaml or case.json not found']);
    }

    const content = fs.readFileSync(configPath, 'utf8');
    let raw: unknown;
    try {
        raw = configPath.endsWith('.yaml') ? yaml.load(content) : JSON.parse(content);
    } catch (error) {
        throw new CaseFileError(configPath, [error instanceof Error ? error.message : String(error)]);
    }
    return parseCaseFile(raw, configPath);
}
