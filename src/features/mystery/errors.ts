/**
 * Base class for every error raised by the testimony core.
 * A fatal error ends the session (or the case load); the rest are local.
 */
export class MysteryError extends Error {
    readonly fatal: boolean;

    constructor(message: string, fatal: boolean) {
        super(message);
        this.name = new.target.name;
        this.fatal = fatal;
    }
}

/**
 * The case world breaks referential integrity or a structural rule.
 */
export class WorldIntegrityError extends MysteryError {
    readonly issues: string[];

    constructor(caseId: string, issues: string[]) {
        super(`Case '${caseId}' violates world integrity: ${issues.join('; ')}`, true);
        this.issues = issues;
    }
}

/**
 * A case file is missing, unreadable or fails schema validation.
 */
export class CaseFileError extends MysteryError {
    readonly issues: string[];

    constructor(source: string, issues: string[]) {
        super(`Invalid case file ${source}: ${issues.join('; ')}`, true);
        this.issues = issues;
    }
}

/**
 * A statement was appended out of sequence or twice.
 */
export class LedgerOrderingError extends MysteryError {
    constructor(message: string) {
        super(message, true);
    }
}

/**
 * A suspect profile, or the policy's own settings, yield no valid
 * truth/lie/evasive distribution. `suspectId` is null for a bad setting.
 */
export class PolicyDegeneracyError extends MysteryError {
    readonly suspectId: string | null;

    constructor(suspectId: string | null, reason: string) {
        super(suspectId === null
            ? `Degenerate deception policy: ${reason}`
            : `Suspect '${suspectId}' has a degenerate deception profile: ${reason}`, true);
        this.suspectId = suspectId;
    }
}

/**
 * The session was already closed by an accusation.
 */
export class SessionClosedError extends MysteryError {
    constructor(sessionId: string) {
        super(`Session ${sessionId} is closed; no further questions can be asked`, true);
    }
}
