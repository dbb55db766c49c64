import dotenv from 'dotenv';
dotenv.config();

function readNumber(key: string, fallback: number): number {
    const raw = process.env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
        throw new Error(`Invalid configuration: ${key} must be a number, got '${raw}'`);
    }
    return value;
}

function readBoolean(key: string, fallback: boolean): boolean {
    const raw = process.env[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    return raw !== 'false' && raw !== '0';
}

export const config = {
    env: process.env.NODE_ENV || 'development',
    logging: {
        level: process.env.LOG_LEVEL || 'info',
        dir: process.env.LOG_DIR || './logs',
        sessionLogs: readBoolean('SESSION_LOGS', process.env.NODE_ENV !== 'test'),
        silent: process.env.NODE_ENV === 'test',
    },
    cases: {
        dir: process.env.CASES_DIR || './data/cases',
    },
    session: {
        seed: readNumber('SESSION_SEED', 1887),
    },
    suspicion: {
        contradiction: readNumber('SUSPICION_CONTRADICTION', 0.15),
        evasion: readNumber('SUSPICION_EVASION', 0.05),
        corroboration: readNumber('SUSPICION_CORROBORATION', 0.03),
        min: 0,
        max: 1,
    },
    policy: {
        minEvasive: readNumber('POLICY_MIN_EVASIVE', 0.05),
        // Contradictions needed for full pressure
        pressureCap: readNumber('POLICY_PRESSURE_CAP', 5),
    },
};

const unitKeys: [string, number][] = [
    ['SUSPICION_CONTRADICTION', config.suspicion.contradiction],
    ['SUSPICION_EVASION', config.suspicion.evasion],
    ['SUSPICION_CORROBORATION', config.suspicion.corroboration],
];
for (const [key, value] of unitKeys) {
    if (value < 0 || value > 1) {
        throw new Error(`Invalid configuration: ${key} must be within [0, 1], got ${value}`);
    }
}
if (config.policy.minEvasive <= 0 || config.policy.minEvasive >= 1) {
    throw new Error(`Invalid configuration: POLICY_MIN_EVASIVE must be within (0, 1), got ${config.policy.minEvasive}`);
}
if (config.policy.pressureCap < 1) {
    throw new Error(`Invalid configuration: POLICY_PRESSURE_CAP must be at least 1, got ${config.policy.pressureCap}`);
}
