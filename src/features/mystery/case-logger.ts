import fs from 'fs';
import path from 'path';
import { config } from '../../config.js';
import { logger } from '../../utils/logger.js';
import { AccusationResult } from './accusation.js';
import { describeValue } from './topics.js';
import { Finding, Statement } from './types.js';

export type LogType = 'STATUS' | 'STATEMENT' | 'FINDING' | 'ACCUSATION';

/**
 * Append-only text log of one interrogation session
 */
export class CaseLogger {
    private logPath: string;

    constructor(caseId: string, sessionId: string, logDir: string = path.join(config.logging.dir, 'sessions')) {
        const timestamp = new Date().toISOString().replace(/[:.]/g, '-');

        if (!fs.existsSync(logDir)) {
            fs.mkdirSync(logDir, { recursive: true });
        }

        this.logPath = path.join(logDir, `${caseId}_${timestamp}.log`);

        this.log('STATUS', `Logger initialized for case: ${caseId}`, { sessionId });
    }

    get file(): string {
        return this.logPath;
    }

    private log(type: LogType, message: string, data?: unknown) {
        const timestamp = new Date().toISOString();
        const dataStr = data !== undefined ? ` | DATA: ${JSON.stringify(data)}` : '';
        const logEntry = `[${timestamp}] [${type}] ${message}${dataStr}\n`;

        try {
            fs.appendFileSync(this.logPath, logEntry);
        } catch (error) {
            logger.error(`Failed to write to case log ${this.logPath}:`, error);
        }
    }

    public logStatement(statement: Statement) {
        this.log(
            'STATEMENT',
            `#${statement.sequence} ${statement.speaker} on ${statement.topicKey}: ${describeValue(statement.value)}`,
            { status: statement.status }
        );
    }

    public logFinding(finding: Finding) {
        this.log('FINDING', `${finding.kind} (${finding.rule}) on ${finding.topicKey}`, finding.basis);
    }

    public logStatus(message: string, data?: unknown) {
        this.log('STATUS', message, data);
    }

    public logAccusation(result: AccusationResult) {
        this.log('ACCUSATION', result.correct ? 'SOLVED' : 'FAILED', { score: result.score, matches: result.matches });
    }
}
