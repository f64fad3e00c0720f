import type { Logger } from 'pino';
import { DocumentAuditRecord } from './schema.js';
import { LogSinkUnavailableError } from './LogSinkUnavailableError.js';
import { logger } from '../logging/logger.js';
import { errorMessageOf } from '../errors/sanitizer.js';

/**
 * Destination for committed audit records.
 * Implementations throw LogSinkUnavailableError when they cannot accept one.
 */
export interface AuditSink {
    readonly name: string;
    append(record: DocumentAuditRecord): void;
}

/**
 * Keeps records in process memory, in commit order.
 */
export class InMemoryAuditSink implements AuditSink {
    readonly name = 'in-memory';
    private readonly entries: DocumentAuditRecord[] = [];

    public append(record: DocumentAuditRecord): void {
        this.entries.push(record);
    }

    public records(): readonly DocumentAuditRecord[] {
        return [...this.entries];
    }
}

/**
 * Writes each record as one structured log line.
 */
export class LoggerAuditSink implements AuditSink {
    readonly name = 'logger';

    constructor(private readonly target: Logger = logger.child({ component: 'audit' })) { }

    public append(record: DocumentAuditRecord): void {
        try {
            this.target.info({ audit: record }, 'Document audit record');
        } catch (err: unknown) {
            throw new LogSinkUnavailableError(this.name, `Audit log write failed: ${errorMessageOf(err)}`, { cause: err });
        }
    }
}
