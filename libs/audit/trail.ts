import crypto from 'crypto';
import { AuditEntry, DocumentAuditRecord, GENESIS_HASH } from './schema.js';
import { AuditSink } from './sinks.js';
import { LogSinkUnavailableError } from './LogSinkUnavailableError.js';
import { logger } from '../logging/logger.js';

/**
 * Hash-Chained Audit Trail
 * Signs each entry against the previous record and hands it to the sink.
 *
 * A sink failure is reported and counted here; it never reaches the caller,
 * so the audited operation's result is unaffected. The chain head only
 * advances once the sink has accepted a record.
 */
export class AuditTrail {
    private lastHash = GENESIS_HASH;
    private nextSequence = 0;
    private failures = 0;

    constructor(private readonly sink: AuditSink) { }

    /**
     * Commit one entry. Returns the signed record, or null when the sink
     * rejected it.
     */
    public commit(entry: AuditEntry): DocumentAuditRecord | null {
        const record = {
            eventId: crypto.randomUUID(),
            sequence: this.nextSequence,
            ...entry
        };

        const prevHash = this.lastHash;
        const hash = crypto.createHash('sha256')
            .update(JSON.stringify(record) + prevHash)
            .digest('hex');

        const signedRecord: DocumentAuditRecord = {
            ...record,
            integrity: { prevHash, hash }
        };

        try {
            this.sink.append(signedRecord);
        } catch (err: unknown) {
            const sinkError = err instanceof LogSinkUnavailableError
                ? err
                : new LogSinkUnavailableError(this.sink.name, undefined, { cause: err });

            this.failures++;
            logger.error({
                code: sinkError.code,
                sink: sinkError.sinkName,
                error: sinkError.message,
                actorId: entry.actorId,
                operation: entry.operation,
                outcome: entry.outcome
            }, 'Audit record dropped: sink unavailable');
            return null;
        }

        this.lastHash = hash;
        this.nextSequence++;
        return signedRecord;
    }

    /** Records the sink refused since this trail was created. */
    public get failedWrites(): number {
        return this.failures;
    }

    public get headHash(): string {
        return this.lastHash;
    }
}
