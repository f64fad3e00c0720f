/**
 * LogSinkUnavailableError
 * Raised by an audit sink that cannot accept a record.
 * Never surfaces as the result of a document operation.
 */

export class LogSinkUnavailableError extends Error {
    readonly code = 'LOG_SINK_UNAVAILABLE';
    readonly sinkName: string;
    public override cause?: unknown;

    constructor(sinkName: string, message?: string, options?: { cause?: unknown }) {
        super(message || `Audit sink ${sinkName} is unavailable`);
        this.name = 'LogSinkUnavailableError';
        this.sinkName = sinkName;
        this.cause = options?.cause;
        Object.setPrototypeOf(this, LogSinkUnavailableError.prototype);
    }
}
