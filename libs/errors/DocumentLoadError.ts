/**
 * DocumentLoadError
 * Hard failure raised while constructing a RealDocument.
 * Converted to a CONSTRUCTION_FAILED fault at RealDocument.open().
 */

export class DocumentLoadError extends Error {
    readonly code = 'DOCUMENT_LOAD_FAILED';
    readonly identifier: string;
    public override cause?: unknown;

    constructor(identifier: string, message: string, options?: { cause?: unknown }) {
        super(message);
        this.name = 'DocumentLoadError';
        this.identifier = identifier;
        this.cause = options?.cause;
        Object.setPrototypeOf(this, DocumentLoadError.prototype);
    }
}
