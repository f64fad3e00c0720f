/**
 * RealDocument
 *
 * The protected resource itself. Construction runs the loader to completion
 * before the instance exists, so a RealDocument is never half-built.
 * Once removed, only describe() and further remove() calls succeed.
 */

import { logger } from '../logging/logger.js';
import { DocumentLoadError } from '../errors/DocumentLoadError.js';
import { FaultOrigin, constructionFailed, notFound } from '../errors/faults.js';
import { errorMessageOf } from '../errors/sanitizer.js';
import { DocumentLoader } from './loader.js';
import {
    OperationResult,
    Resource,
    completed,
    failure,
    formatMetadata,
    success
} from './resource.js';

export class RealDocument implements Resource {
    public readonly identifier: string;
    private content: string | null;

    /**
     * @throws DocumentLoadError if the loader fails
     */
    constructor(identifier: string, loader: DocumentLoader) {
        this.identifier = identifier;
        this.content = RealDocument.loadContent(identifier, loader);
    }

    private static loadContent(identifier: string, loader: DocumentLoader): string {
        try {
            return loader.load(identifier);
        } catch (err: unknown) {
            throw new DocumentLoadError(identifier, errorMessageOf(err), { cause: err });
        }
    }

    /**
     * Non-throwing construction for callers that work in results.
     * `operation` names what triggered the load.
     */
    public static open(
        identifier: string,
        loader: DocumentLoader,
        operation: FaultOrigin
    ): OperationResult<RealDocument> {
        try {
            return success(new RealDocument(identifier, loader));
        } catch (err: unknown) {
            if (!(err instanceof DocumentLoadError)) {
                throw err;
            }

            logger.error({ identifier, operation, error: err.message }, 'Document construction failed');
            return failure(constructionFailed(operation, identifier, err.message));
        }
    }

    public view(): OperationResult<string> {
        if (this.content === null) {
            return failure(notFound('view', this.identifier));
        }

        logger.debug({ identifier: this.identifier }, 'Viewing document');
        return success(this.content);
    }

    public mutate(newContent: string): OperationResult<void> {
        if (this.content === null) {
            return failure(notFound('mutate', this.identifier));
        }

        logger.debug({ identifier: this.identifier }, 'Editing document');
        this.content = newContent;
        return completed();
    }

    public remove(): OperationResult<void> {
        logger.debug({ identifier: this.identifier, alreadyRemoved: this.content === null }, 'Deleting document');
        this.content = null;
        return completed();
    }

    public describe(): OperationResult<string> {
        return success(formatMetadata(this.identifier));
    }

    public isRemoved(): boolean {
        return this.content === null;
    }
}
