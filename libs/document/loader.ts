/**
 * Document Loaders
 *
 * A loader produces the initial content of a RealDocument. Loading is
 * synchronous and may block for a long time.
 */

import { logger } from '../logging/logger.js';

export interface DocumentLoader {
    /**
     * Returns the stored content for `identifier`.
     * Throws when the backing store cannot produce it.
     */
    load(identifier: string): string;
}

export interface SimulatedLoaderOptions {
    /** Blocking delay per load, in milliseconds. 0 disables the delay. */
    readonly delayMs: number;
}

/**
 * Stands in for disk access: blocks for a fixed delay, then returns
 * `Content of <identifier>`. Counts every load so callers can observe the
 * cost being paid.
 */
export class SimulatedDocumentLoader implements DocumentLoader {
    private loads = 0;

    constructor(private readonly options: SimulatedLoaderOptions) {
        if (!Number.isInteger(options.delayMs) || options.delayMs < 0) {
            throw new Error(`Load delay must be a non-negative integer, got ${options.delayMs}`);
        }
    }

    public load(identifier: string): string {
        logger.info({ identifier, delayMs: this.options.delayMs }, 'Loading document from disk');

        sleepSync(this.options.delayMs);
        this.loads++;

        logger.info({ identifier }, 'Document loaded');
        return `Content of ${identifier}`;
    }

    public get loadCount(): number {
        return this.loads;
    }
}

/**
 * Blocks the current thread. Loading happens inside a synchronous call
 * stack, so the delay cannot be awaited.
 */
export function sleepSync(ms: number): void {
    if (ms <= 0) return;
    Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}
