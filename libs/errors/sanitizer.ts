/**
 * Normalizes anything thrown into a single-line message suitable for a
 * fault or a log field. Stack traces stay out of fault messages.
 */
export function errorMessageOf(err: unknown): string {
    if (err instanceof Error) {
        return err.message;
    }

    if (typeof err === 'string') {
        return err;
    }

    if (err && typeof err === 'object' && 'message' in err) {
        const { message } = err;
        if (typeof message === 'string') {
            return message;
        }
    }

    return String(err);
}
