import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';

/**
 * Validation Gate
 * Parses untrusted input (environment, permission tables read from disk)
 * and throws with every issue found. Nothing partially valid is returned.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        // Only paths and messages are logged; the input may carry document bodies.
        logger.warn({
            context,
            errors: errorDetails
        }, "Input validation failure");

        throw new Error(`Validation Violation in ${context}: ${JSON.stringify(errorDetails)}`);
    }

    return result.data;
}

/**
 * Factory for creating reusable validators bound to one schema.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
