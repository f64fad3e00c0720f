import { z } from 'zod';
import { LogLevelSchema } from '../logging/logger.js';
import { validate } from '../validation/zod-middleware.js';

/**
 * Runtime configuration, read from the environment once at startup.
 * Unknown variables are ignored; known ones must be well-formed.
 */
const MediationConfigSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LOG_LEVEL: LogLevelSchema.default('info'),
    // Simulated cost of loading a document from backing storage
    DOCUMENT_LOAD_DELAY_MS: z.coerce.number().int().min(0).max(60_000).default(2_000),
});

export type MediationConfig = z.infer<typeof MediationConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MediationConfig {
    return validate(MediationConfigSchema, env, 'MediationConfig');
}
