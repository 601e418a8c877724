import { z } from 'zod';

/**
 * Validation schema for the server environment
 */
const EnvSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default('127.0.0.1'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    /** Requests allowed per client within the rate limit window */
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    RATE_LIMIT_WINDOW: z.string().default('1 minute'),
});

export type AppConfig = z.infer<typeof EnvSchema>;

/**
 * Read server settings from environment variables
 *
 * @param env - Variables to read (default: process.env)
 * @throws {ZodError} If a variable is present but invalid
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => EnvSchema.parse(env);
