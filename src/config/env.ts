// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';

// Load environment variables from project root, not process.cwd()
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

/**
 * Environment Variable Schema
 * Every saga default can be overridden from the environment; values are coerced and range-checked here.
 */
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Logging
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),

    // Concurrent coordinator defaults
    SAGA_WORKER_POOL_SIZE: z.coerce.number().int().min(1).max(256).default(4),
    SAGA_COMPENSATION_MODE: z.enum(['concurrent', 'sequential']).default('concurrent'),

    // Run archive
    SAGA_ARCHIVE_MAX: z.coerce.number().int().min(1).default(500),
    SAGA_ARCHIVE_TTL_MS: z.coerce.number().int().min(0).default(60 * 60 * 1000),
});

export type Env = z.infer<typeof envSchema>;

export const ENV: Env = envSchema.parse(process.env);
