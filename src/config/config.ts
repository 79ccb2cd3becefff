// src/config/config.ts

import { ENV } from './env';

export type CompensationMode = 'concurrent' | 'sequential';

interface SagaConfig {
    WORKER_POOL_SIZE: number;
    COMPENSATION_MODE: CompensationMode;
    DEFAULT_NAME: string;
}

interface ArchiveConfig {
    MAX_REPORTS: number;
    TTL_MS: number;
}

interface ValidationConfig {
    MAX_STEP_NAME_LENGTH: number;
    MAX_STEPS: number;
}

interface Config {
    SAGA: SagaConfig;
    ARCHIVE: ArchiveConfig;
    VALIDATION: ValidationConfig;
}

/**
 * Centralized configuration for saga-orchestrator.
 */
export const CONFIG: Config = {
    SAGA: {
        WORKER_POOL_SIZE: ENV.SAGA_WORKER_POOL_SIZE,
        COMPENSATION_MODE: ENV.SAGA_COMPENSATION_MODE,
        DEFAULT_NAME: 'saga',
    },

    ARCHIVE: {
        MAX_REPORTS: ENV.SAGA_ARCHIVE_MAX,
        TTL_MS: ENV.SAGA_ARCHIVE_TTL_MS,
    },

    VALIDATION: {
        MAX_STEP_NAME_LENGTH: 200,
        MAX_STEPS: 1000,
    },
};
