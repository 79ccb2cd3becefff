// src/index.ts

export * from './core/saga';
export * from './core/errors';
export { WorkerPool } from './core/concurrency/WorkerPool';
export type { Task } from './core/concurrency/WorkerPool';
export { Logger, LogLevel } from './core/logging/Logger';
export { validateStepName } from './core/validation/stepValidator';
export { SagaArchive } from './infrastructure/archive/SagaArchive';
export { CONFIG } from './config/config';
export type { CompensationMode } from './config/config';
