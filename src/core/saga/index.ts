export * from './types';
export * from './outcomes';
export * from './defineStep';
export { ExecutionLedger } from './ExecutionLedger';
export type { LedgerEntry } from './ExecutionLedger';
export { BaseSagaCoordinator } from './BaseSagaCoordinator';
export type { SagaCoordinatorOptions } from './BaseSagaCoordinator';
export { SagaCoordinator } from './SagaCoordinator';
export { ConcurrentSagaCoordinator } from './ConcurrentSagaCoordinator';
export type { ConcurrentSagaCoordinatorOptions } from './ConcurrentSagaCoordinator';
