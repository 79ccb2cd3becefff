export * from './ErrorContext';
export * from './SagaError';
export * from './errors';
export * from './errorFactory';
