// src/core/errors/ErrorContext.ts

/**
 * Metadata provided with an error to help with debugging and user guidance.
 */
export interface ErrorContext {
    code?: string;           // Machine-readable error code (e.g., 'PROTOCOL_MISUSE')
    operation?: string;      // The coordinator operation that failed
    suggestion?: string;     // Helpful tip for the caller
    component?: string;      // The layer where the error occurred
    retryable?: boolean;     // Whether the operation can be retried
    sagaId?: string;         // Saga run the error belongs to, when known
    details?: unknown;       // Original error or additional technical context
}
