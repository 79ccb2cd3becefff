// src/core/errors/SagaError.ts

import { ErrorContext } from './ErrorContext';

export interface SagaErrorJSON {
    name: string;
    code: string;
    message: string;
    sagaId?: string;
    operation?: string;
    retryable: boolean;
    timestamp: number;
    stack?: string;
}

/**
 * Base class for everything the library throws. The saga id and coordinator
 * operation from the context are carried into every rendering of the error.
 */
export class SagaError extends Error {
    public readonly context: ErrorContext;
    public readonly timestamp: number;

    constructor(message: string, context: ErrorContext = {}) {
        super(message);
        this.name = 'SagaError';
        this.context = context;
        this.timestamp = Date.now();

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }
    }

    public get code(): string {
        return this.context.code ?? 'SAGA_ERROR';
    }

    public get sagaId(): string | undefined {
        return this.context.sagaId;
    }

    /**
     * Flat shape for structured logs; the stack is only included in development.
     */
    public toJSON(): SagaErrorJSON {
        const json: SagaErrorJSON = {
            name: this.name,
            code: this.code,
            message: this.message,
            retryable: this.context.retryable ?? false,
            timestamp: this.timestamp,
        };
        if (this.sagaId !== undefined) json.sagaId = this.sagaId;
        if (this.context.operation !== undefined) json.operation = this.context.operation;
        if (process.env.NODE_ENV === 'development' && this.stack) json.stack = this.stack;
        return json;
    }

    /**
     * e.g. "[PROTOCOL_MISUSE] saga 1f2e… (run): Saga 'checkout' can only be run once\nTip: …"
     */
    public toUserFriendly(): string {
        const where = [
            this.sagaId !== undefined ? `saga ${this.sagaId}` : '',
            this.context.operation !== undefined ? `(${this.context.operation})` : '',
        ].filter(Boolean).join(' ');

        let msg = `[${this.code}] ${where ? `${where}: ` : ''}${this.message}`;
        if (this.context.suggestion) {
            msg += `\nTip: ${this.context.suggestion}`;
        }
        return msg;
    }
}
