// src/core/validation/stepValidator.ts

import { CONFIG } from '../../config/config';
import { ErrorFactory } from '../errors';

/**
 * Step names are human-readable ("Payment Processing") and show up in outcomes and logs,
 * so they must be printable, trimmed and unique within one saga.
 */
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS_REGEX = /[\x00-\x1f\x7f]/;
const INVISIBLE_CHARS = ['\u202e', '\u200f', '\u200b', '\ufeff', '\uffff'];

export function validateStepName(stepName: unknown): asserts stepName is string {
    if (typeof stepName !== 'string' || stepName.length === 0) {
        throw ErrorFactory.validation('Step name cannot be empty', {
            operation: 'addStep',
            suggestion: 'Give every step a readable name such as "Reserve Inventory".',
        });
    }

    if (CONTROL_CHARS_REGEX.test(stepName) || INVISIBLE_CHARS.some(ch => stepName.includes(ch))) {
        throw ErrorFactory.validation(
            'Invalid step name: control or invisible Unicode characters detected.',
            { operation: 'addStep' }
        );
    }

    if (stepName.trim() !== stepName) {
        throw ErrorFactory.validation(
            `Invalid step name: '${stepName.substring(0, 50)}' has leading or trailing whitespace.`,
            { operation: 'addStep' }
        );
    }

    if (stepName.length > CONFIG.VALIDATION.MAX_STEP_NAME_LENGTH) {
        throw ErrorFactory.validation(
            `Step name exceeds maximum length of ${CONFIG.VALIDATION.MAX_STEP_NAME_LENGTH}`,
            { operation: 'addStep' }
        );
    }
}

/**
 * Rejects a name that is already used by a step of the same saga.
 */
export function assertUniqueStepName(stepName: string, existing: readonly string[]): void {
    if (existing.includes(stepName)) {
        throw ErrorFactory.validation(`Duplicate step name: '${stepName}'`, {
            operation: 'addStep',
            suggestion: 'Failed compensations are reported by name; use a distinct name per step.',
        });
    }
}

export function validatePoolSize(size: number): void {
    if (!Number.isInteger(size) || size < 1) {
        throw ErrorFactory.validation(`Worker pool size must be a positive integer, got ${size}`, {
            operation: 'createWorkerPool',
        });
    }
}
