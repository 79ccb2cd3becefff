// tests/unit/validation.test.ts

import { assertUniqueStepName, validatePoolSize, validateStepName } from '../../src/core/validation/stepValidator';
import { ValidationError } from '../../src/core/errors';

describe('Step Validation', () => {
    describe('validateStepName', () => {
        it('should allow readable step names', () => {
            expect(() => validateStepName('Process Payment')).not.toThrow();
            expect(() => validateStepName('reserve-inventory_v2')).not.toThrow();
        });

        it('should block empty and non-string names', () => {
            expect(() => validateStepName('')).toThrow(ValidationError);
            expect(() => validateStepName(null)).toThrow(/cannot be empty/);
            expect(() => validateStepName(42)).toThrow(/cannot be empty/);
        });

        it('should block control and invisible characters', () => {
            const toxicNames = [
                'step\x00', // null byte
                'step\n2',
                'step\u202e', // RLO
                'step\u200b', // zero-width space
                'step\uffff',
            ];
            toxicNames.forEach(name => {
                expect(() => validateStepName(name)).toThrow(/control or invisible/);
            });
        });

        it('should block untrimmed names', () => {
            expect(() => validateStepName(' Ship')).toThrow(/leading or trailing whitespace/);
            expect(() => validateStepName('Ship ')).toThrow(/leading or trailing whitespace/);
        });

        it('should block names exceeding max length', () => {
            expect(() => validateStepName('a'.repeat(200))).not.toThrow();
            expect(() => validateStepName('a'.repeat(201))).toThrow(/exceeds maximum length of 200/);
        });
    });

    describe('assertUniqueStepName', () => {
        it('should reject a name already in the saga', () => {
            expect(() => assertUniqueStepName('Pay', ['Order', 'Pay'])).toThrow("Duplicate step name: 'Pay'");
            expect(() => assertUniqueStepName('Ship', ['Order', 'Pay'])).not.toThrow();
        });
    });

    describe('validatePoolSize', () => {
        it('should accept positive integers only', () => {
            expect(() => validatePoolSize(1)).not.toThrow();
            expect(() => validatePoolSize(0)).toThrow(/positive integer, got 0/);
            expect(() => validatePoolSize(2.5)).toThrow(ValidationError);
        });
    });
});
