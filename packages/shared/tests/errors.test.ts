import { describe, it, expect } from 'vitest';
import {
    LedgerLensError,
    SourceUnavailableError,
    SchemaError,
    StateError,
    ConfigError,
    isLedgerLensError,
} from '../src/errors.js';

describe('error taxonomy', () => {
    it('SchemaError lists missing and found columns', () => {
        const err = new SchemaError(['amount'], ['Date', 'Description']);
        expect(err.message).toBe('Missing required columns: amount. Found: Date, Description');
        expect(err.code).toBe('SCHEMA');
        expect(err.name).toBe('SchemaError');
        expect(err.missingColumns).toEqual(['amount']);
    });

    it('SchemaError reports an empty header', () => {
        const err = new SchemaError(['date', 'description', 'amount'], []);
        expect(err.message).toBe('Missing required columns: date, description, amount. Found: (none)');
    });

    it('SourceUnavailableError keeps the cause', () => {
        const cause = new Error('ENOENT');
        const err = new SourceUnavailableError('jan.csv', 'Cannot read jan.csv', { cause });
        expect(err.cause).toBe(cause);
        expect(err.source).toBe('jan.csv');
        expect(err.code).toBe('SOURCE_UNAVAILABLE');
    });

    it('all subclasses are LedgerLensErrors', () => {
        const errors = [
            new SourceUnavailableError('x', 'x'),
            new SchemaError([], []),
            new StateError('x'),
            new ConfigError('x'),
        ];
        for (const err of errors) {
            expect(err).toBeInstanceOf(LedgerLensError);
            expect(isLedgerLensError(err)).toBe(true);
        }
        expect(isLedgerLensError(new Error('plain'))).toBe(false);
    });
});
