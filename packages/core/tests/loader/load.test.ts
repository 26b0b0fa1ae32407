import { describe, it, expect } from 'vitest';
import { loadRecords, resolveColumns } from '../../src/loader/load.js';
import { tabularSourceFromRows } from '../../src/source/tabular.js';
import { SchemaError, SourceUnavailableError } from '../../src/types/index.js';
import type { TabularSource } from '../../src/records/types.js';

describe('loadRecords', () => {
    it('returns the rows unchanged with a raw status', () => {
        const rows = [
            { Date: '2024-01-05', Description: 'Payroll', Amount: '$2,500.00', Memo: 'x' },
            { Date: 'bad-date', Description: 42, Amount: 'abc', Memo: '' },
        ];
        const set = loadRecords(tabularSourceFromRows(rows, 'rows'));

        expect(set.status).toBe('raw');
        expect(set.source).toBe('rows');
        expect(set.records).toBe(rows);
        expect(set.columns).toEqual(['Date', 'Description', 'Amount', 'Memo']);
        expect(set.columnMap).toEqual({ date: 'Date', description: 'Description', amount: 'Amount' });
    });

    it('checks the schema even when there are no rows', () => {
        const source = tabularSourceFromRows([], 'empty', ['Date', 'Description']);
        expect(() => loadRecords(source)).toThrow(SchemaError);
        expect(() => loadRecords(source)).toThrow('Missing required columns: amount. Found: Date, Description');
    });

    it('accepts a header with no rows', () => {
        const source = tabularSourceFromRows([], 'empty', ['date', 'description', 'amount']);
        expect(loadRecords(source).records).toEqual([]);
    });

    it('wraps read failures in SourceUnavailableError', () => {
        const cause = new Error('EACCES: permission denied');
        const source: TabularSource = {
            name: 'locked.csv',
            read: () => {
                throw cause;
            },
        };

        let caught: unknown;
        try {
            loadRecords(source);
        } catch (err) {
            caught = err;
        }
        expect(caught).toBeInstanceOf(SourceUnavailableError);
        expect(caught).toMatchObject({
            message: 'Cannot read locked.csv: EACCES: permission denied',
            source: 'locked.csv',
            cause,
        });
    });
});

describe('resolveColumns', () => {
    it('matches headers case-insensitively after trimming', () => {
        expect(resolveColumns([' DATE ', 'description', 'Amount'])).toEqual({
            date: ' DATE ',
            description: 'description',
            amount: 'Amount',
        });
    });

    it('strips a BOM from the first header', () => {
        expect(resolveColumns(['\uFEFFDate', 'Description', 'Amount']).date).toBe('\uFEFFDate');
    });

    it('uses the first of duplicate headers', () => {
        expect(resolveColumns(['Amount', 'Date', 'Description', 'amount']).amount).toBe('Amount');
    });

    it('lists every missing column', () => {
        try {
            resolveColumns(['Posted', 'Memo']);
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(SchemaError);
            expect(err).toMatchObject({ missingColumns: ['date', 'description', 'amount'] });
        }
    });
});
