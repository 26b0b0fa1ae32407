import { describe, it, expect } from 'vitest';
import { summarizeByMonth } from '../../src/aggregator/by-month.js';
import type { Transaction } from '../../src/types/index.js';

function txn(date: string, amount: string): Transaction {
    return { date, description: '', amount, extras: {} };
}

describe('summarizeByMonth', () => {
    it('groups by calendar month in chronological order', () => {
        const rows = summarizeByMonth({
            status: 'cleaned',
            records: [
                txn('2024-02-03', '-20'),
                txn('2024-01-05', '2500'),
                txn('2024-01-12', '-45'),
                txn('2023-12-30', '-5.5'),
            ],
        });
        expect(rows).toEqual([
            { month: '2023-12', income: '0.00', expenses: '-5.50', net: '-5.50', count: 1 },
            { month: '2024-01', income: '2500.00', expenses: '-45.00', net: '2455.00', count: 2 },
            { month: '2024-02', income: '0.00', expenses: '-20.00', net: '-20.00', count: 1 },
        ]);
    });

    it('keeps every digit of large monthly sums', () => {
        const rows = summarizeByMonth({
            status: 'cleaned',
            records: [txn('2024-03-01', '1234567890123456789.99'), txn('2024-03-02', '0.02')],
        });
        expect(rows[0].income).toBe('1234567890123456790.01');
    });

    it('returns an empty list for an empty set', () => {
        expect(summarizeByMonth({ status: 'cleaned', records: [] })).toEqual([]);
    });
});
