import { describe, it, expect } from 'vitest';
import { parsePurchaseDate, parsePurchaseTime } from '../dateUtils';

describe('parsePurchaseDate', () => {
    it('parses calendar dates', () => {
        expect(parsePurchaseDate('2022-01-01')).toEqual({ year: 2022, month: 1, day: 1 });
        expect(parsePurchaseDate('2024-02-29')).toEqual({ year: 2024, month: 2, day: 29 });
    });

    it('rejects dates that do not exist', () => {
        expect(parsePurchaseDate('2023-02-29')).toBeUndefined();
        expect(parsePurchaseDate('2022-02-30')).toBeUndefined();
        expect(parsePurchaseDate('2022-04-31')).toBeUndefined();
        expect(parsePurchaseDate('2022-13-01')).toBeUndefined();
        expect(parsePurchaseDate('2022-00-10')).toBeUndefined();
        expect(parsePurchaseDate('2022-01-00')).toBeUndefined();
    });

    it('rejects other layouts', () => {
        expect(parsePurchaseDate('2022-1-01')).toBeUndefined();
        expect(parsePurchaseDate('01/01/2022')).toBeUndefined();
        expect(parsePurchaseDate('2022-01-01T00:00:00Z')).toBeUndefined();
    });
});

describe('parsePurchaseTime', () => {
    it('returns minutes since midnight', () => {
        expect(parsePurchaseTime('00:00')).toBe(0);
        expect(parsePurchaseTime('13:01')).toBe(781);
        expect(parsePurchaseTime('23:59')).toBe(1439);
    });

    it('rejects times outside the 24-hour clock', () => {
        expect(parsePurchaseTime('24:00')).toBeUndefined();
        expect(parsePurchaseTime('12:60')).toBeUndefined();
        expect(parsePurchaseTime('9:30')).toBeUndefined();
        expect(parsePurchaseTime('09:30:00')).toBeUndefined();
    });
});
