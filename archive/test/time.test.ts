import { describe, it, expect } from 'vitest';
import { addDays, assertDateRange, defaultRange, enumerateDates, parseCalendarDate, todayIn } from '../time';

describe('calendar dates', () => {
    describe('parsing', () => {
        it('parses Open-Meteo date strings', () => {
            expect(parseCalendarDate('2024-05-20')).toBe('2024-05-20');
            expect(parseCalendarDate('2024-05-20T00:00')).toBe('2024-05-20');
            expect(parseCalendarDate(' 2024-05-20 ')).toBe('2024-05-20');
        });

        it('rejects strings that are not real days', () => {
            expect(parseCalendarDate('2024-02-30')).toBeNull();
            expect(parseCalendarDate('2023-02-29')).toBeNull();
            expect(parseCalendarDate('2024-13-01')).toBeNull();
            expect(parseCalendarDate('20240520')).toBeNull();
            expect(parseCalendarDate('not-a-date')).toBeNull();
            expect(parseCalendarDate(null)).toBeNull();
            expect(parseCalendarDate(20240520)).toBeNull();
        });

        it('accepts leap days', () => {
            expect(parseCalendarDate('2024-02-29')).toBe('2024-02-29');
        });
    });

    describe('arithmetic', () => {
        it('adds days across month and year boundaries', () => {
            expect(addDays('2024-02-28', 1)).toBe('2024-02-29');
            expect(addDays('2024-12-31', 1)).toBe('2025-01-01');
            expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
        });

        it('enumerates an inclusive range', () => {
            expect(enumerateDates({ start: '2024-03-30', end: '2024-04-02' })).toEqual([
                '2024-03-30',
                '2024-03-31',
                '2024-04-01',
                '2024-04-02'
            ]);
            expect(enumerateDates({ start: '2024-01-01', end: '2024-01-01' })).toEqual(['2024-01-01']);
        });

        it('is not shifted by a DST change', () => {
            // Europe/Paris springs forward on 2024-03-31.
            expect(enumerateDates({ start: '2024-03-30', end: '2024-04-01' })).toHaveLength(3);
            expect(enumerateDates({ start: '2024-10-26', end: '2024-10-28' })).toHaveLength(3);
        });

        it('builds the default trailing window', () => {
            expect(defaultRange('2024-01-15')).toEqual({ start: '2024-01-01', end: '2024-01-15' });
            expect(defaultRange('2024-01-15', 0)).toEqual({ start: '2024-01-15', end: '2024-01-15' });
        });
    });

    describe('validation', () => {
        it('canonicalizes a valid range', () => {
            expect(assertDateRange({ start: '2024-01-01', end: '2024-01-03T00:00' })).toEqual({
                start: '2024-01-01',
                end: '2024-01-03'
            });
        });

        it('rejects start after end and bad dates', () => {
            expect(() => assertDateRange({ start: '2024-01-04', end: '2024-01-03' })).toThrow(/after end/);
            expect(() => assertDateRange({ start: 'yesterday', end: '2024-01-03' })).toThrow(/Invalid start date/);
            expect(() => assertDateRange({ start: '2024-01-01', end: undefined })).toThrow(/Invalid end date/);
        });
    });

    describe('today', () => {
        it('follows the requested timezone', () => {
            const now = new Date('2024-06-30T22:30:00Z');
            expect(todayIn('UTC', now)).toBe('2024-06-30');
            expect(todayIn('Europe/Paris', now)).toBe('2024-07-01');
            expect(todayIn('America/Toronto', now)).toBe('2024-06-30');
        });

        it('rejects unknown zones', () => {
            expect(() => todayIn('Mars/Olympus_Mons')).toThrow(/Unknown timezone/);
        });
    });
});
