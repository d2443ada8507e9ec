import { checkCompleteness } from '../completeness';
import { enumerateDates } from '../time';
import type { DateRange, WeatherResult } from '../types';

const RANGE: DateRange = { start: '2024-01-30', end: '2024-02-02' };

function resultFor(dates: string[]): WeatherResult {
    return { records: dates.map((date) => ({ date, tempMaxC: 8 })) };
}

describe('checkCompleteness', () => {
    it('is complete when every day of the range has a record', () => {
        const report = checkCompleteness(resultFor(enumerateDates(RANGE)), RANGE);
        expect(report).toEqual({ missingDates: [], isComplete: true });
    });

    it('reports every day as missing for an empty result', () => {
        const report = checkCompleteness({ records: [] }, RANGE);
        expect(report).toEqual({
            missingDates: ['2024-01-30', '2024-01-31', '2024-02-01', '2024-02-02'],
            isComplete: false
        });
    });

    it('finds a single interior gap', () => {
        const report = checkCompleteness(resultFor(['2024-01-30', '2024-01-31', '2024-02-02']), RANGE);
        expect(report.missingDates).toEqual(['2024-02-01']);
        expect(report.isComplete).toBe(false);
    });

    it('lists gaps in calendar order whatever the record order', () => {
        const report = checkCompleteness(resultFor(['2024-02-01', '2024-01-31']), RANGE);
        expect(report.missingDates).toEqual(['2024-01-30', '2024-02-02']);
    });

    it('ignores records outside the range', () => {
        const report = checkCompleteness(resultFor(['2024-01-29', '2024-01-30', '2024-01-31', '2024-02-01', '2024-02-02', '2024-02-03']), RANGE);
        expect(report.isComplete).toBe(true);
    });

    it('handles a single-day range', () => {
        const day = { start: '2024-01-01', end: '2024-01-01' };
        expect(checkCompleteness(resultFor(['2024-01-01']), day).isComplete).toBe(true);
        expect(checkCompleteness({ records: [] }, day).missingDates).toEqual(['2024-01-01']);
    });
});
