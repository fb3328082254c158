import { describe, it, expect } from 'vitest';
import {
    isNextPeriod,
    periodKey,
    periodsBetween,
    previousPeriod,
    samePeriod,
} from '../src/domain/services/PeriodCalendar';
import { at } from './helpers/fixtures';

describe('PeriodCalendar', () => {
    describe('periodKey', () => {
        it('should use the calendar date for daily habits', () => {
            expect(periodKey('daily', at(2026, 10, 21, 0))).toBe('2026-10-21');
            expect(periodKey('daily', at(2026, 10, 21, 23))).toBe('2026-10-21');
        });

        it('should use the Monday of the ISO week for weekly habits', () => {
            expect(periodKey('weekly', at(2026, 10, 19))).toBe('2026-10-19');
            expect(periodKey('weekly', at(2026, 10, 21))).toBe('2026-10-19');
            expect(periodKey('weekly', at(2026, 10, 25, 23))).toBe('2026-10-19');
            expect(periodKey('weekly', at(2026, 10, 26, 0))).toBe('2026-10-26');
        });

        it('should anchor weeks that span a year boundary to their Monday', () => {
            expect(periodKey('weekly', at(2026, 1, 1))).toBe('2025-12-29');
        });
    });

    describe('samePeriod', () => {
        it('should compare daily timestamps by calendar day', () => {
            expect(samePeriod('daily', at(2026, 10, 21, 6), at(2026, 10, 21, 22))).toBe(true);
            expect(samePeriod('daily', at(2026, 10, 21, 23), at(2026, 10, 22, 0))).toBe(false);
        });

        it('should treat Monday and Sunday of one week as the same weekly period', () => {
            expect(samePeriod('weekly', at(2026, 10, 19), at(2026, 10, 25))).toBe(true);
            expect(samePeriod('weekly', at(2026, 10, 25), at(2026, 10, 26))).toBe(false);
        });
    });

    describe('isNextPeriod', () => {
        it('should accept exactly one day apart for daily keys', () => {
            expect(isNextPeriod('daily', '2026-10-19', '2026-10-20')).toBe(true);
            expect(isNextPeriod('daily', '2026-10-19', '2026-10-21')).toBe(false);
            expect(isNextPeriod('daily', '2026-10-20', '2026-10-19')).toBe(false);
        });

        it('should cross month and leap-day boundaries', () => {
            expect(isNextPeriod('daily', '2024-02-28', '2024-02-29')).toBe(true);
            expect(isNextPeriod('daily', '2024-02-29', '2024-03-01')).toBe(true);
            expect(isNextPeriod('daily', '2026-12-31', '2027-01-01')).toBe(true);
        });

        it('should accept exactly seven days apart for weekly keys', () => {
            expect(isNextPeriod('weekly', '2026-10-19', '2026-10-26')).toBe(true);
            expect(isNextPeriod('weekly', '2026-10-19', '2026-11-02')).toBe(false);
            expect(isNextPeriod('weekly', '2025-12-29', '2026-01-05')).toBe(true);
        });
    });

    describe('previousPeriod', () => {
        it('should step back one day or one week', () => {
            expect(previousPeriod('daily', '2026-03-01')).toBe('2026-02-28');
            expect(previousPeriod('weekly', '2026-03-02')).toBe('2026-02-23');
        });
    });

    describe('periodsBetween', () => {
        it('should count calendar days for daily habits regardless of time of day', () => {
            expect(periodsBetween('daily', at(2026, 10, 1, 23), at(2026, 10, 19, 1))).toBe(18);
            expect(periodsBetween('daily', at(2026, 10, 19, 8), at(2026, 10, 19, 20))).toBe(0);
        });

        it('should count completed seven-day spans for weekly habits', () => {
            expect(periodsBetween('weekly', at(2026, 10, 1), at(2026, 10, 19))).toBe(2);
            expect(periodsBetween('weekly', at(2026, 10, 1), at(2026, 10, 7))).toBe(0);
            expect(periodsBetween('weekly', at(2026, 10, 1), at(2026, 10, 8))).toBe(1);
        });

        it('should go negative when the end precedes the start', () => {
            expect(periodsBetween('daily', at(2026, 10, 19), at(2026, 10, 17))).toBe(-2);
            expect(periodsBetween('weekly', at(2026, 10, 19), at(2026, 10, 17))).toBe(-1);
        });
    });
});
