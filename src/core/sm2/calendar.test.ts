import { describe, it, expect } from 'vitest';
import {
  addDays,
  calendarDate,
  daysBetween,
  fromEpochDay,
  isCalendarDate,
  isoWeekday,
  nextMonday,
  toEpochDay,
  today,
} from './calendar';

describe('calendar', () => {
  it('validates ISO calendar dates', () => {
    expect(isCalendarDate('2024-02-29')).toBe(true);
    expect(isCalendarDate('2023-02-29')).toBe(false);
    expect(isCalendarDate('2024-13-01')).toBe(false);
    expect(isCalendarDate('2024-1-01')).toBe(false);
    expect(isCalendarDate('01/02/2024')).toBe(false);
  });

  it('converts between dates and day numbers', () => {
    expect(toEpochDay('1970-01-01')).toBe(0);
    expect(toEpochDay('1970-01-11')).toBe(10);
    expect(fromEpochDay(19723)).toBe('2024-01-01');
    expect(() => toEpochDay('2024-02-30')).toThrow(RangeError);
  });

  it('adds and subtracts whole days', () => {
    expect(addDays('2024-01-31', 1)).toBe('2024-02-01');
    expect(addDays('2024-03-01', -1)).toBe('2024-02-29');
    expect(daysBetween('2024-01-01', '2024-03-01')).toBe(60);
    expect(daysBetween('2024-03-01', '2024-01-01')).toBe(-60);
  });

  it('builds dates from parts', () => {
    expect(calendarDate(2024, 3, 5)).toBe('2024-03-05');
    expect(() => calendarDate(2024, 2, 30)).toThrow(RangeError);
  });

  it('reads the local date of an instant', () => {
    expect(today(new Date(2024, 5, 9, 23, 59))).toBe('2024-06-09');
  });

  it('finds ISO weekdays and the next Monday', () => {
    expect(isoWeekday('2024-01-01')).toBe(1);
    expect(isoWeekday('2024-01-07')).toBe(7);
    expect(nextMonday('2024-01-03')).toBe('2024-01-08');
    expect(nextMonday('2024-01-07')).toBe('2024-01-08');
    expect(nextMonday('2024-01-08')).toBe('2024-01-15');
  });
});
