/**
 * Day arithmetic: reading day numbers from table cells, unit conversion and
 * calendar boundaries.
 */

import {
	addDays,
	addMonths,
	addQuarters,
	addWeeks,
	addYears,
	isValid,
	startOfDay,
	startOfMonth,
	startOfQuarter,
	startOfWeek,
	startOfYear,
} from 'date-fns';
import { fromZonedTime, toZonedTime } from 'date-fns-tz';
import { DataError } from './errors.js';
import type { DayNumber } from './types.js';

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** Calendar days are resolved in UTC. */
const CALENDAR_ZONE = 'UTC';

// ============================================================================
// Units
// ============================================================================

export const TIME_UNITS = ['days', 'weeks', 'months', 'quarters', 'years'] as const;

/**
 * Unit for durations, cutpoints and calendar expansion.
 */
export type TimeUnit = (typeof TIME_UNITS)[number];

/**
 * Length of each unit in days. Months and quarters are averaged over the
 * Julian year.
 */
export const UNIT_DAYS: Readonly<Record<TimeUnit, number>> = {
	days: 1,
	weeks: 7,
	months: 365.25 / 12,
	quarters: 365.25 / 4,
	years: 365.25,
};

export function isTimeUnit(value: string): value is TimeUnit {
	return TIME_UNITS.some((unit) => unit === value);
}

/**
 * Convert a number of days to the given unit.
 */
export function daysToUnit(days: number, unit: TimeUnit): number {
	return days / UNIT_DAYS[unit];
}

// ============================================================================
// Cell Conversion
// ============================================================================

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Read a day number from a table cell. Accepts integer day numbers, `Date`
 * objects (their UTC calendar day) and `YYYY-MM-DD` strings.
 *
 * @param value - The raw cell
 * @param field - Column name, used in the error message
 */
export function toDayNumber(value: unknown, field: string): DayNumber {
	if (typeof value === 'number') {
		if (Number.isInteger(value)) {
			return value;
		}
		throw new DataError(`Column "${field}" holds a non-integer day number: ${value}`, { field, value });
	}

	if (value instanceof Date) {
		if (!isValid(value)) {
			throw new DataError(`Column "${field}" holds an invalid date`, { field });
		}
		return Math.floor(value.getTime() / MS_PER_DAY);
	}

	if (typeof value === 'string') {
		const match = ISO_DATE.exec(value);
		if (match) {
			const [, year, month, day] = match;
			const time = Date.UTC(Number(year), Number(month) - 1, Number(day));
			const parsed = new Date(time);
			if (isValid(parsed) && parsed.getUTCDate() === Number(day)) {
				return time / MS_PER_DAY;
			}
		}
	}

	throw new DataError(`Column "${field}" holds an unreadable date: ${String(value)}`, { field, value });
}

/**
 * Read an optional day number: `null`, `undefined` and `NaN` mean missing.
 */
export function toOptionalDayNumber(value: unknown, field: string): DayNumber | null {
	if (value === null || value === undefined || (typeof value === 'number' && Number.isNaN(value))) {
		return null;
	}
	return toDayNumber(value, field);
}

/**
 * The UTC midnight of a day number.
 */
export function fromDayNumber(day: DayNumber): Date {
	return new Date(day * MS_PER_DAY);
}

// ============================================================================
// Calendar Boundaries
// ============================================================================

function getStartOfUnit(date: Date, unit: TimeUnit): Date {
	// Work on the UTC wall clock, then convert back to an instant
	const workingDate = toZonedTime(date, CALENDAR_ZONE);

	let result: Date;
	switch (unit) {
		case 'days':
			result = startOfDay(workingDate);
			break;
		case 'weeks':
			result = startOfWeek(workingDate, { weekStartsOn: 1 }); // Monday start
			break;
		case 'months':
			result = startOfMonth(workingDate);
			break;
		case 'quarters':
			result = startOfQuarter(workingDate);
			break;
		case 'years':
			result = startOfYear(workingDate);
			break;
	}

	return result;
}

function addUnit(date: Date, unit: TimeUnit, amount: number): Date {
	switch (unit) {
		case 'days':
			return addDays(date, amount);
		case 'weeks':
			return addWeeks(date, amount);
		case 'months':
			return addMonths(date, amount);
		case 'quarters':
			return addQuarters(date, amount);
		case 'years':
			return addYears(date, amount);
	}
}

/**
 * The first calendar boundary of `unit` strictly after `day`.
 *
 * @example
 * // 2024-01-15 -> 2024-02-01
 * nextCalendarBoundary(19737, 'months'); // 19754
 */
export function nextCalendarBoundary(day: DayNumber, unit: TimeUnit): DayNumber {
	const start = getStartOfUnit(fromDayNumber(day), unit);
	const next = fromZonedTime(addUnit(start, unit, 1), CALENDAR_ZONE);
	return Math.round(next.getTime() / MS_PER_DAY);
}

/**
 * All calendar boundaries of `unit` strictly inside (start, stop).
 */
export function calendarBoundaries(start: DayNumber, stop: DayNumber, unit: TimeUnit): DayNumber[] {
	const boundaries: DayNumber[] = [];
	let boundary = nextCalendarBoundary(start, unit);

	while (boundary < stop) {
		boundaries.push(boundary);
		boundary = nextCalendarBoundary(boundary, unit);
	}

	return boundaries;
}
