/**
 * Turns raw calendar boundaries into UTC Dates.
 *
 * Nothing here throws: a value that cannot be read comes back as null and the
 * caller decides whether that drops one record or the whole query.
 */

import { addHours, isValid, parseISO } from 'date-fns';
import { toDate } from 'date-fns-tz';
import type { CalendarEvent, EventDateTime, Interval, SearchWindow } from './types.js';

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

export function isDateOnly(value: string): boolean {
	return DATE_ONLY.test(value.trim());
}

/**
 * Parses an ISO-8601 timestamp or YYYY-MM-DD date into a UTC Date.
 *
 * Values carrying an offset are converted to UTC. Values without one,
 * including whole-day dates, are read as UTC wall-clock time.
 *
 * @returns The instant, or null when the value is not valid ISO-8601
 *
 * @example
 * parseInstant('2024-01-15T09:00:00-05:00'); // 2024-01-15T14:00:00.000Z
 * parseInstant('2024-01-15');                // 2024-01-15T00:00:00.000Z
 * parseInstant('next tuesday');              // null
 */
export function parseInstant(value: string): Date | null {
	const trimmed = value.trim();
	if (trimmed === '') {
		return null;
	}

	// parseISO decides what is valid ISO-8601, but it reads a value without an
	// offset on the host clock. toDate reads the same value in UTC instead.
	if (!isValid(parseISO(trimmed))) {
		return null;
	}

	const instant = toDate(trimmed, { timeZone: 'UTC' });
	return isValid(instant) ? instant : null;
}

/**
 * Returns the raw string of an event boundary. A timestamp wins over a
 * whole-day date when both are present.
 */
export function getEventTime(boundary: EventDateTime | null | undefined): string {
	if (!boundary) {
		return '';
	}
	return boundary.dateTime || boundary.date || '';
}

/**
 * Extracts the busy interval of a calendar event.
 *
 * A whole-day end date is the exclusive midnight it names, so
 * `2024-01-15 → 2024-01-16` covers the 15th. An end date that is not after the
 * start (a single day written inclusively) rolls forward one day.
 *
 * @returns The interval, or null when a boundary is missing or unparseable
 */
export function normalizeBusyInterval(event: CalendarEvent): Interval | null {
	const startValue = getEventTime(event.start);
	const endValue = getEventTime(event.end);

	if (!startValue || !endValue) {
		return null;
	}

	const start = parseInstant(startValue);
	const end = parseInstant(endValue);

	if (!start || !end) {
		return null;
	}

	if (isDateOnly(endValue) && end <= start) {
		// UTC days are always 24 hours
		return { start, end: addHours(end, 24) };
	}

	return { start, end };
}

/**
 * Normalizes every event, silently dropping the ones that cannot be read.
 */
export function normalizeBusyIntervals(events: CalendarEvent[]): Interval[] {
	const intervals: Interval[] = [];

	for (const event of events) {
		const interval = normalizeBusyInterval(event);
		if (interval) {
			intervals.push(interval);
		}
	}

	return intervals;
}

/**
 * Parses the search window.
 *
 * @returns null when either boundary is unparseable or the window is empty
 */
export function normalizeRange(range: SearchWindow): Interval | null {
	const start = parseInstant(range.start);
	const end = parseInstant(range.end);

	if (!start || !end || start >= end) {
		return null;
	}

	return { start, end };
}
