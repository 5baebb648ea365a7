/**
 * Working-hours clipping.
 *
 * A policy describes one daily window [startHour:00, endHour:00) read on the
 * wall clock of the policy timezone. A gap is clipped against the window of
 * every day it touches, so a gap that spans several days can come back as
 * several pieces.
 */

import { addHours } from 'date-fns';
import { formatInTimeZone, fromZonedTime, toDate } from 'date-fns-tz';
import { intersectIntervals } from './intervals.js';
import type { Interval, WorkingHoursPolicy } from './types.js';

export const DEFAULT_TIMEZONE = 'UTC';

const DAY_FORMAT = 'yyyy-MM-dd';

function atHour(day: string, hour: number, timezone: string): Date {
	return fromZonedTime(`${day}T${String(hour).padStart(2, '0')}:00:00`, timezone);
}

/**
 * Lists the daily working windows of every day the span touches, in order.
 * Returns an empty list when startHour >= endHour.
 *
 * @example
 * ```typescript
 * workingWindows(
 *   { start: new Date('2024-01-15T20:00:00Z'), end: new Date('2024-01-16T10:00:00Z') },
 *   { enabled: true, startHour: 9, endHour: 17 },
 * );
 * // [
 * //   { start: 2024-01-15T09:00:00Z, end: 2024-01-15T17:00:00Z },
 * //   { start: 2024-01-16T09:00:00Z, end: 2024-01-16T17:00:00Z }
 * // ]
 * ```
 */
export function workingWindows(span: Interval, policy: WorkingHoursPolicy): Interval[] {
	const { startHour, endHour } = policy;
	const timezone = policy.timezone ?? DEFAULT_TIMEZONE;

	if (startHour >= endHour) {
		return [];
	}

	const windows: Interval[] = [];

	// Days of the policy zone are walked as yyyy-MM-dd labels, never through
	// host-local Date fields. Labels compare in date order.
	const lastDay = formatInTimeZone(span.end, timezone, DAY_FORMAT);
	let cursor = toDate(formatInTimeZone(span.start, timezone, DAY_FORMAT), { timeZone: 'UTC' });
	let day = cursor.toISOString().split('T')[0];

	while (day <= lastDay) {
		windows.push({
			start: atHour(day, startHour, timezone),
			end: atHour(day, endHour, timezone),
		});
		cursor = addHours(cursor, 24);
		day = cursor.toISOString().split('T')[0];
	}

	return windows;
}

/**
 * Clips a candidate gap to working hours.
 *
 * With the policy disabled the gap passes through unchanged. Otherwise only the
 * parts of the gap inside a daily working window survive: a start before
 * startHour moves forward to startHour:00, an end at or after endHour moves back
 * to endHour:00, and a gap lying wholly outside the window is discarded.
 *
 * @returns The surviving pieces in chronological order; empty when discarded
 */
export function clipToWorkingHours(gap: Interval, policy: WorkingHoursPolicy): Interval[] {
	if (!policy.enabled) {
		return [{ start: new Date(gap.start.getTime()), end: new Date(gap.end.getTime()) }];
	}

	if (gap.start >= gap.end) {
		return [];
	}

	return intersectIntervals([gap], workingWindows(gap, policy));
}
