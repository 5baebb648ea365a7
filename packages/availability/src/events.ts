/**
 * Helpers for reading and describing raw calendar events.
 */

import { addHours, differenceInMinutes } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { isKnownTimezone } from './config.js';
import { formatInstant } from './gaps.js';
import { getEventTime, isDateOnly, parseInstant } from './normalize.js';
import type { CalendarEvent, EventAttendee, EventDateTime, ScheduleMetrics, SearchWindow } from './types.js';

const MAX_DESCRIPTION_LENGTH = 2000;

/**
 * True when the event starts on a whole-day date rather than a timestamp.
 */
export function isAllDayEvent(event: CalendarEvent): boolean {
	return Boolean(event.start?.date) && !event.start?.dateTime;
}

/**
 * Whole minutes between two event boundaries, truncated.
 *
 * @returns null when a boundary is missing or unparseable, or when an
 * all-day event ends before it starts
 */
export function getEventDurationMinutes(
	start: EventDateTime | null | undefined,
	end: EventDateTime | null | undefined,
): number | null {
	const startValue = getEventTime(start);
	const endValue = getEventTime(end);

	if (!startValue || !endValue) {
		return null;
	}

	const startDate = parseInstant(startValue);
	const endDate = parseInstant(endValue);

	if (!startDate || !endDate) {
		return null;
	}

	const minutes = differenceInMinutes(endDate, startDate);
	if (isDateOnly(startValue) && minutes < 0) {
		return null;
	}

	return minutes;
}

/**
 * Formats an event boundary for reading.
 *
 * @example
 * formatEventTime({ dateTime: '2024-01-15T09:00:00Z' }); // "January 15, 2024 at 09:00 AM"
 * formatEventTime({ date: '2024-01-15' });               // "January 15, 2024 (all day)"
 * formatEventTime(undefined);                            // "No time specified"
 */
export function formatEventTime(boundary: EventDateTime | null | undefined): string {
	if (boundary?.dateTime) {
		const instant = parseInstant(boundary.dateTime);
		if (!instant) {
			return boundary.dateTime;
		}
		const timezone =
			boundary.timeZone && isKnownTimezone(boundary.timeZone) ? boundary.timeZone : 'UTC';
		return formatInTimeZone(instant, timezone, "MMMM dd, yyyy 'at' hh:mm a");
	}

	if (boundary?.date) {
		const day = isDateOnly(boundary.date) ? parseInstant(boundary.date) : null;
		if (!day) {
			return boundary.date;
		}
		return formatInTimeZone(day, 'UTC', "MMMM dd, yyyy '(all day)'");
	}

	return 'No time specified';
}

export function parseAttendeeName(attendee: EventAttendee): string {
	return attendee.displayName || (attendee.email ?? 'Unknown');
}

/**
 * @example
 * formatAttendees([{ email: 'ana@example.com', displayName: 'Ana', responseStatus: 'accepted' }]);
 * // "Ana <ana@example.com> (accepted)"
 */
export function formatAttendees(attendees: EventAttendee[] | null | undefined): string {
	if (!attendees || attendees.length === 0) {
		return 'No attendees';
	}

	return attendees
		.map((attendee) => {
			const email = attendee.email ?? '';
			const status = attendee.responseStatus ?? '';
			return attendee.displayName
				? `${attendee.displayName} <${email}> (${status})`
				: `${email} (${status})`;
		})
		.join(', ');
}

/**
 * Builds the plain-text block a Summarizer receives for one event.
 * Long descriptions are cut at 2000 characters.
 */
export function getEventSummaryText(event: CalendarEvent): string {
	const parts = [
		`Title: ${event.summary ?? 'Untitled Event'}`,
		`Time: ${formatEventTime(event.start)} to ${formatEventTime(event.end)}`,
	];

	if (event.location) {
		parts.push(`Location: ${event.location}`);
	}

	if (event.description) {
		const description =
			event.description.length > MAX_DESCRIPTION_LENGTH
				? `${event.description.slice(0, MAX_DESCRIPTION_LENGTH)}...`
				: event.description;
		parts.push(`Description: ${description}`);
	}

	if (event.attendees && event.attendees.length > 0) {
		parts.push(`Attendees: ${formatAttendees(event.attendees)}`);
	}

	return parts.join('\n');
}

/**
 * Counts the events and the hours they fill.
 *
 * @example
 * getScheduleMetrics([
 *   { start: { dateTime: '2024-01-15T09:00:00Z' }, end: { dateTime: '2024-01-15T10:30:00Z' } },
 *   { start: { date: '2024-01-16' }, end: { date: '2024-01-17' } },
 * ]);
 * // { totalEvents: 2, totalHours: 25.5 }
 */
export function getScheduleMetrics(events: CalendarEvent[]): ScheduleMetrics {
	let totalMinutes = 0;
	for (const event of events) {
		totalMinutes += getEventDurationMinutes(event.start, event.end) ?? 0;
	}

	return {
		totalEvents: events.length,
		totalHours: Math.round(totalMinutes / 6) / 10,
	};
}

/**
 * A search window from `now` to `daysAhead` days later.
 */
export function getTimeRange(daysAhead = 7, now: Date = new Date()): SearchWindow {
	return {
		start: formatInstant(now),
		end: formatInstant(addHours(now, daysAhead * 24)),
	};
}
