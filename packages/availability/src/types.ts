/**
 * Free-time finder type definitions.
 *
 * All intervals are half-open: [start, end)
 * All times are UTC internally; the input and output boundaries speak
 * ISO-8601 strings.
 */

import type { Interval } from '@freeslot/core';

export type { Interval };

/**
 * An ISO-8601 string: either a timestamp (`2024-01-15T09:00:00-05:00`)
 * or a whole-day date (`2024-01-15`).
 */
export type IsoString = string;

/**
 * One boundary of a calendar event as calendar providers return it.
 * Timed events carry `dateTime`, all-day events carry `date`.
 *
 * @example
 * const timed: EventDateTime = { dateTime: '2024-01-15T09:00:00Z' };
 * const allDay: EventDateTime = { date: '2024-01-15' };
 */
export interface EventDateTime {
	/** Timestamp with offset, for timed events */
	dateTime?: IsoString | null;
	/** YYYY-MM-DD, for all-day events */
	date?: IsoString | null;
	/** IANA timezone the event was created in; used for display only */
	timeZone?: string;
}

export interface EventAttendee {
	email?: string;
	displayName?: string;
	responseStatus?: string;
}

/**
 * A raw calendar event. Only `start` and `end` matter to the slot finder;
 * the rest is carried for the event helpers.
 */
export interface CalendarEvent {
	id?: string;
	summary?: string;
	description?: string;
	location?: string;
	start?: EventDateTime | null;
	end?: EventDateTime | null;
	attendees?: EventAttendee[];
}

/**
 * The search window, as ISO-8601 strings.
 *
 * @example
 * const window: SearchWindow = {
 *   start: '2024-01-15T00:00:00Z',
 *   end: '2024-01-22T00:00:00Z'
 * };
 */
export interface SearchWindow {
	/** Start of the window (inclusive) */
	start: IsoString;
	/** End of the window (exclusive) */
	end: IsoString;
}

/**
 * A recurring daily time-of-day window. Gaps outside it are clipped or dropped.
 *
 * @example
 * const officeHours: WorkingHoursPolicy = {
 *   enabled: true,
 *   startHour: 9,
 *   endHour: 17,
 *   timezone: 'Europe/London'
 * };
 */
export interface WorkingHoursPolicy {
	enabled: boolean;
	/** First working hour of the day, 0-23 */
	startHour: number;
	/** Hour the working day ends at (exclusive), 0-23 */
	endHour: number;
	/** IANA timezone the hours are read in; defaults to "UTC" */
	timezone?: string;
}

/**
 * An open slot returned by the finder.
 *
 * @example
 * const slot: FreeSlot = {
 *   start: '2024-01-15T09:00:00Z',
 *   end: '2024-01-15T12:00:00Z',
 *   durationMinutes: 180
 * };
 */
export interface FreeSlot {
	/** Second precision, "Z" suffix */
	start: IsoString;
	end: IsoString;
	durationMinutes: number;
}

/**
 * Input for findFreeSlots and findBusyIntervals.
 */
export interface FindFreeSlotsInput {
	/** Busy calendar events; order does not matter */
	events: CalendarEvent[];
	/** The window to search */
	range: SearchWindow;
	/** Gaps shorter than this are dropped; defaults to 30 */
	minDurationMinutes?: number;
	/** Defaults to 09:00-17:00 UTC, enabled */
	workingHours?: WorkingHoursPolicy;
}

/**
 * Totals over a list of events. Events without a readable duration count
 * toward totalEvents but add no hours.
 */
export interface ScheduleMetrics {
	totalEvents: number;
	/** Rounded to one decimal place */
	totalHours: number;
}

// ============================================================================
// Engine types
// ============================================================================

export interface ListEventsQuery {
	calendarId: string;
	range: SearchWindow;
}

/**
 * Supplies the busy events of a calendar for a window.
 * Implementations should expand recurring events into single instances.
 */
export interface CalendarSource {
	listEvents: (query: ListEventsQuery) => Promise<CalendarEvent[]>;
}

/**
 * Turns structured text into prose. Opaque to the finder.
 */
export interface Summarizer {
	summarize: (content: string) => Promise<string>;
}

export interface SchedulingPreferences {
	preferMorning?: boolean;
	preferAfternoon?: boolean;
	bufferMinutes?: number;
}

export interface FreeTimeQuery {
	calendarId: string;
	range: SearchWindow;
	/** Required meeting length; also the minimum slot duration */
	durationMinutes: number;
	/** Overrides the engine's working-hours policy field by field */
	workingHours?: Partial<WorkingHoursPolicy>;
	preferences?: SchedulingPreferences;
}

export interface TimeSuggestion {
	/** At most five slots, earliest first */
	availableSlots: FreeSlot[];
	/** Summarizer output, or null when there was nothing to summarize */
	suggestions: string | null;
	/** Set when no slot qualified */
	reasoning?: string;
	durationRequested: number;
}

export interface FreeTimeFinder {
	findFreeSlots: (query: FreeTimeQuery) => Promise<FreeSlot[]>;
	suggestTimes: (query: FreeTimeQuery) => Promise<TimeSuggestion>;
}
