/**
 * Free-time finder
 *
 * A stateless library for Node.js that answers "when am I free?".
 * Given busy calendar events, a search window and a working-hours policy,
 * it returns the open slots that are long enough to use.
 *
 * @packageDocumentation
 */

// Main query functions
export { findBusyIntervals, findFreeSlots, durationInMinutes, formatInstant, toFreeSlot } from './gaps.js';
// Event normalization
export {
	getEventTime,
	isDateOnly,
	normalizeBusyInterval,
	normalizeBusyIntervals,
	normalizeRange,
	parseInstant,
} from './normalize.js';
// Working hours
export { clipToWorkingHours, workingWindows } from './working-hours.js';
// Interval arithmetic
export { intersectIntervals, mergeIntervals, sortIntervals } from './intervals.js';
// Event helpers
export {
	formatAttendees,
	formatEventTime,
	getEventDurationMinutes,
	getEventSummaryText,
	getScheduleMetrics,
	getTimeRange,
	isAllDayEvent,
	parseAttendeeName,
} from './events.js';
// Adapter-based engine
export { createFreeTimeFinder, formatSlotsForSummary, type CreateFreeTimeFinderOptions } from './engine.js';
// Configuration
export {
	DEFAULT_MIN_DURATION_MINUTES,
	DEFAULT_WORKING_HOURS,
	freeTimeQuerySchema,
	resolveWorkingHours,
	workingHoursFromEnv,
	workingHoursPolicySchema,
	type ResolvedWorkingHours,
} from './config.js';
// Errors
export { CalendarSourceError, FreeTimeError, InvalidOptionsError, SummarizerError } from './errors.js';
// Logging
export { createLogger, noopLogger, type CreateLoggerOptions, type Logger, type LogLevel } from './logger.js';

// All types
export type {
	CalendarEvent,
	CalendarSource,
	EventAttendee,
	EventDateTime,
	FindFreeSlotsInput,
	FreeSlot,
	FreeTimeFinder,
	FreeTimeQuery,
	Interval,
	IsoString,
	ListEventsQuery,
	ScheduleMetrics,
	SchedulingPreferences,
	SearchWindow,
	Summarizer,
	TimeSuggestion,
	WorkingHoursPolicy,
} from './types.js';
