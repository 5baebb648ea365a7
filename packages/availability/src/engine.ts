/**
 * Free-time engine with adapter-based data loading.
 */

import { freeTimeQuerySchema, parseOptions, resolveWorkingHours } from './config.js';
import { CalendarSourceError, SummarizerError } from './errors.js';
import { findFreeSlots as computeFreeSlots } from './gaps.js';
import { type Logger, noopLogger } from './logger.js';
import { normalizeRange } from './normalize.js';
import type {
	CalendarEvent,
	CalendarSource,
	FreeSlot,
	FreeTimeFinder,
	FreeTimeQuery,
	SchedulingPreferences,
	Summarizer,
	TimeSuggestion,
	WorkingHoursPolicy,
} from './types.js';

const MAX_SUMMARIZED_SLOTS = 10;
const MAX_RETURNED_SLOTS = 5;

export interface CreateFreeTimeFinderOptions {
	source: CalendarSource;
	/** Needed only by suggestTimes */
	summarizer?: Summarizer;
	logger?: Logger;
	/** Base policy; queries override it field by field */
	workingHours?: Partial<WorkingHoursPolicy>;
}

function describePreferences(preferences: SchedulingPreferences | undefined): string[] {
	if (!preferences) {
		return [];
	}

	const parts: string[] = [];
	if (preferences.preferMorning) parts.push('Prefer morning meetings');
	if (preferences.preferAfternoon) parts.push('Prefer afternoon meetings');
	if (preferences.bufferMinutes) parts.push(`Need ${preferences.bufferMinutes} minute buffer`);
	return parts;
}

/**
 * Renders free slots and scheduling requirements as the plain text handed to a Summarizer.
 *
 * @example
 * formatSlotsForSummary(
 *   [{ start: '2024-01-15T09:00:00Z', end: '2024-01-15T10:00:00Z', durationMinutes: 60 }],
 *   30,
 *   { preferMorning: true },
 * );
 * // Available free time slots:
 * // - 2024-01-15T09:00:00Z to 2024-01-15T10:00:00Z (60 minutes free)
 * //
 * // Required duration: 30 minutes
 * // Preferences: Prefer morning meetings
 */
export function formatSlotsForSummary(
	slots: FreeSlot[],
	durationMinutes: number,
	preferences?: SchedulingPreferences,
): string {
	const lines = [
		'Available free time slots:',
		...slots.map((slot) => `- ${slot.start} to ${slot.end} (${slot.durationMinutes} minutes free)`),
		'',
		`Required duration: ${durationMinutes} minutes`,
	];

	const preferenceParts = describePreferences(preferences);
	if (preferenceParts.length > 0) {
		lines.push(`Preferences: ${preferenceParts.join(', ')}`);
	}

	return lines.join('\n');
}

/**
 * Create a free-time finder that loads events through the given source.
 *
 * @throws InvalidOptionsError when the base working-hours policy is invalid
 *
 * @example
 * ```typescript
 * const finder = createFreeTimeFinder({
 *   source: { listEvents: ({ calendarId, range }) => calendarClient.list(calendarId, range) },
 *   workingHours: { startHour: 8, endHour: 18, timezone: 'Europe/Berlin' },
 * });
 *
 * const slots = await finder.findFreeSlots({
 *   calendarId: 'primary',
 *   range: { start: '2024-01-15T00:00:00Z', end: '2024-01-20T00:00:00Z' },
 *   durationMinutes: 45,
 * });
 * ```
 */
export function createFreeTimeFinder(options: CreateFreeTimeFinderOptions): FreeTimeFinder {
	const { source, summarizer, logger = noopLogger } = options;
	const baseWorkingHours = resolveWorkingHours(options.workingHours);

	async function listEvents(query: FreeTimeQuery): Promise<CalendarEvent[]> {
		try {
			return await source.listEvents({ calendarId: query.calendarId, range: query.range });
		} catch (error) {
			throw new CalendarSourceError(query.calendarId, error);
		}
	}

	async function findFreeSlotsForQuery(input: FreeTimeQuery): Promise<FreeSlot[]> {
		const query = parseOptions(freeTimeQuerySchema, input, 'query');
		const workingHours = resolveWorkingHours({ ...baseWorkingHours, ...query.workingHours });

		if (!normalizeRange(query.range)) {
			logger.warn(`Unusable search window ${query.range.start} - ${query.range.end}; no slots`);
			return [];
		}

		const events = await listEvents(query);
		logger.debug(`Loaded ${events.length} events from calendar "${query.calendarId}"`);

		const slots = computeFreeSlots({
			events,
			range: query.range,
			minDurationMinutes: query.durationMinutes,
			workingHours,
		});
		logger.debug(`Found ${slots.length} free slots of at least ${query.durationMinutes} minutes`);

		return slots;
	}

	async function suggestTimes(input: FreeTimeQuery): Promise<TimeSuggestion> {
		const slots = await findFreeSlotsForQuery(input);
		const durationRequested = input.durationMinutes;

		if (slots.length === 0) {
			return {
				availableSlots: [],
				suggestions: null,
				reasoning: 'No free time slots available in the specified range.',
				durationRequested,
			};
		}

		const availableSlots = slots.slice(0, MAX_RETURNED_SLOTS);

		if (!summarizer) {
			return { availableSlots, suggestions: null, durationRequested };
		}

		const content = formatSlotsForSummary(
			slots.slice(0, MAX_SUMMARIZED_SLOTS),
			durationRequested,
			input.preferences,
		);

		let suggestions: string;
		try {
			suggestions = await summarizer.summarize(content);
		} catch (error) {
			logger.error('Summarizer failed', error);
			throw new SummarizerError(error);
		}

		return { availableSlots, suggestions, durationRequested };
	}

	return {
		findFreeSlots: findFreeSlotsForQuery,
		suggestTimes,
	};
}
