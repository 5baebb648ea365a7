/**
 * Free-slot finder.
 *
 * Sweeps the search window with a cursor over busy intervals sorted by start,
 * emitting the uncovered gaps. Each gap is clipped to working hours and then
 * filtered by minimum duration.
 */

import { differenceInMinutes } from 'date-fns';
import { DEFAULT_MIN_DURATION_MINUTES, DEFAULT_WORKING_HOURS } from './config.js';
import { intersectIntervals, mergeIntervals, sortIntervals } from './intervals.js';
import { normalizeBusyIntervals, normalizeRange } from './normalize.js';
import { clipToWorkingHours } from './working-hours.js';
import type { FindFreeSlotsInput, FreeSlot, Interval } from './types.js';

/**
 * Formats an instant as a second-precision UTC timestamp, e.g. `2024-01-15T09:00:00Z`.
 */
export function formatInstant(date: Date): string {
	// UTC fields only, never host-local ones
	return `${date.toISOString().slice(0, 19)}Z`;
}

/**
 * Whole minutes in an interval, rounded to the nearest minute.
 */
export function durationInMinutes(interval: Interval): number {
	return differenceInMinutes(interval.end, interval.start, { roundingMethod: 'round' });
}

/**
 * Builds a FreeSlot from an interval when it is long enough.
 *
 * @returns The slot, or null when the interval is empty or shorter than the minimum
 */
export function toFreeSlot(interval: Interval, minDurationMinutes: number): FreeSlot | null {
	if (interval.end <= interval.start) {
		return null;
	}

	const durationMinutes = durationInMinutes(interval);
	if (durationMinutes < minDurationMinutes) {
		return null;
	}

	return {
		start: formatInstant(interval.start),
		end: formatInstant(interval.end),
		durationMinutes,
	};
}

/**
 * Finds the open slots in a search window.
 *
 * The algorithm:
 * 1. **Parse the window** - an unparseable or empty window yields no slots
 * 2. **Normalize events** - unreadable events are skipped
 * 3. **Sort** busy intervals by start
 * 4. **Sweep** - a cursor starts at the window start; every busy interval that
 *    starts after the cursor leaves a gap, and the cursor then advances to
 *    `max(cursor, busyEnd)`, which absorbs overlapping and nested events
 * 5. **Tail** - whatever lies between the cursor and the window end is the last gap
 *
 * Every gap goes through {@link clipToWorkingHours} and then {@link toFreeSlot}.
 * The function never throws.
 *
 * @returns Free slots in chronological order
 *
 * @example
 * ```typescript
 * const slots = findFreeSlots({
 *   events: [
 *     {
 *       summary: 'Lunch',
 *       start: { dateTime: '2024-01-15T12:00:00Z' },
 *       end: { dateTime: '2024-01-15T13:00:00Z' },
 *     },
 *   ],
 *   range: { start: '2024-01-15T09:00:00Z', end: '2024-01-15T17:00:00Z' },
 *   minDurationMinutes: 30,
 *   workingHours: { enabled: false, startHour: 9, endHour: 17 },
 * });
 * // [
 * //   { start: '2024-01-15T09:00:00Z', end: '2024-01-15T12:00:00Z', durationMinutes: 180 },
 * //   { start: '2024-01-15T13:00:00Z', end: '2024-01-15T17:00:00Z', durationMinutes: 240 }
 * // ]
 * ```
 */
export function findFreeSlots(input: FindFreeSlotsInput): FreeSlot[] {
	const range = normalizeRange(input.range);
	if (!range) {
		return [];
	}

	const minDurationMinutes = input.minDurationMinutes ?? DEFAULT_MIN_DURATION_MINUTES;
	const workingHours = input.workingHours ?? DEFAULT_WORKING_HOURS;
	const busy = sortIntervals(normalizeBusyIntervals(input.events));

	const slots: FreeSlot[] = [];

	const emitGap = (gap: Interval): void => {
		for (const piece of clipToWorkingHours(gap, workingHours)) {
			const slot = toFreeSlot(piece, minDurationMinutes);
			if (slot) {
				slots.push(slot);
			}
		}
	};

	let cursor = range.start;

	for (const interval of busy) {
		if (interval.start > cursor) {
			const gapEnd = interval.start < range.end ? interval.start : range.end;
			if (gapEnd > cursor) {
				emitGap({ start: cursor, end: gapEnd });
			}
		}

		if (interval.end > cursor) {
			cursor = interval.end;
		}
	}

	if (cursor < range.end) {
		emitGap({ start: cursor, end: range.end });
	}

	return slots;
}

/**
 * Returns the busy time inside the search window: events merged where they
 * overlap or touch, and clipped to the window. Together with the gaps that
 * findFreeSlots sees before clipping, these tile the window exactly.
 */
export function findBusyIntervals(input: Pick<FindFreeSlotsInput, 'events' | 'range'>): Interval[] {
	const range = normalizeRange(input.range);
	if (!range) {
		return [];
	}

	return intersectIntervals(mergeIntervals(normalizeBusyIntervals(input.events)), [range]);
}
