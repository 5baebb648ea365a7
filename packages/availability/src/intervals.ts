/**
 * Interval arithmetic for half-open [start, end) intervals.
 * Every function returns fresh Date objects and leaves its input untouched.
 */

import type { Interval } from './types.js';

export type { Interval };

function cloneInterval(interval: Interval): Interval {
	return {
		start: new Date(interval.start.getTime()),
		end: new Date(interval.end.getTime()),
	};
}

/**
 * Sorts intervals by start, then end. Returns a new array.
 */
export function sortIntervals(intervals: Interval[]): Interval[] {
	return [...intervals].sort((a, b) => {
		const startDiff = a.start.getTime() - b.start.getTime();
		if (startDiff !== 0) return startDiff;
		return a.end.getTime() - b.end.getTime();
	});
}

/**
 * Merges overlapping or adjacent intervals into a sorted list of non-overlapping intervals.
 * Empty and inverted intervals (start >= end) are dropped.
 *
 * @example
 * ```typescript
 * mergeIntervals([
 *   { start: new Date('2024-01-15T10:00:00Z'), end: new Date('2024-01-15T12:00:00Z') },
 *   { start: new Date('2024-01-15T11:00:00Z'), end: new Date('2024-01-15T13:00:00Z') },
 * ]);
 * // [{ start: 2024-01-15T10:00:00Z, end: 2024-01-15T13:00:00Z }]
 * ```
 */
export function mergeIntervals(intervals: Interval[]): Interval[] {
	const valid = sortIntervals(intervals.filter((interval) => interval.start < interval.end));
	if (valid.length === 0) {
		return [];
	}

	const merged: Interval[] = [cloneInterval(valid[0])];

	for (let i = 1; i < valid.length; i++) {
		const current = valid[i];
		const last = merged[merged.length - 1];

		// [a, b) and [b, c) touch, so they merge
		if (current.start <= last.end) {
			if (current.end > last.end) {
				last.end = new Date(current.end.getTime());
			}
		} else {
			merged.push(cloneInterval(current));
		}
	}

	return merged;
}

/**
 * Computes the intersection of two sets of intervals.
 * Returns only the time that appears in both input sets, merged and sorted.
 *
 * @example
 * ```typescript
 * intersectIntervals(
 *   [{ start: new Date('2024-01-15T08:00:00Z'), end: new Date('2024-01-15T12:00:00Z') }],
 *   [{ start: new Date('2024-01-15T10:00:00Z'), end: new Date('2024-01-15T14:00:00Z') }],
 * );
 * // [{ start: 2024-01-15T10:00:00Z, end: 2024-01-15T12:00:00Z }]
 * ```
 */
export function intersectIntervals(a: Interval[], b: Interval[]): Interval[] {
	if (a.length === 0 || b.length === 0) {
		return [];
	}

	const mergedA = mergeIntervals(a);
	const mergedB = mergeIntervals(b);

	const result: Interval[] = [];

	let i = 0;
	let j = 0;

	// Two pointers over sorted, merged intervals
	while (i < mergedA.length && j < mergedB.length) {
		const intervalA = mergedA[i];
		const intervalB = mergedB[j];

		const start = new Date(Math.max(intervalA.start.getTime(), intervalB.start.getTime()));
		const end = new Date(Math.min(intervalA.end.getTime(), intervalB.end.getTime()));

		if (start < end) {
			result.push({ start, end });
		}

		// Advance whichever interval ends first
		if (intervalA.end <= intervalB.end) {
			i++;
		} else {
			j++;
		}
	}

	return result;
}
