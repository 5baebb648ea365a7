/**
 * freeslot core
 *
 * Shared time primitives for freeslot packages.
 * All intervals are half-open: [start, end)
 */

/**
 * A half-open interval [start, end).
 * All times are UTC internally.
 */
export interface Interval {
	start: Date;
	end: Date;
}

/**
 * Duration in milliseconds.
 */
export type DurationMs = number;

/**
 * Length of an interval in milliseconds. Negative when end precedes start.
 */
export function intervalLength(interval: Interval): DurationMs {
	return interval.end.getTime() - interval.start.getTime();
}
