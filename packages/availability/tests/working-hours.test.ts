import { describe, expect, test } from 'vitest';
import { clipToWorkingHours, workingWindows } from '../src/working-hours.js';
import type { WorkingHoursPolicy } from '../src/types.js';

const d = (iso: string) => new Date(iso);
const nineToFive: WorkingHoursPolicy = { enabled: true, startHour: 9, endHour: 17 };

describe('clipToWorkingHours', () => {
	test('passes the gap through when the policy is disabled', () => {
		const gap = { start: d('2024-01-15T02:00:00Z'), end: d('2024-01-15T23:00:00Z') };
		const clipped = clipToWorkingHours(gap, { ...nineToFive, enabled: false });

		expect(clipped).toEqual([gap]);
		expect(clipped[0].start).not.toBe(gap.start);
	});

	test('moves a start before working hours forward to startHour', () => {
		const gap = { start: d('2024-01-15T07:30:00Z'), end: d('2024-01-15T12:00:00Z') };
		expect(clipToWorkingHours(gap, nineToFive)).toEqual([
			{ start: d('2024-01-15T09:00:00Z'), end: d('2024-01-15T12:00:00Z') },
		]);
	});

	test('moves an end after working hours back to endHour', () => {
		const gap = { start: d('2024-01-15T10:00:00Z'), end: d('2024-01-15T19:45:00Z') };
		expect(clipToWorkingHours(gap, nineToFive)).toEqual([
			{ start: d('2024-01-15T10:00:00Z'), end: d('2024-01-15T17:00:00Z') },
		]);
	});

	test('discards a gap that starts after working hours', () => {
		const gap = { start: d('2024-01-15T17:00:00Z'), end: d('2024-01-15T21:00:00Z') };
		expect(clipToWorkingHours(gap, nineToFive)).toEqual([]);
	});

	test('discards a gap that ends before working hours', () => {
		const gap = { start: d('2024-01-15T05:00:00Z'), end: d('2024-01-15T08:59:00Z') };
		expect(clipToWorkingHours(gap, nineToFive)).toEqual([]);
	});

	test('keeps a gap wholly inside working hours unchanged', () => {
		const gap = { start: d('2024-01-15T10:15:00Z'), end: d('2024-01-15T11:45:00Z') };
		expect(clipToWorkingHours(gap, nineToFive)).toEqual([gap]);
	});

	test('clips every day of a multi-day gap', () => {
		const gap = { start: d('2024-01-15T15:00:00Z'), end: d('2024-01-17T10:00:00Z') };
		expect(clipToWorkingHours(gap, nineToFive)).toEqual([
			{ start: d('2024-01-15T15:00:00Z'), end: d('2024-01-15T17:00:00Z') },
			{ start: d('2024-01-16T09:00:00Z'), end: d('2024-01-16T17:00:00Z') },
			{ start: d('2024-01-17T09:00:00Z'), end: d('2024-01-17T10:00:00Z') },
		]);
	});

	test('reads hours on the wall clock of the policy timezone', () => {
		const gap = { start: d('2024-01-15T00:00:00Z'), end: d('2024-01-16T00:00:00Z') };
		// New York is UTC-5 in January
		expect(clipToWorkingHours(gap, { ...nineToFive, timezone: 'America/New_York' })).toEqual([
			{ start: d('2024-01-15T14:00:00Z'), end: d('2024-01-15T22:00:00Z') },
		]);
	});

	test('discards everything when startHour is not before endHour', () => {
		const gap = { start: d('2024-01-15T00:00:00Z'), end: d('2024-01-16T00:00:00Z') };
		expect(clipToWorkingHours(gap, { enabled: true, startHour: 17, endHour: 9 })).toEqual([]);
	});

	test('discards an empty gap', () => {
		const gap = { start: d('2024-01-15T10:00:00Z'), end: d('2024-01-15T10:00:00Z') };
		expect(clipToWorkingHours(gap, nineToFive)).toEqual([]);
	});
});

describe('workingWindows', () => {
	test('returns one window per day touched, including the end day', () => {
		const span = { start: d('2024-01-15T20:00:00Z'), end: d('2024-01-16T10:00:00Z') };
		expect(workingWindows(span, nineToFive)).toEqual([
			{ start: d('2024-01-15T09:00:00Z'), end: d('2024-01-15T17:00:00Z') },
			{ start: d('2024-01-16T09:00:00Z'), end: d('2024-01-16T17:00:00Z') },
		]);
	});
});
