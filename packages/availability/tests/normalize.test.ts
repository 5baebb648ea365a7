import { describe, expect, test } from 'vitest';
import {
	getEventTime,
	isDateOnly,
	normalizeBusyInterval,
	normalizeBusyIntervals,
	normalizeRange,
	parseInstant,
} from '../src/normalize.js';
import type { CalendarEvent } from '../src/types.js';

const timed = (start: string, end: string): CalendarEvent => ({
	start: { dateTime: start },
	end: { dateTime: end },
});

describe('parseInstant', () => {
	test('converts offset timestamps to UTC', () => {
		expect(parseInstant('2024-01-15T09:00:00-05:00')?.toISOString()).toBe('2024-01-15T14:00:00.000Z');
		expect(parseInstant('2024-01-15T09:00:00+02:00')?.toISOString()).toBe('2024-01-15T07:00:00.000Z');
	});

	test('reads Z timestamps as given', () => {
		expect(parseInstant('2024-01-15T09:00:00Z')?.toISOString()).toBe('2024-01-15T09:00:00.000Z');
	});

	test('reads timestamps without offset as UTC wall-clock', () => {
		expect(parseInstant('2024-01-15T09:30:00')?.toISOString()).toBe('2024-01-15T09:30:00.000Z');
	});

	test('reads whole-day dates as UTC midnight', () => {
		expect(parseInstant('2024-01-15')?.toISOString()).toBe('2024-01-15T00:00:00.000Z');
	});

	test('reads a year-month value as UTC midnight on the first', () => {
		expect(parseInstant('2024-01')?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
	});

	test('returns null for unparseable values', () => {
		expect(parseInstant('')).toBeNull();
		expect(parseInstant('next tuesday')).toBeNull();
		expect(parseInstant('2024-02-30')).toBeNull();
	});
});

describe('isDateOnly', () => {
	test('matches YYYY-MM-DD only', () => {
		expect(isDateOnly('2024-01-15')).toBe(true);
		expect(isDateOnly('2024-01-15T00:00:00Z')).toBe(false);
	});
});

describe('getEventTime', () => {
	test('prefers dateTime over date', () => {
		expect(getEventTime({ dateTime: '2024-01-15T09:00:00Z', date: '2024-01-15' })).toBe(
			'2024-01-15T09:00:00Z',
		);
	});

	test('falls back to date', () => {
		expect(getEventTime({ date: '2024-01-15' })).toBe('2024-01-15');
		expect(getEventTime({ dateTime: null, date: '2024-01-15' })).toBe('2024-01-15');
	});

	test('returns empty string for a missing boundary', () => {
		expect(getEventTime(undefined)).toBe('');
		expect(getEventTime(null)).toBe('');
		expect(getEventTime({})).toBe('');
	});
});

describe('normalizeBusyInterval', () => {
	test('extracts a timed interval', () => {
		expect(normalizeBusyInterval(timed('2024-01-15T12:00:00Z', '2024-01-15T13:00:00Z'))).toEqual({
			start: new Date('2024-01-15T12:00:00Z'),
			end: new Date('2024-01-15T13:00:00Z'),
		});
	});

	test('a timed value wins over an all-day marker', () => {
		const event: CalendarEvent = {
			start: { dateTime: '2024-01-15T12:00:00Z', date: '2024-01-15' },
			end: { dateTime: '2024-01-15T13:00:00Z', date: '2024-01-16' },
		};
		expect(normalizeBusyInterval(event)).toEqual({
			start: new Date('2024-01-15T12:00:00Z'),
			end: new Date('2024-01-15T13:00:00Z'),
		});
	});

	test('treats an all-day end date as exclusive midnight', () => {
		const event: CalendarEvent = { start: { date: '2024-01-15' }, end: { date: '2024-01-16' } };
		expect(normalizeBusyInterval(event)).toEqual({
			start: new Date('2024-01-15T00:00:00Z'),
			end: new Date('2024-01-16T00:00:00Z'),
		});
	});

	test('rolls an inclusive single-day end to the next midnight', () => {
		const event: CalendarEvent = { start: { date: '2024-01-15' }, end: { date: '2024-01-15' } };
		expect(normalizeBusyInterval(event)).toEqual({
			start: new Date('2024-01-15T00:00:00Z'),
			end: new Date('2024-01-16T00:00:00Z'),
		});
	});

	test('returns null when a boundary is missing', () => {
		expect(normalizeBusyInterval({ start: { dateTime: '2024-01-15T12:00:00Z' } })).toBeNull();
		expect(normalizeBusyInterval({ start: null, end: { dateTime: '2024-01-15T12:00:00Z' } })).toBeNull();
	});

	test('returns null when a boundary is unparseable', () => {
		expect(normalizeBusyInterval(timed('garbage', '2024-01-15T13:00:00Z'))).toBeNull();
	});
});

describe('normalizeBusyIntervals', () => {
	test('drops unreadable events and keeps the rest in order', () => {
		const intervals = normalizeBusyIntervals([
			timed('2024-01-15T12:00:00Z', '2024-01-15T13:00:00Z'),
			{ summary: 'No times' },
			timed('2024-01-15T10:00:00Z', '2024-01-15T11:00:00Z'),
		]);
		expect(intervals.map((i) => i.start.toISOString())).toEqual([
			'2024-01-15T12:00:00.000Z',
			'2024-01-15T10:00:00.000Z',
		]);
	});
});

describe('normalizeRange', () => {
	test('parses a valid window', () => {
		expect(normalizeRange({ start: '2024-01-15T09:00:00Z', end: '2024-01-15T17:00:00Z' })).toEqual({
			start: new Date('2024-01-15T09:00:00Z'),
			end: new Date('2024-01-15T17:00:00Z'),
		});
	});

	test('returns null for malformed boundaries', () => {
		expect(normalizeRange({ start: 'soon', end: '2024-01-15T17:00:00Z' })).toBeNull();
		expect(normalizeRange({ start: '2024-01-15T09:00:00Z', end: '' })).toBeNull();
	});

	test('returns null when start is not before end', () => {
		expect(normalizeRange({ start: '2024-01-15T17:00:00Z', end: '2024-01-15T09:00:00Z' })).toBeNull();
		expect(normalizeRange({ start: '2024-01-15T09:00:00Z', end: '2024-01-15T09:00:00Z' })).toBeNull();
	});
});
