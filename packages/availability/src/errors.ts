/**
 * Errors raised by the engine. The pure finder never throws.
 */

import type { ZodIssue } from 'zod';

export class FreeTimeError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Engine options or a query failed validation.
 */
export class InvalidOptionsError extends FreeTimeError {
	readonly issues: ZodIssue[];

	constructor(label: string, issues: ZodIssue[]) {
		const details = issues
			.map((issue) => `${[label, ...issue.path].join('.')}: ${issue.message}`)
			.join('; ');
		super(`Invalid ${label}: ${details}`);
		this.issues = issues;
	}
}

/**
 * The calendar source failed to list events.
 */
export class CalendarSourceError extends FreeTimeError {
	readonly calendarId: string;

	constructor(calendarId: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`Failed to list events for calendar "${calendarId}": ${reason}`, { cause });
		this.calendarId = calendarId;
	}
}

/**
 * The summarizer failed to produce text.
 */
export class SummarizerError extends FreeTimeError {
	constructor(cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`Summarizer failed: ${reason}`, { cause });
	}
}
