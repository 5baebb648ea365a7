/**
 * Defaults and validation for finder options.
 *
 * The pure finder trusts its typed input. The engine validates options and
 * queries against these schemas before anything reaches it.
 */

import { z } from 'zod';
import { InvalidOptionsError } from './errors.js';
import type { WorkingHoursPolicy } from './types.js';

export const DEFAULT_MIN_DURATION_MINUTES = 30;

export const DEFAULT_WORKING_HOURS: Readonly<Required<WorkingHoursPolicy>> = {
	enabled: true,
	startHour: 9,
	endHour: 17,
	timezone: 'UTC',
};

export function isKnownTimezone(timezone: string): boolean {
	try {
		new Intl.DateTimeFormat('en-US', { timeZone: timezone });
		return true;
	} catch {
		return false;
	}
}

const hourSchema = z.number().int().min(0).max(23);

export const workingHoursPolicySchema = z
	.object({
		enabled: z.boolean().default(DEFAULT_WORKING_HOURS.enabled),
		startHour: hourSchema.default(DEFAULT_WORKING_HOURS.startHour),
		endHour: hourSchema.default(DEFAULT_WORKING_HOURS.endHour),
		timezone: z
			.string()
			.refine(isKnownTimezone, { message: 'Unknown IANA timezone' })
			.default(DEFAULT_WORKING_HOURS.timezone),
	})
	.refine((policy) => !policy.enabled || policy.startHour < policy.endHour, {
		message: 'startHour must be before endHour',
		path: ['endHour'],
	});

export const searchWindowSchema = z.object({
	start: z.string().min(1),
	end: z.string().min(1),
});

export const freeTimeQuerySchema = z.object({
	calendarId: z.string().min(1),
	range: searchWindowSchema,
	durationMinutes: z.number().int().positive(),
	workingHours: z
		.object({
			enabled: z.boolean(),
			startHour: hourSchema,
			endHour: hourSchema,
			timezone: z.string(),
		})
		.partial()
		.optional(),
	preferences: z
		.object({
			preferMorning: z.boolean(),
			preferAfternoon: z.boolean(),
			bufferMinutes: z.number().int().nonnegative(),
		})
		.partial()
		.optional(),
});

export type ResolvedWorkingHours = z.output<typeof workingHoursPolicySchema>;

/**
 * Parses a value against a schema, turning failures into InvalidOptionsError.
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, value: unknown, label: string): z.output<T> {
	const result = schema.safeParse(value);
	if (!result.success) {
		throw new InvalidOptionsError(label, result.error.issues);
	}
	return result.data;
}

/**
 * Fills in a working-hours policy from defaults and validates it.
 *
 * @throws InvalidOptionsError when an hour is out of range, the timezone is
 * unknown, or an enabled policy ends before it starts
 */
export function resolveWorkingHours(policy?: Partial<WorkingHoursPolicy>): ResolvedWorkingHours {
	return parseOptions(workingHoursPolicySchema, policy ?? {}, 'workingHours');
}

// `FOO=` in a shell or .env file leaves the variable set to ''; read that as unset
const blankAsUnset = (value: unknown) =>
	typeof value === 'string' && value.trim() === '' ? undefined : value;

const booleanFromEnv = z
	.enum(['true', 'false', '1', '0'])
	.transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
	FREESLOT_WORKING_HOURS_ENABLED: z.preprocess(blankAsUnset, booleanFromEnv.optional()),
	FREESLOT_WORKING_START_HOUR: z.preprocess(blankAsUnset, z.coerce.number().optional()),
	FREESLOT_WORKING_END_HOUR: z.preprocess(blankAsUnset, z.coerce.number().optional()),
	FREESLOT_TIMEZONE: z.preprocess(blankAsUnset, z.string().optional()),
});

/**
 * Reads a working-hours policy from environment variables. Unset or blank
 * variables fall back to the defaults.
 *
 * - `FREESLOT_WORKING_HOURS_ENABLED` - `true`/`false`/`1`/`0`
 * - `FREESLOT_WORKING_START_HOUR`, `FREESLOT_WORKING_END_HOUR` - 0-23
 * - `FREESLOT_TIMEZONE` - IANA timezone
 *
 * @throws InvalidOptionsError when a variable is set to an invalid value
 */
export function workingHoursFromEnv(env: NodeJS.ProcessEnv = process.env): ResolvedWorkingHours {
	const vars = parseOptions(envSchema, env, 'environment');

	return resolveWorkingHours({
		enabled: vars.FREESLOT_WORKING_HOURS_ENABLED,
		startHour: vars.FREESLOT_WORKING_START_HOUR,
		endHour: vars.FREESLOT_WORKING_END_HOUR,
		timezone: vars.FREESLOT_TIMEZONE,
	});
}
