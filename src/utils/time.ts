/**
 * Time helpers: humanized durations, duration string parsing, and the fixed
 * timestamp format used for persisted infractions.
 *
 * @module utils/time
 */

import { config } from "../config";

const TIME_UNITS = [
	"years",
	"months",
	"days",
	"hours",
	"minutes",
	"seconds",
] as const;

export type TimeUnit = (typeof TIME_UNITS)[number];

/** A broken-down span of time; missing units count as zero. */
export type TimeDelta = Partial<Record<TimeUnit, number>>;

/**
 * Thrown when a duration string cannot be understood.
 */
export class DurationParseError extends Error {
	constructor(readonly input: string) {
		super(`"${input}" is not a valid duration string.`);
		this.name = "DurationParseError";
	}
}

/**
 * Formats one unit with the right plural form.
 *
 * @example
 * stringifyTimeUnit(1, "seconds") // "1 second"
 * stringifyTimeUnit(24, "hours")  // "24 hours"
 * stringifyTimeUnit(0, "minutes") // "less than a minute"
 */
const stringifyTimeUnit = (value: number, unit: TimeUnit): string => {
	const singular = unit.slice(0, -1);
	if (value === 1) {
		return `${value} ${singular}`;
	}
	if (value === 0) {
		return `less than a ${singular}`;
	}
	return `${value} ${unit}`;
};

/**
 * Returns a human-readable version of a time delta.
 *
 * @param precision - Smallest unit to include
 * @param maxUnits - Maximum number of non-zero units to include
 * @throws {RangeError} If maxUnits is not positive
 *
 * @example
 * humanizeDelta({ days: 2, hours: 2 }, "seconds", 2) // "2 days and 2 hours"
 * humanizeDelta({ days: 2, hours: 2 }, "days", 2)    // "2 days"
 */
export function humanizeDelta(
	delta: TimeDelta,
	precision: TimeUnit = "seconds",
	maxUnits = 6,
): string {
	if (maxUnits <= 0) {
		throw new RangeError("maxUnits must be positive");
	}

	const parts: string[] = [];
	for (const unit of TIME_UNITS) {
		const value = delta[unit] ?? 0;
		if (value) {
			parts.push(stringifyTimeUnit(value, unit));
		}
		if (unit === precision || parts.length >= maxUnits) {
			break;
		}
	}

	if (parts.length > 1) {
		const last = parts.pop();
		const previous = parts.pop();
		parts.push(`${previous} and ${last}`);
	}

	return parts.length > 0 ? parts.join(", ") : stringifyTimeUnit(0, precision);
}

/**
 * Breaks a number of seconds into days, hours, minutes and seconds.
 * Days are not folded into months or years.
 */
export function deltaFromSeconds(totalSeconds: number): TimeDelta {
	const whole = Math.floor(Math.abs(totalSeconds));
	return {
		days: Math.floor(whole / 86_400),
		hours: Math.floor((whole % 86_400) / 3_600),
		minutes: Math.floor((whole % 3_600) / 60),
		seconds: whole % 60,
	};
}

/**
 * Describes how long ago `past` was, e.g. "3 hours and 5 minutes ago".
 */
export function timeSince(
	past: Date,
	now: Date = new Date(),
	maxUnits = 2,
): string {
	const seconds = (now.getTime() - past.getTime()) / 1000;
	return `${humanizeDelta(deltaFromSeconds(seconds), "seconds", maxUnits)} ago`;
}

/**
 * Remaining time until `expiresAt`, or null when there is no expiry or it has passed.
 */
export function untilExpiration(
	expiresAt: Date | null,
	now: Date = new Date(),
	maxUnits = 2,
): string | null {
	if (!expiresAt || expiresAt.getTime() < now.getTime()) {
		return null;
	}
	const seconds = (expiresAt.getTime() - now.getTime()) / 1000;
	return humanizeDelta(deltaFromSeconds(seconds), "seconds", maxUnits);
}

const DURATION_PATTERN = new RegExp(
	"^" +
		"(?:(?<years>\\d+) ?(?:years|year|Y|y) ?)?" +
		"(?:(?<months>\\d+) ?(?:months|month|mo) ?)?" +
		"(?:(?<weeks>\\d+) ?(?:weeks|week|W|w) ?)?" +
		"(?:(?<days>\\d+) ?(?:days|day|D|d) ?)?" +
		"(?:(?<hours>\\d+) ?(?:hours|hour|hrs|H|h) ?)?" +
		"(?:(?<minutes>\\d+) ?(?:minutes|minute|min|M|m) ?)?" +
		"(?:(?<seconds>\\d+) ?(?:seconds|second|S|s))?" +
		"$",
);

/**
 * Converts a duration string into a number of seconds from `now`.
 *
 * Units must appear in descending order of magnitude:
 * - years: `Y`, `y`, `year`, `years`
 * - months: `mo`, `month`, `months`
 * - weeks: `W`, `w`, `week`, `weeks`
 * - days: `D`, `d`, `day`, `days`
 * - hours: `H`, `h`, `hrs`, `hour`, `hours`
 * - minutes: `M`, `m`, `min`, `minute`, `minutes`
 * - seconds: `S`, `s`, `second`, `seconds`
 *
 * Years and months follow the calendar, so the result depends on `now`.
 *
 * @throws {DurationParseError} If the string does not match, amounts to zero
 * or ends past the last representable date
 *
 * @example
 * parseDuration("1d12h") // 129600
 * parseDuration("30m")   // 1800
 */
export function parseDuration(input: string, now: Date = new Date()): number {
	const text = input.trim();
	const match = DURATION_PATTERN.exec(text);
	if (!text || !match?.groups) {
		throw new DurationParseError(input);
	}

	const amount = (unit: string): number =>
		parseInt(match.groups?.[unit] ?? "0", 10);

	const end = new Date(now.getTime());
	end.setUTCFullYear(
		end.getUTCFullYear() + amount("years"),
		end.getUTCMonth() + amount("months"),
	);
	const fixedSeconds =
		amount("weeks") * 604_800 +
		amount("days") * 86_400 +
		amount("hours") * 3_600 +
		amount("minutes") * 60 +
		amount("seconds");

	const seconds =
		Math.round((end.getTime() - now.getTime()) / 1000) + fixedSeconds;
	if (!Number.isFinite(seconds) || seconds <= 0) {
		throw new DurationParseError(input);
	}
	return seconds;
}

const pad = (value: number, width = 2): string =>
	value.toString().padStart(width, "0");

const TIMESTAMP_TOKENS = ["YYYY", "MM", "DD", "HH", "mm", "ss"] as const;
type TimestampToken = (typeof TIMESTAMP_TOKENS)[number];
const TOKEN_PATTERN = /YYYY|MM|DD|HH|mm|ss/g;

const isTimestampToken = (value: string): value is TimestampToken =>
	(TIMESTAMP_TOKENS as readonly string[]).includes(value);

/**
 * Formats an instant in UTC using the `YYYY MM DD HH mm ss` tokens.
 *
 * @example
 * formatTimestamp(new Date(Date.UTC(2024, 0, 2, 3, 4, 5))) // "2024-01-02 03:04:05"
 */
export function formatTimestamp(
	date: Date,
	format: string = config.timeFormat,
): string {
	const values: Record<TimestampToken, string> = {
		YYYY: pad(date.getUTCFullYear(), 4),
		MM: pad(date.getUTCMonth() + 1),
		DD: pad(date.getUTCDate()),
		HH: pad(date.getUTCHours()),
		mm: pad(date.getUTCMinutes()),
		ss: pad(date.getUTCSeconds()),
	};
	return format.replace(TOKEN_PATTERN, (token) =>
		isTimestampToken(token) ? values[token] : token,
	);
}

/**
 * Parses a timestamp written by {@link formatTimestamp} with the same format.
 *
 * @throws {Error} If the text does not follow the format
 */
export function parseTimestamp(
	text: string,
	format: string = config.timeFormat,
): Date {
	const order: TimestampToken[] = [];
	const source = format
		.split(TOKEN_PATTERN)
		.map((literal) => literal.replace(/[.*+?^${}()|[\]\\]/g, "\\$&"));
	const tokens = format.match(TOKEN_PATTERN) ?? [];

	let pattern = source[0] ?? "";
	tokens.forEach((token, index) => {
		if (isTimestampToken(token)) {
			order.push(token);
		}
		pattern += token === "YYYY" ? "(\\d{4})" : "(\\d{2})";
		pattern += source[index + 1] ?? "";
	});

	const match = new RegExp(`^${pattern}$`).exec(text);
	if (!match) {
		throw new Error(`Timestamp "${text}" does not match format "${format}"`);
	}

	const parts: Record<TimestampToken, number> = {
		YYYY: 1970,
		MM: 1,
		DD: 1,
		HH: 0,
		mm: 0,
		ss: 0,
	};
	order.forEach((token, index) => {
		parts[token] = parseInt(match[index + 1] ?? "0", 10);
	});

	return new Date(
		Date.UTC(parts.YYYY, parts.MM - 1, parts.DD, parts.HH, parts.mm, parts.ss),
	);
}
