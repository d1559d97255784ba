import type { CalendarDate } from "../../shared/types";

const DATE_PATTERN = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})$/;

/** Today in the local time zone. */
export function todayDate(now: Date = new Date()): CalendarDate {
	return {
		year: now.getFullYear(),
		month: now.getMonth() + 1,
		day: now.getDate(),
	};
}

/**
 * Parses `YYYY-MM-DD` (also with `/` or `.` separators).
 * Returns null for anything else, including impossible days like 2026-02-30.
 */
export function parseEntryDate(input: string): CalendarDate | null {
	const match = DATE_PATTERN.exec(input.trim());
	if (!match) return null;

	const year = Number(match[1]);
	const month = Number(match[2]);
	const day = Number(match[3]);
	const probe = new Date(Date.UTC(year, month - 1, day));
	if (
		probe.getUTCFullYear() !== year ||
		probe.getUTCMonth() !== month - 1 ||
		probe.getUTCDate() !== day
	) {
		return null;
	}
	return { year, month, day };
}

export function formatIsoDate(date: CalendarDate): string {
	const pad = (value: number) => String(value).padStart(2, "0");
	return `${date.year}-${pad(date.month)}-${pad(date.day)}`;
}

export function formatTypstDate(date: CalendarDate): string {
	return `datetime(year: ${date.year}, month: ${date.month}, day: ${date.day})`;
}
