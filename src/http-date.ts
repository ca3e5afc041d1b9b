// Copyright 2024 Google LLC
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     https://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import { K_TWO_DIGIT_YEAR_PIVOT } from "./constants.js";

const MONTHS: readonly string[] = [
	"jan",
	"feb",
	"mar",
	"apr",
	"may",
	"jun",
	"jul",
	"aug",
	"sep",
	"oct",
	"nov",
	"dec",
];

const WEEKDAYS: readonly string[] = [
	"monday",
	"tuesday",
	"wednesday",
	"thursday",
	"friday",
	"saturday",
	"sunday",
];

/**
 * Zone abbreviations accepted by RFC 822, as offsets from UTC in minutes.
 */
const ZONE_OFFSETS: Readonly<Record<string, number>> = {
	ut: 0,
	utc: 0,
	gmt: 0,
	z: 0,
	est: -5 * 60,
	edt: -4 * 60,
	cst: -6 * 60,
	cdt: -5 * 60,
	mst: -7 * 60,
	mdt: -6 * 60,
	pst: -8 * 60,
	pdt: -7 * 60,
};

// [weekday,] DD Mon YYYY [HH:MM[:SS]] [zone]   (RFC 1123, RFC 822)
// [weekday,] DD-Mon-YY HH:MM:SS [zone]         (RFC 850)
const DAY_MONTH_YEAR =
	/^(?:([a-z]+),?\s+)?(\d{1,2})[\s-]+([a-z]+)[\s-]+(\d{4}|\d{2})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?(?:\s*([a-z]+|[+-]\d{2}:?\d{2}))?$/;

// weekday Mon DD HH:MM:SS YYYY   (asctime)
const ASCTIME =
	/^([a-z]+)\s+([a-z]+)\s+(\d{1,2})\s+(\d{1,2}):(\d{2}):(\d{2})\s+(\d{4})$/;

// YYYY-MM-DD[THH:MM[:SS[.fff]][zone]]
const ISO_8601 =
	/^(\d{4})-(\d{2})-(\d{2})(?:[t\s](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?\s*(z|[+-]\d{2}:?\d{2})?)?$/;

interface DateFields {
	year: number;
	month: number; // 0-based
	day: number;
	hour: number;
	minute: number;
	second: number;
	offsetMinutes: number;
}

/**
 * Returns true if `word` names a day of the week, long ("Friday") or
 * short ("Fri").
 */
export function isWeekdayName(word: string): boolean {
	const lower = word.trim().toLowerCase();
	if (lower.length < 3) return false;
	return WEEKDAYS.some(
		(day) => day === lower || (lower.length === 3 && day.startsWith(lower)),
	);
}

function monthIndex(name: string): number {
	if (name.length < 3) return -1;
	return MONTHS.indexOf(name.slice(0, 3));
}

function expandYear(digits: string): number {
	const year = Number(digits);
	if (digits.length !== 2) return year;
	return year < K_TWO_DIGIT_YEAR_PIVOT ? 2000 + year : 1900 + year;
}

/**
 * Parse a zone designator into an offset in minutes. Returns undefined
 * for unknown abbreviations.
 */
function zoneOffset(zone: string | undefined): number | undefined {
	if (zone === undefined) return 0;
	const numeric = /^([+-])(\d{2}):?(\d{2})$/.exec(zone);
	if (numeric) {
		const minutes = Number(numeric[2]) * 60 + Number(numeric[3]);
		return numeric[1] === "-" ? -minutes : minutes;
	}
	return Object.hasOwn(ZONE_OFFSETS, zone) ? ZONE_OFFSETS[zone] : undefined;
}

function toDate(fields: DateFields): Date | undefined {
	const { year, month, day, hour, minute, second, offsetMinutes } = fields;
	if (month < 0 || month > 11) return undefined;
	if (day < 1 || hour > 23 || minute > 59 || second > 59) return undefined;

	const utc = Date.UTC(year, month, day, hour, minute, second);
	// Date.UTC rolls 31 Feb over into March; reject that.
	if (new Date(utc).getUTCDate() !== day) return undefined;

	return new Date(utc - offsetMinutes * 60_000);
}

function parseDayMonthYear(match: RegExpExecArray): Date | undefined {
	const [, weekday, day, month, year, hour, minute, second, zone] = match;
	if (weekday !== undefined && !isWeekdayName(weekday)) return undefined;
	const offsetMinutes = zoneOffset(zone);
	if (offsetMinutes === undefined) return undefined;
	return toDate({
		year: expandYear(year),
		month: monthIndex(month),
		day: Number(day),
		hour: hour === undefined ? 0 : Number(hour),
		minute: minute === undefined ? 0 : Number(minute),
		second: second === undefined ? 0 : Number(second),
		offsetMinutes,
	});
}

function parseAsctime(match: RegExpExecArray): Date | undefined {
	const [, weekday, month, day, hour, minute, second, year] = match;
	if (!isWeekdayName(weekday)) return undefined;
	return toDate({
		year: Number(year),
		month: monthIndex(month),
		day: Number(day),
		hour: Number(hour),
		minute: Number(minute),
		second: Number(second),
		offsetMinutes: 0,
	});
}

function parseIso(match: RegExpExecArray): Date | undefined {
	const [, year, month, day, hour, minute, second, zone] = match;
	const offsetMinutes = zoneOffset(zone);
	if (offsetMinutes === undefined) return undefined;
	return toDate({
		year: Number(year),
		month: Number(month) - 1,
		day: Number(day),
		hour: hour === undefined ? 0 : Number(hour),
		minute: minute === undefined ? 0 : Number(minute),
		second: second === undefined ? 0 : Number(second),
		offsetMinutes,
	});
}

/**
 * Parses the date formats seen in `unavailable_after` values: RFC 1123,
 * RFC 850, asctime and ISO 8601. A missing zone is read as UTC.
 *
 * @param text - The date text, e.g. "Friday, 25 Jun 2010 15:00:00 PST"
 * @returns The instant, or undefined if the text is not a date
 */
export function parseHttpDate(text: string): Date | undefined {
	const input = text.trim().toLowerCase().replace(/\s+/g, " ");
	if (input.length === 0) return undefined;

	let match = DAY_MONTH_YEAR.exec(input);
	if (match) return parseDayMonthYear(match);

	match = ASCTIME.exec(input);
	if (match) return parseAsctime(match);

	match = ISO_8601.exec(input);
	if (match) return parseIso(match);

	return undefined;
}
