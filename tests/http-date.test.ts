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

import { describe, expect, test } from "vitest";
import { isWeekdayName, parseHttpDate } from "../src/index.js";

function expectDate(text: string, iso: string): void {
	const parsed = parseHttpDate(text);
	expect(parsed).toBeInstanceOf(Date);
	expect(parsed?.toISOString()).toBe(iso);
}

describe("RFC 1123 and RFC 822 dates", () => {
	test("Long weekday with a US zone abbreviation", () => {
		expectDate("Friday, 25 Jun 2010 15:00:00 PST", "2010-06-25T23:00:00.000Z");
	});

	test("Short weekday in GMT", () => {
		expectDate("Fri, 25 Jun 2010 15:00:00 GMT", "2010-06-25T15:00:00.000Z");
	});

	test("Without weekday", () => {
		expectDate("25 Aug 2007 15:00:00 EST", "2007-08-25T20:00:00.000Z");
	});

	test("Numeric zone offset", () => {
		expectDate("25 Jun 2010 15:00:00 +0200", "2010-06-25T13:00:00.000Z");
	});

	test("Missing zone is UTC", () => {
		expectDate("25 Jun 2010 15:00:00", "2010-06-25T15:00:00.000Z");
	});

	test("Missing seconds", () => {
		expectDate("25 Jun 2010 15:30 GMT", "2010-06-25T15:30:00.000Z");
	});

	test("Date only", () => {
		expectDate("25 Jun 2010", "2010-06-25T00:00:00.000Z");
	});

	test("Case and extra whitespace are ignored", () => {
		expectDate("  FRIDAY,   25 JUN 2010 15:00:00 pdt ", "2010-06-25T22:00:00.000Z");
	});
});

describe("RFC 850 dates", () => {
	test("Two-digit year after the pivot", () => {
		expectDate("Sunday, 06-Nov-94 08:49:37 GMT", "1994-11-06T08:49:37.000Z");
	});

	test("Two-digit year before the pivot", () => {
		expectDate("Friday, 25-Jun-10 15:00:00 GMT", "2010-06-25T15:00:00.000Z");
	});
});

describe("asctime dates", () => {
	test("Padded day of month", () => {
		expectDate("Sun Nov  6 08:49:37 1994", "1994-11-06T08:49:37.000Z");
	});
});

describe("ISO 8601 dates", () => {
	test("Calendar date", () => {
		expectDate("2020-09-21", "2020-09-21T00:00:00.000Z");
	});

	test("Date and time in UTC", () => {
		expectDate("2010-06-25T15:00:00Z", "2010-06-25T15:00:00.000Z");
	});

	test("Date and time with offset", () => {
		expectDate("2010-06-25T15:00:00+02:00", "2010-06-25T13:00:00.000Z");
	});
});

describe("Text that is not a date", () => {
	const notDates = [
		"",
		"   ",
		"soon",
		"Funday, 25 Jun 2010 15:00:00 GMT",
		"25 Foo 2010 15:00:00 GMT",
		"25 Jun 2010 15:00:00 XYZ",
		"31 Feb 2010 10:00:00 GMT",
		"25 Jun 2010 24:00:00 GMT",
		"25 Jun 2010 15:60:00 GMT",
		"2010-13-01",
		"Friday",
	];

	for (const text of notDates) {
		test(`"${text}" is rejected`, () => {
			expect(parseHttpDate(text)).toBeUndefined();
		});
	}
});

describe("isWeekdayName", () => {
	test("Long and short names in any case", () => {
		expect(isWeekdayName("Friday")).toBe(true);
		expect(isWeekdayName("fri")).toBe(true);
		expect(isWeekdayName(" WED ")).toBe(true);
	});

	test("Other words", () => {
		expect(isWeekdayName("Fr")).toBe(false);
		expect(isWeekdayName("Fridays")).toBe(false);
		expect(isWeekdayName("noindex")).toBe(false);
		expect(isWeekdayName("")).toBe(false);
	});
});
