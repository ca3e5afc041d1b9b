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
import {
	K_MAX_HEADER_LEN,
	XRobotsTagParseHandler,
	parseXRobotsTagHeaders,
	scanHeaderLine,
	type Directive,
	type DirectiveValueMap,
	type LineMetadata,
} from "../src/index.js";

/**
 * Records every callback as a short string.
 */
class RecordingHandler extends XRobotsTagParseHandler {
	public events: string[] = [];

	public handleHeadersStart(): void {
		this.events.push("start");
	}

	public handleHeadersEnd(): void {
		this.events.push("end");
	}

	public handleDirective<D extends Directive>(
		lineNum: number,
		scope: string,
		directive: D,
		_value: DirectiveValueMap[D],
	): void {
		this.events.push(`directive ${lineNum} [${scope}] ${directive}`);
	}

	public handleUnknownDirective(
		lineNum: number,
		scope: string,
		name: string,
	): void {
		this.events.push(`unknown ${lineNum} [${scope}] ${name}`);
	}

	public reportLineMetadata(lineNum: number, metadata: LineMetadata): void {
		this.events.push(`line ${lineNum} robots=${metadata.isRobotsTag}`);
	}
}

describe("scanHeaderLine", () => {
	test("Unscoped directives belong to the default scope", () => {
		const line = scanHeaderLine("X-Robots-Tag: noindex, nofollow", 4);
		expect(line.lineNum).toBe(4);
		expect(line.scope).toBe("");
		expect(line.directives).toEqual([
			{ directive: "noindex", value: true },
			{ directive: "nofollow", value: true },
		]);
		expect(line.metadata.isRobotsTag).toBe(true);
		expect(line.metadata.hasScope).toBe(false);
		expect(line.metadata.hasDirective).toBe(true);
	});

	test("A user-agent prefix scopes every directive on the line", () => {
		const line = scanHeaderLine("X-Robots-Tag: googlebot: noindex, noarchive");
		expect(line.scope).toBe("googlebot");
		expect(line.directives).toEqual([
			{ directive: "noindex", value: true },
			{ directive: "noarchive", value: true },
		]);
		expect(line.metadata.hasScope).toBe(true);
	});

	test("Header name and directive names ignore case; scope keeps its case", () => {
		const line = scanHeaderLine("x-ROBOTS-tag: GoogleBot: NoIndex,NOFOLLOW");
		expect(line.scope).toBe("GoogleBot");
		expect(line.directives.map((d) => d.directive)).toEqual([
			"noindex",
			"nofollow",
		]);
	});

	test("A directive before the first colon is not a scope", () => {
		const line = scanHeaderLine(
			"X-Robots-Tag: unavailable_after: 25 Jun 2010 15:00:00 GMT",
		);
		expect(line.scope).toBe("");
		expect(line.metadata.hasScope).toBe(false);
		expect(line.directives).toEqual([
			{
				directive: "unavailable_after",
				value: new Date("2010-06-25T15:00:00.000Z"),
			},
		]);
	});

	test("A date split by its weekday comma is joined back together", () => {
		const line = scanHeaderLine(
			"X-Robots-Tag: unavailable_after: Friday, 25 Jun 2010 15:00:00 PST, noindex",
		);
		expect(line.directives).toEqual([
			{
				directive: "unavailable_after",
				value: new Date("2010-06-25T23:00:00.000Z"),
			},
			{ directive: "noindex", value: true },
		]);
		expect(line.unknownDirectives).toEqual([]);
	});

	test("Scoped dated directive in the middle of a line", () => {
		const line = scanHeaderLine(
			"X-Robots-Tag: googlebot: all, unavailable_after: Fri, 25 Jun 2010 15:00:00 GMT, noodp",
		);
		expect(line.scope).toBe("googlebot");
		expect(line.directives).toEqual([
			{ directive: "all", value: true },
			{
				directive: "unavailable_after",
				value: new Date("2010-06-25T15:00:00.000Z"),
			},
			{ directive: "noodp", value: true },
		]);
	});

	test("An unparseable date is recorded with the unparsed marker", () => {
		const line = scanHeaderLine("X-Robots-Tag: unavailable_after: soon");
		expect(line.directives).toEqual([
			{ directive: "unavailable_after", value: { unparsed: "soon" } },
		]);
		expect(line.metadata.hasUnparsedValue).toBe(true);
	});

	test("A trailing weekday with nothing after it stays unparsed", () => {
		const line = scanHeaderLine("X-Robots-Tag: unavailable_after: Friday");
		expect(line.directives).toEqual([
			{ directive: "unavailable_after", value: { unparsed: "Friday" } },
		]);
	});

	test("A weekday is not joined with a directive that follows it", () => {
		const line = scanHeaderLine(
			"X-Robots-Tag: unavailable_after: Friday, noindex",
		);
		expect(line.directives).toEqual([
			{ directive: "unavailable_after", value: { unparsed: "Friday" } },
			{ directive: "noindex", value: true },
		]);
		expect(line.metadata.hasUnparsedValue).toBe(true);
	});

	test("Unknown directives are skipped and listed", () => {
		const line = scanHeaderLine(
			"X-Robots-Tag: noindex, max-snippet: 20, NoAI, nofollow",
		);
		expect(line.directives.map((d) => d.directive)).toEqual([
			"noindex",
			"nofollow",
		]);
		expect(line.unknownDirectives).toEqual(["max-snippet", "noai"]);
		expect(line.metadata.hasUnknownDirective).toBe(true);
	});

	test("Empty fragments are skipped silently", () => {
		const line = scanHeaderLine("X-Robots-Tag: noindex,, ,nofollow,");
		expect(line.directives.map((d) => d.directive)).toEqual([
			"noindex",
			"nofollow",
		]);
		expect(line.unknownDirectives).toEqual([]);
	});

	test("A scope with no directives yields nothing", () => {
		const line = scanHeaderLine("X-Robots-Tag: googlebot:");
		expect(line.scope).toBe("googlebot");
		expect(line.directives).toEqual([]);
		expect(line.metadata.hasDirective).toBe(false);
	});

	test("An empty header value yields nothing", () => {
		const line = scanHeaderLine("X-Robots-Tag:");
		expect(line.metadata.isRobotsTag).toBe(true);
		expect(line.directives).toEqual([]);
	});

	test("Other headers and status lines are ignored", () => {
		for (const header of [
			"HTTP/1.1 200 OK",
			"Date: Tue, 25 May 2010 21:42:43 GMT",
			"X-Robots-Tag noindex",
			"X-Robots-Tags: noindex",
		]) {
			const line = scanHeaderLine(header);
			expect(line.metadata.isRobotsTag).toBe(false);
			expect(line.directives).toEqual([]);
			expect(line.unknownDirectives).toEqual([]);
		}
	});

	test("Empty lines are flagged", () => {
		expect(scanHeaderLine("").metadata.isEmpty).toBe(true);
		expect(scanHeaderLine("  \t").metadata.isEmpty).toBe(true);
	});

	test("Overlong lines are cut off", () => {
		const header = `X-Robots-Tag: noindex, ${"x".repeat(K_MAX_HEADER_LEN)}`;
		const line = scanHeaderLine(header);
		expect(line.metadata.isLineTooLong).toBe(true);
		expect(line.directives).toEqual([{ directive: "noindex", value: true }]);
		expect(line.unknownDirectives).toEqual([
			"x".repeat(K_MAX_HEADER_LEN - "X-Robots-Tag: noindex, ".length),
		]);
	});
});

describe("parseXRobotsTagHeaders", () => {
	test("Callbacks follow header order", () => {
		const handler = new RecordingHandler();
		parseXRobotsTagHeaders(
			[
				"HTTP/1.1 200 OK",
				"X-Robots-Tag: noindex, foo",
				"X-Robots-Tag: bingbot: nofollow",
			],
			handler,
		);

		expect(handler.events).toEqual([
			"start",
			"line 1 robots=false",
			"directive 2 [] noindex",
			"unknown 2 [] foo",
			"line 2 robots=true",
			"directive 3 [bingbot] nofollow",
			"line 3 robots=true",
			"end",
		]);
	});

	test("An empty header list only starts and ends", () => {
		const handler = new RecordingHandler();
		parseXRobotsTagHeaders([], handler);
		expect(handler.events).toEqual(["start", "end"]);
	});
});
