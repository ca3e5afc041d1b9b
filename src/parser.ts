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

import {
	HEADER_RULE_IDENTIFIER,
	K_MAX_HEADER_LEN,
	USER_AGENT_DEFAULT,
} from "./constants.js";
import {
	DIRECTIVES,
	isDirectiveName,
	isUnparsedValue,
	lookupDirective,
	parseDirective,
} from "./directives.js";
import { isWeekdayName } from "./http-date.js";
import {
	XRobotsTagParseHandler,
	createLineMetadata,
	type ParsedHeaderLine,
} from "./types.js";

/**
 * Result of splitting a header line into name and value.
 */
interface HeaderNameValue {
	name: string;
	value: string;
}

/**
 * Split a header line on its first colon. Returns null when there is no
 * colon, e.g. for a status line.
 */
function splitHeader(line: string): HeaderNameValue | null {
	const sepPos = line.indexOf(":");
	if (sepPos === -1) {
		return null;
	}
	return {
		name: line.slice(0, sepPos).trim().toLowerCase(),
		value: line.slice(sepPos + 1),
	};
}

/**
 * The directive name of a fragment: the text before its first colon.
 */
function fragmentName(fragment: string): string {
	const sepPos = fragment.indexOf(":");
	return (sepPos === -1 ? fragment : fragment.slice(0, sepPos)).trim();
}

/**
 * A date such as "Friday, 25 Jun 2010" is cut in two by the comma split.
 * True while the value text of a valued fragment is only a weekday. The
 * next fragment is joined on only if it does not name a directive.
 */
function needsContinuation(fragment: string): boolean {
	const sepPos = fragment.indexOf(":");
	if (sepPos === -1) return false;
	return isWeekdayName(fragment.slice(sepPos + 1));
}

/**
 * Tokenize one raw header line. Lines that are not X-Robots-Tag headers
 * come back with `metadata.isRobotsTag` unset and no directives.
 *
 * @param line - The raw header line, e.g. "X-Robots-Tag: googlebot: noindex"
 * @param lineNum - Position of the line in its header list (1-based)
 */
export function scanHeaderLine(line: string, lineNum = 0): ParsedHeaderLine {
	const metadata = createLineMetadata();
	const result: ParsedHeaderLine = {
		lineNum,
		scope: USER_AGENT_DEFAULT,
		directives: [],
		unknownDirectives: [],
		metadata,
	};

	let processedLine = line;
	if (processedLine.length > K_MAX_HEADER_LEN) {
		metadata.isLineTooLong = true;
		processedLine = processedLine.slice(0, K_MAX_HEADER_LEN);
	}

	if (processedLine.trim().length === 0) {
		metadata.isEmpty = true;
		return result;
	}

	const header = splitHeader(processedLine);
	if (!header || header.name !== HEADER_RULE_IDENTIFIER) {
		// Header is not a rule
		return result;
	}
	metadata.isRobotsTag = true;

	const fragments = header.value.split(",").map((fragment) => fragment.trim());

	// An optional "<user-agent>:" prefix scopes the whole line.
	const first = fragments[0];
	const sepPos = first.indexOf(":");
	if (sepPos !== -1) {
		const prefix = first.slice(0, sepPos).trim();
		if (prefix.length > 0 && !isDirectiveName(prefix)) {
			result.scope = prefix;
			fragments[0] = first.slice(sepPos + 1).trim();
			metadata.hasScope = true;
		}
	}

	for (let i = 0; i < fragments.length; i++) {
		let fragment = fragments[i];
		const name = fragmentName(fragment);
		if (name.length === 0) {
			continue;
		}

		const lookup = lookupDirective(name);
		if (!lookup.known) {
			result.unknownDirectives.push(lookup.name);
			metadata.hasUnknownDirective = true;
			continue;
		}

		if (DIRECTIVES[lookup.directive].kind === "valued") {
			while (
				needsContinuation(fragment) &&
				i + 1 < fragments.length &&
				!isDirectiveName(fragmentName(fragments[i + 1]))
			) {
				i++;
				fragment = `${fragment}, ${fragments[i]}`;
			}
		}

		const parsed = parseDirective(lookup.directive, fragment);
		if (isUnparsedValue(parsed.value)) {
			metadata.hasUnparsedValue = true;
		}
		result.directives.push(parsed);
		metadata.hasDirective = true;
	}

	return result;
}

/**
 * Internal scanner for a list of header lines.
 */
class XRobotsTagScanner {
	private readonly headers: readonly string[];
	private readonly handler: XRobotsTagParseHandler;

	constructor(headers: readonly string[], handler: XRobotsTagParseHandler) {
		this.headers = headers;
		this.handler = handler;
	}

	/**
	 * Scan a single line and emit its directives.
	 */
	private parseAndEmitLine(lineNum: number, line: string): void {
		const { scope, directives, unknownDirectives, metadata } = scanHeaderLine(
			line,
			lineNum,
		);

		for (const { directive, value } of directives) {
			this.handler.handleDirective(lineNum, scope, directive, value);
		}
		for (const name of unknownDirectives) {
			this.handler.handleUnknownDirective(lineNum, scope, name);
		}

		this.handler.reportLineMetadata(lineNum, metadata);
	}

	/**
	 * Scan every header line in order.
	 */
	parse(): void {
		this.handler.handleHeadersStart();

		let lineNum = 0;
		for (const line of this.headers) {
			lineNum++;
			this.parseAndEmitLine(lineNum, line);
		}

		this.handler.handleHeadersEnd();
	}
}

/**
 * Parses a list of raw HTTP header lines and emits parse callbacks for
 * every directive found in X-Robots-Tag headers. Line numbers are 1-based
 * positions in the list.
 *
 * Note, this function will accept any header list but will skip
 * everything that is not an X-Robots-Tag header, and every directive name
 * it does not recognize.
 *
 * @param headers - Raw header lines, e.g. "X-Robots-Tag: noindex"
 * @param handler - The handler to receive parse callbacks
 */
export function parseXRobotsTagHeaders(
	headers: readonly string[],
	handler: XRobotsTagParseHandler,
): void {
	const scanner = new XRobotsTagScanner(headers, handler);
	scanner.parse();
}
