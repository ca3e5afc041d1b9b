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

/**
 * Every directive the parser recognizes, in canonical output order.
 */
export const DIRECTIVE_NAMES = [
	"all",
	"none",
	"noarchive",
	"nofollow",
	"noimageindex",
	"noindex",
	"noodp",
	"nosnippet",
	"notranslate",
	"unavailable_after",
] as const;

export type Directive = (typeof DIRECTIVE_NAMES)[number];

/**
 * Flags carry no payload; valued directives carry a parsed one.
 */
export type DirectiveKind = "flag" | "valued";

/**
 * Recorded in place of a value whose text could not be parsed.
 */
export interface UnparsedValue {
	/** The text following the directive name, trimmed. */
	unparsed: string;
}

/**
 * Payload type of each directive.
 */
export interface DirectiveValueMap {
	all: true;
	none: true;
	noarchive: true;
	nofollow: true;
	noimageindex: true;
	noindex: true;
	noodp: true;
	nosnippet: true;
	notranslate: true;
	unavailable_after: Date | UnparsedValue;
}

export type DirectiveValue = DirectiveValueMap[Directive];

/**
 * Directive → value map. Used both for one scope of the raw rule set and
 * for the effective rules of a single agent.
 */
export type DirectiveRules = {
	[D in Directive]?: DirectiveValueMap[D];
};

/**
 * Rules for every scope seen, keyed by user-agent token ("" is the default).
 */
export type RawRuleSet = Record<string, DirectiveRules>;

/**
 * A single recognized directive together with its parsed value.
 */
export type ParsedDirective = {
	[D in Directive]: { directive: D; value: DirectiveValueMap[D] };
}[Directive];

/**
 * Tokenized form of one X-Robots-Tag header line.
 */
export interface ParsedHeaderLine {
	lineNum: number;
	/** User-agent token as written, or "" for the default scope. */
	scope: string;
	/** Recognized directives in the order they appear. */
	directives: ParsedDirective[];
	/** Lower-cased names of directives that were skipped. */
	unknownDirectives: string[];
	metadata: LineMetadata;
}

/**
 * Metadata about a scanned header line.
 */
export interface LineMetadata {
	/** Indicates if the line is totally empty. */
	isEmpty: boolean;
	/** Indicates that the header name is X-Robots-Tag. */
	isRobotsTag: boolean;
	/** Indicates that the value starts with a user-agent prefix. */
	hasScope: boolean;
	/** Indicates that at least one recognized directive was found. */
	hasDirective: boolean;
	/** Indicates that at least one directive name was not recognized. */
	hasUnknownDirective: boolean;
	/** Indicates that a directive value could not be parsed. */
	hasUnparsedValue: boolean;
	/** Indicates that the line was cut off at K_MAX_HEADER_LEN. */
	isLineTooLong: boolean;
}

/**
 * Creates a default LineMetadata object.
 */
export function createLineMetadata(): LineMetadata {
	return {
		isEmpty: false,
		isRobotsTag: false,
		hasScope: false,
		hasDirective: false,
		hasUnknownDirective: false,
		hasUnparsedValue: false,
		isLineTooLong: false,
	};
}

/**
 * Tag names for header lines in parse reporting.
 */
export enum XRobotsTagName {
	/** Not an X-Robots-Tag header, or not a header at all. */
	Ignored = 0,
	/** An X-Robots-Tag header with at least one recognized directive. */
	Rule = 1,
	/** An X-Robots-Tag header where nothing was recognized. */
	Unused = 2,
}

/**
 * Report entry for one header line.
 */
export interface ParsedHeaderReport {
	lineNum: number;
	tagName: XRobotsTagName;
	scope: string;
	directives: Directive[];
	unknownDirectives: string[];
	metadata: LineMetadata;
}

/**
 * Creates a default ParsedHeaderReport object.
 */
export function createParsedHeaderReport(): ParsedHeaderReport {
	return {
		lineNum: 0,
		tagName: XRobotsTagName.Ignored,
		scope: "",
		directives: [],
		unknownDirectives: [],
		metadata: createLineMetadata(),
	};
}

/**
 * Handler for directives found in X-Robots-Tag headers. These callbacks
 * are called by parseXRobotsTagHeaders() in the order the directives appear
 * across the header lines.
 */
export abstract class XRobotsTagParseHandler {
	abstract handleHeadersStart(): void;
	abstract handleHeadersEnd(): void;

	abstract handleDirective<D extends Directive>(
		lineNum: number,
		scope: string,
		directive: D,
		value: DirectiveValueMap[D],
	): void;

	/** Directive names outside the supported set. */
	abstract handleUnknownDirective(
		lineNum: number,
		scope: string,
		name: string,
	): void;

	/** Optional callback for line metadata. Default is no-op. */
	reportLineMetadata(_lineNum: number, _metadata: LineMetadata): void {
		// Default implementation does nothing
	}
}
