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

import { UnknownDirectiveError } from "./errors.js";
import { parseHttpDate } from "./http-date.js";
import {
	DIRECTIVE_NAMES,
	type Directive,
	type DirectiveKind,
	type DirectiveRules,
	type DirectiveValue,
	type DirectiveValueMap,
	type ParsedDirective,
	type UnparsedValue,
} from "./types.js";

/**
 * Everything the parser knows about one directive.
 */
export interface DirectiveDefinition<D extends Directive> {
	name: D;
	kind: DirectiveKind;
	/** Extract the value from the directive's full fragment. */
	parse(fragment: string): DirectiveValueMap[D];
	/** Documented purpose of the directive. */
	meaning: string;
}

/**
 * Result of looking up a directive name.
 */
export type DirectiveLookup =
	| { known: true; directive: Directive }
	| { known: false; name: string };

const present = (): true => true;

/**
 * Text after the first colon of a fragment, or "" if there is none.
 */
function valueText(fragment: string): string {
	const sepPos = fragment.indexOf(":");
	return sepPos === -1 ? "" : fragment.slice(sepPos + 1).trim();
}

function parseUnavailableAfter(fragment: string): Date | UnparsedValue {
	const text = valueText(fragment);
	return parseHttpDate(text) ?? { unparsed: text };
}

const DIRECTIVE_TABLE: { readonly [D in Directive]: DirectiveDefinition<D> } = {
	all: {
		name: "all",
		kind: "flag",
		parse: present,
		meaning:
			"There are no restrictions for indexing or serving. This is the default and has no effect if listed explicitly.",
	},
	none: {
		name: "none",
		kind: "flag",
		parse: present,
		meaning: "Equivalent to noindex, nofollow.",
	},
	noarchive: {
		name: "noarchive",
		kind: "flag",
		parse: present,
		meaning: "Do not show a cached link in search results.",
	},
	nofollow: {
		name: "nofollow",
		kind: "flag",
		parse: present,
		meaning: "Do not follow the links on this page.",
	},
	noimageindex: {
		name: "noimageindex",
		kind: "flag",
		parse: present,
		meaning: "Do not index images on this page.",
	},
	noindex: {
		name: "noindex",
		kind: "flag",
		parse: present,
		meaning:
			"Do not show this page in search results and do not show a cached link in search results.",
	},
	noodp: {
		name: "noodp",
		kind: "flag",
		parse: present,
		meaning:
			"Do not use metadata from the Open Directory project for titles or snippets shown for this page.",
	},
	nosnippet: {
		name: "nosnippet",
		kind: "flag",
		parse: present,
		meaning: "Do not show a snippet in the search results for this page.",
	},
	notranslate: {
		name: "notranslate",
		kind: "flag",
		parse: present,
		meaning: "Do not offer translation of this page in search results.",
	},
	unavailable_after: {
		name: "unavailable_after",
		kind: "valued",
		parse: parseUnavailableAfter,
		meaning:
			"Do not show this page in search results after the specified date and time.",
	},
};

/**
 * The directive table. Read-only; built once at module load.
 */
export const DIRECTIVES: { readonly [D in Directive]: DirectiveDefinition<D> } =
	Object.freeze(DIRECTIVE_TABLE);

/**
 * Resolve a directive name (case-insensitive, surrounding whitespace
 * ignored) against the directive table.
 */
export function lookupDirective(name: string): DirectiveLookup {
	const lower = name.trim().toLowerCase();
	const directive = DIRECTIVE_NAMES.find((known) => known === lower);
	if (directive === undefined) {
		return { known: false, name: lower };
	}
	return { known: true, directive };
}

/**
 * Returns true if `name` is a directive name, ignoring case.
 */
export function isDirectiveName(name: string): boolean {
	return lookupDirective(name).known;
}

/**
 * Parse the value of a directive from its full fragment, e.g.
 * `unavailable_after: 25 Jun 2010 15:00:00 PST`. Flags ignore any text
 * after their name. A value that cannot be parsed is kept as an
 * UnparsedValue.
 */
export function parseDirectiveValue<D extends Directive>(
	directive: D,
	fragment: string,
): DirectiveValueMap[D] {
	const definition: DirectiveDefinition<D> = DIRECTIVES[directive];
	return definition.parse(fragment);
}

/**
 * Parse a recognized directive fragment into its tagged form.
 */
export function parseDirective(
	directive: Directive,
	fragment: string,
): ParsedDirective {
	// Split so each branch pairs the directive with its own value type.
	if (directive === "unavailable_after") {
		return { directive, value: parseDirectiveValue(directive, fragment) };
	}
	return { directive, value: parseDirectiveValue(directive, fragment) };
}

/**
 * Returns the documented purpose of a directive.
 *
 * @throws UnknownDirectiveError if the name is not a supported directive
 */
export function getDirectiveMeaning(name: string): string {
	const lookup = lookupDirective(name);
	if (!lookup.known) {
		throw new UnknownDirectiveError(name);
	}
	return DIRECTIVES[lookup.directive].meaning;
}

/**
 * Returns true for the sentinel recorded when a value could not be parsed.
 */
export function isUnparsedValue(
	value: DirectiveValue | undefined,
): value is UnparsedValue {
	return typeof value === "object" && !(value instanceof Date);
}

function copyValue(
	value: DirectiveValueMap["unavailable_after"],
): DirectiveValueMap["unavailable_after"] {
	return value instanceof Date ? new Date(value.getTime()) : { ...value };
}

/**
 * Copy of a rule map that shares no objects with it. Flags are `true`;
 * valued payloads are cloned.
 */
export function copyRules(rules: DirectiveRules): DirectiveRules {
	const copy: DirectiveRules = { ...rules };
	if (rules.unavailable_after !== undefined) {
		copy.unavailable_after = copyValue(rules.unavailable_after);
	}
	return copy;
}
