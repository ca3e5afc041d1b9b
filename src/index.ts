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
 * x-robots-tag-parser - X-Robots-Tag HTTP header parser
 *
 * Turns the X-Robots-Tag headers of a response into the indexing rules
 * that apply to one crawler, honouring user-agent scoped lines such as
 * `X-Robots-Tag: googlebot: noindex`.
 *
 * @example
 * ```typescript
 * import { XRobotsTagParser } from 'x-robots-tag-parser';
 *
 * const parser = XRobotsTagParser.parse(
 *   [
 *     'X-Robots-Tag: noarchive',
 *     'X-Robots-Tag: bingbot: noindex, nofollow',
 *   ],
 *   'Mozilla/5.0 (compatible; bingbot/2.0)',
 * );
 *
 * console.log(parser.getRules());
 * // { noarchive: true, nofollow: true, noindex: true }
 * ```
 */

// Main parser class
export {
	XRobotsTagParser,
	type FromUrlOptions,
	type ParseOptions,
} from "./x-robots-tag-parser.js";

// Header scanning
export { parseXRobotsTagHeaders, scanHeaderLine } from "./parser.js";

// Rule aggregation
export { RuleCollector } from "./rule-collector.js";

// Reporting handler
export { XRobotsTagParsingReporter } from "./reporter.js";

// Directive table and value parsing
export {
	DIRECTIVES,
	copyRules,
	getDirectiveMeaning,
	isDirectiveName,
	isUnparsedValue,
	lookupDirective,
	parseDirective,
	parseDirectiveValue,
	type DirectiveDefinition,
	type DirectiveLookup,
} from "./directives.js";
export { isWeekdayName, parseHttpDate } from "./http-date.js";

// Normalization
export {
	DEFAULT_REBUILD_POLICY,
	rebuild,
	type RebuildPolicy,
} from "./rebuild.js";

// User-agent matching
export {
	ProductTokenUserAgentStrategy,
	extractUserAgent,
	resolveScope,
} from "./user-agent.js";
export {
	LongestMatchUserAgentStrategy,
	type UserAgentMatchStrategy,
} from "./match-strategy.js";

// Types and interfaces
export {
	DIRECTIVE_NAMES,
	XRobotsTagName,
	XRobotsTagParseHandler,
	createLineMetadata,
	createParsedHeaderReport,
	type Directive,
	type DirectiveKind,
	type DirectiveRules,
	type DirectiveValue,
	type DirectiveValueMap,
	type LineMetadata,
	type ParsedDirective,
	type ParsedHeaderLine,
	type ParsedHeaderReport,
	type RawRuleSet,
	type UnparsedValue,
} from "./types.js";

// Errors
export { HeaderFetchError, UnknownDirectiveError } from "./errors.js";

// Transport and URL utilities
export {
	fetchHeaderLines,
	toHeaderLines,
	type FetchHeadersOptions,
} from "./fetch-headers.js";
export { encodeUrl, isValidUrl } from "./url-utils.js";

// Constants
export {
	HEADER_RULE_IDENTIFIER,
	K_MAX_HEADER_LEN,
	USER_AGENT_DEFAULT,
} from "./constants.js";
