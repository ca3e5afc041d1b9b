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

import { K_INVALID_URL_WARNING, USER_AGENT_DEFAULT } from "./constants.js";
import { copyRules, getDirectiveMeaning } from "./directives.js";
import { fetchHeaderLines, type FetchHeadersOptions } from "./fetch-headers.js";
import type { UserAgentMatchStrategy } from "./match-strategy.js";
import { parseXRobotsTagHeaders } from "./parser.js";
import { DEFAULT_REBUILD_POLICY, rebuild, type RebuildPolicy } from "./rebuild.js";
import { RuleCollector } from "./rule-collector.js";
import {
	XRobotsTagParseHandler,
	type Directive,
	type DirectiveRules,
	type DirectiveValueMap,
	type LineMetadata,
	type RawRuleSet,
} from "./types.js";
import { encodeUrl, isValidUrl } from "./url-utils.js";
import { resolveScope } from "./user-agent.js";

/**
 * Options for XRobotsTagParser.parse().
 */
export interface ParseOptions {
	/** How header scopes are matched against the caller's user-agent. */
	matchStrategy?: UserAgentMatchStrategy;
	/** Implication table used by getRules() outside raw mode. */
	rebuildPolicy?: RebuildPolicy;
	/** Additional handler that observes the same scan, e.g. a reporter. */
	handler?: XRobotsTagParseHandler;
}

/**
 * Options for XRobotsTagParser.fromUrl().
 */
export interface FromUrlOptions
	extends ParseOptions,
		Omit<FetchHeadersOptions, "userAgent"> {
	/** Pre-fetched header lines; when given, no request is made. */
	headers?: readonly string[];
	/** Receives soft failures such as an invalid URL. */
	onWarning?: (message: string) => void;
}

/**
 * Passes every callback on to several handlers, in order.
 */
class ForwardingHandler extends XRobotsTagParseHandler {
	private readonly handlers: readonly XRobotsTagParseHandler[];

	constructor(handlers: readonly XRobotsTagParseHandler[]) {
		super();
		this.handlers = handlers;
	}

	public handleHeadersStart(): void {
		for (const handler of this.handlers) handler.handleHeadersStart();
	}

	public handleHeadersEnd(): void {
		for (const handler of this.handlers) handler.handleHeadersEnd();
	}

	public handleDirective<D extends Directive>(
		lineNum: number,
		scope: string,
		directive: D,
		value: DirectiveValueMap[D],
	): void {
		for (const handler of this.handlers) {
			handler.handleDirective(lineNum, scope, directive, value);
		}
	}

	public handleUnknownDirective(
		lineNum: number,
		scope: string,
		name: string,
	): void {
		for (const handler of this.handlers) {
			handler.handleUnknownDirective(lineNum, scope, name);
		}
	}

	public reportLineMetadata(lineNum: number, metadata: LineMetadata): void {
		for (const handler of this.handlers) {
			handler.reportLineMetadata(lineNum, metadata);
		}
	}
}

function emitProcessWarning(message: string): void {
	process.emitWarning(message, { code: K_INVALID_URL_WARNING });
}

/**
 * XRobotsTagParser - the rules X-Robots-Tag headers set for one crawler.
 *
 * The headers are scanned once, when the parser is created, and the scope
 * matching the caller's user-agent is resolved at the same time. Every
 * query afterwards works from that parsed state; instances never change
 * and can be shared freely.
 *
 * @example
 * ```typescript
 * const parser = XRobotsTagParser.parse(
 *   ["X-Robots-Tag: googlebot: none", "X-Robots-Tag: noarchive"],
 *   "Googlebot/2.1",
 * );
 * parser.getRules(); // { noarchive: true, nofollow: true, noindex: true }
 * ```
 */
export class XRobotsTagParser {
	private readonly collector: RuleCollector;
	private readonly matchedScope: string;
	private readonly rebuildPolicy: RebuildPolicy;

	private constructor(
		collector: RuleCollector,
		matchedScope: string,
		rebuildPolicy: RebuildPolicy,
	) {
		this.collector = collector;
		this.matchedScope = matchedScope;
		this.rebuildPolicy = rebuildPolicy;
	}

	/**
	 * Parse raw header lines for a caller. Lines other than X-Robots-Tag
	 * headers are ignored, so a full response header dump can be passed in.
	 *
	 * @param headers - Raw header lines, e.g. "X-Robots-Tag: noindex"
	 * @param userAgent - The caller's user-agent; "" applies unscoped rules only
	 * @param options - Matching, normalization and reporting hooks
	 */
	public static parse(
		headers: readonly string[],
		userAgent: string = USER_AGENT_DEFAULT,
		options: ParseOptions = {},
	): XRobotsTagParser {
		const collector = new RuleCollector();
		const handler = options.handler
			? new ForwardingHandler([collector, options.handler])
			: collector;
		parseXRobotsTagHeaders(headers, handler);

		const matched = resolveScope(
			collector.scopes(),
			userAgent,
			options.matchStrategy,
		);
		return new XRobotsTagParser(
			collector,
			matched,
			options.rebuildPolicy ?? DEFAULT_REBUILD_POLICY,
		);
	}

	/**
	 * Parse the X-Robots-Tag headers a URL responds with. An invalid URL is
	 * reported as a warning, not an error; with `options.headers` set the
	 * URL is never requested.
	 *
	 * @throws HeaderFetchError when the headers have to be fetched and
	 * the request fails
	 */
	public static async fromUrl(
		url: string,
		userAgent: string = USER_AGENT_DEFAULT,
		options: FromUrlOptions = {},
	): Promise<XRobotsTagParser> {
		if (!isValidUrl(url)) {
			const warn = options.onWarning ?? emitProcessWarning;
			warn(`Invalid URL: ${url}`);
		}

		const headers =
			options.headers ??
			(await fetchHeaderLines(encodeUrl(url), {
				userAgent: userAgent === USER_AGENT_DEFAULT ? undefined : userAgent,
				dispatcher: options.dispatcher,
				headersTimeout: options.headersTimeout,
				bodyTimeout: options.bodyTimeout,
			}));

		return XRobotsTagParser.parse(headers, userAgent, options);
	}

	/**
	 * Returns the documented purpose of a directive.
	 *
	 * @throws UnknownDirectiveError for names outside the supported set
	 */
	public static getDirectiveMeaning(directive: string): string {
		return getDirectiveMeaning(directive);
	}

	/**
	 * The scope matched for the caller's user-agent ("" if none matched).
	 */
	public getMatchedScope(): string {
		return this.matchedScope;
	}

	/**
	 * Rules in effect for the caller: the unscoped rules overlaid with the
	 * matched scope's rules. Unless `raw` is set, the overlay is normalized
	 * with the rebuild policy.
	 */
	public getRules(raw = false): DirectiveRules {
		const rules = copyRules(
			this.collector.rulesFor(USER_AGENT_DEFAULT) ?? {},
		);
		if (this.matchedScope !== USER_AGENT_DEFAULT) {
			const scoped = this.collector.rulesFor(this.matchedScope) ?? {};
			Object.assign(rules, copyRules(scoped));
		}
		return raw ? rules : rebuild(rules, this.rebuildPolicy);
	}

	/**
	 * Every scope's rules, untouched.
	 */
	public export(): RawRuleSet {
		return this.collector.toRawRuleSet();
	}

	/**
	 * Returns the documented purpose of a directive.
	 *
	 * @throws UnknownDirectiveError for names outside the supported set
	 */
	public getDirectiveMeaning(directive: string): string {
		return getDirectiveMeaning(directive);
	}
}
