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

import { K_NO_MATCH_PRIORITY, USER_AGENT_DEFAULT } from "./constants.js";
import {
	LongestMatchUserAgentStrategy,
	type UserAgentMatchStrategy,
} from "./match-strategy.js";

const PRODUCT_TOKEN = /^[A-Za-z_-]*/;

/**
 * The product token a user-agent string starts with, without its version:
 * "Googlebot/2.1" gives "Googlebot". Only [a-zA-Z_-] belong to a token.
 */
export function extractUserAgent(userAgent: string): string {
	return PRODUCT_TOKEN.exec(userAgent)?.[0] ?? "";
}

/**
 * Matches only when the caller's product token equals the scope, ignoring
 * case: "Googlebot/2.1" selects a "googlebot" scope, while
 * "Mozilla/5.0 (compatible; Googlebot/2.1)" selects nothing.
 */
export class ProductTokenUserAgentStrategy implements UserAgentMatchStrategy {
	public matchScope(userAgent: string, scope: string): number {
		if (scope.length === 0) return K_NO_MATCH_PRIORITY;
		const token = extractUserAgent(userAgent.trim());
		return token.toLowerCase() === scope.toLowerCase()
			? scope.length
			: K_NO_MATCH_PRIORITY;
	}
}

/**
 * Pick the scope that applies to the caller in addition to the default
 * scope. The highest-priority match wins; on a tie the scope seen first is
 * kept. Returns the default scope when nothing matches or the caller did
 * not identify itself.
 *
 * @param scopes - Scope tokens in the order they were first seen
 * @param userAgent - The caller's user-agent
 * @param strategy - How a single scope is matched
 */
export function resolveScope(
	scopes: Iterable<string>,
	userAgent: string,
	strategy: UserAgentMatchStrategy = new LongestMatchUserAgentStrategy(),
): string {
	if (userAgent.trim().length === 0) {
		return USER_AGENT_DEFAULT;
	}

	let bestScope = USER_AGENT_DEFAULT;
	let bestPriority = K_NO_MATCH_PRIORITY;
	for (const scope of scopes) {
		if (scope === USER_AGENT_DEFAULT) continue;
		const priority = strategy.matchScope(userAgent, scope);
		if (priority > bestPriority) {
			bestPriority = priority;
			bestScope = scope;
		}
	}
	return bestScope;
}
