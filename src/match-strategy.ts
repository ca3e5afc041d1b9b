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

import { K_NO_MATCH_PRIORITY } from "./constants.js";

/**
 * A UserAgentMatchStrategy decides how well a header scope matches the
 * caller's user-agent. matchScope should return a match priority, which is
 * interpreted as:
 *
 * match priority < 0:
 *    No match.
 *
 * match priority >= 0:
 *    Match; the highest priority wins.
 */
export interface UserAgentMatchStrategy {
	/**
	 * Match a scope token against the caller's user-agent.
	 * @param userAgent - The caller's full user-agent string
	 * @param scope - The user-agent token of a header line
	 * @returns Match priority (-1 on no match)
	 */
	matchScope(userAgent: string, scope: string): number;
}

/**
 * Implements the default scope matching strategy. A scope matches when its
 * token appears, ignoring case, anywhere in the caller's user-agent, so
 * "Mozilla/5.0 (compatible; Googlebot/2.1)" matches a "googlebot" scope.
 * The token length is returned as the match priority, which makes
 * "googlebot-news" win over "googlebot" for a Googlebot-News crawler.
 */
export class LongestMatchUserAgentStrategy implements UserAgentMatchStrategy {
	public matchScope(userAgent: string, scope: string): number {
		if (scope.length === 0) return K_NO_MATCH_PRIORITY;
		return userAgent.toLowerCase().includes(scope.toLowerCase())
			? scope.length
			: K_NO_MATCH_PRIORITY;
	}
}
