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

import { copyRules } from "./directives.js";
import {
	XRobotsTagParseHandler,
	type Directive,
	type DirectiveRules,
	type DirectiveValueMap,
	type RawRuleSet,
} from "./types.js";

/**
 * Handler that folds scanned directives into a per-scope rule map.
 * Within a scope the last occurrence of a directive wins, following the
 * order of the header lines.
 */
export class RuleCollector extends XRobotsTagParseHandler {
	private rules: Map<string, DirectiveRules> = new Map();

	public handleHeadersStart(): void {
		this.rules = new Map();
	}

	public handleHeadersEnd(): void {
		// Nothing to do
	}

	public handleDirective<D extends Directive>(
		_lineNum: number,
		scope: string,
		directive: D,
		value: DirectiveValueMap[D],
	): void {
		let scopeRules = this.rules.get(scope);
		if (!scopeRules) {
			scopeRules = {};
			this.rules.set(scope, scopeRules);
		}
		scopeRules[directive] = value;
	}

	public handleUnknownDirective(
		_lineNum: number,
		_scope: string,
		_name: string,
	): void {
		// Unknown directives are skipped
	}

	/**
	 * Scopes that received at least one directive, in first-seen order.
	 */
	public scopes(): string[] {
		return Array.from(this.rules.keys());
	}

	/**
	 * Rules recorded for one scope, or undefined if the scope never appeared.
	 */
	public rulesFor(scope: string): DirectiveRules | undefined {
		return this.rules.get(scope);
	}

	/**
	 * Copy of every scope's rules as a plain object, sharing nothing with
	 * the collector.
	 */
	public toRawRuleSet(): RawRuleSet {
		// fromEntries defines own properties, so a "__proto__" scope stays data.
		return Object.fromEntries(
			Array.from(this.rules, ([scope, scopeRules]) => [
				scope,
				copyRules(scopeRules),
			]),
		);
	}
}
