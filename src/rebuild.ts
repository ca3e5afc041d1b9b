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

import { DIRECTIVE_NAMES, type Directive, type DirectiveRules } from "./types.js";

/**
 * How merged raw rules are reconciled into effective rules.
 */
export interface RebuildPolicy {
	/**
	 * Umbrella directives and the flags they stand for. An umbrella in the
	 * input is replaced by the flags it implies.
	 */
	implies: Readonly<Partial<Record<Directive, readonly Directive[]>>>;
	/**
	 * Directives that only state the absence of restrictions. They are
	 * dropped as soon as any other directive is in effect.
	 */
	permissive: readonly Directive[];
}

/**
 * `none` is shorthand for `noindex, nofollow`; `all` is the default and
 * means nothing once a restriction is present.
 */
export const DEFAULT_REBUILD_POLICY: RebuildPolicy = {
	implies: { none: ["noindex", "nofollow"] },
	permissive: ["all"],
};

/**
 * Reconcile a merged directive map into the effective rule set. The input
 * is not modified; keys of the result follow DIRECTIVE_NAMES order.
 *
 * @param rules - Default-scope rules overlaid with the matched scope's rules
 * @param policy - Implication table to apply
 */
export function rebuild(
	rules: DirectiveRules,
	policy: RebuildPolicy = DEFAULT_REBUILD_POLICY,
): DirectiveRules {
	const expanded: DirectiveRules = { ...rules };

	for (const directive of DIRECTIVE_NAMES) {
		const implied = policy.implies[directive];
		if (implied === undefined || expanded[directive] === undefined) {
			continue;
		}
		delete expanded[directive];
		for (const flag of implied) {
			if (flag !== "unavailable_after") {
				expanded[flag] = true;
			}
		}
	}

	const inEffect = DIRECTIVE_NAMES.filter(
		(directive) => expanded[directive] !== undefined,
	);
	const hasRestriction = inEffect.some(
		(directive) => !policy.permissive.includes(directive),
	);

	const result: DirectiveRules = {};
	for (const directive of inEffect) {
		if (hasRestriction && policy.permissive.includes(directive)) {
			continue;
		}
		copyRule(expanded, result, directive);
	}
	return result;
}

function copyRule<D extends Directive>(
	from: DirectiveRules,
	to: DirectiveRules,
	directive: D,
): void {
	to[directive] = from[directive];
}
