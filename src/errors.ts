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
 * Thrown when a directive is looked up by a name outside the supported set.
 */
export class UnknownDirectiveError extends Error {
	public readonly directive: string;

	constructor(directive: string) {
		super(`Unknown directive: "${directive}"`);
		this.name = "UnknownDirectiveError";
		this.directive = directive;
	}
}

/**
 * Thrown when the response headers for a URL could not be retrieved.
 */
export class HeaderFetchError extends Error {
	public readonly url: string;

	constructor(url: string, cause: unknown) {
		const reason = cause instanceof Error ? cause.message : String(cause);
		super(`Unable to fetch HTTP headers for ${url}: ${reason}`, { cause });
		this.name = "HeaderFetchError";
		this.url = url;
	}
}
