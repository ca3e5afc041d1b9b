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

import { request, type Dispatcher } from "undici";
import {
	K_DEFAULT_BODY_TIMEOUT,
	K_DEFAULT_HEADERS_TIMEOUT,
} from "./constants.js";
import { HeaderFetchError } from "./errors.js";

/**
 * Options for fetching response headers.
 */
export interface FetchHeadersOptions {
	/** Sent as the User-Agent request header. */
	userAgent?: string;
	/** undici dispatcher to send the request through. */
	dispatcher?: Dispatcher;
	/** Milliseconds to wait for the response headers. */
	headersTimeout?: number;
	/** Milliseconds to wait between body chunks while draining. */
	bodyTimeout?: number;
}

/**
 * Flatten a status code and header map into raw header lines. Repeated
 * headers produce one line per value.
 */
export function toHeaderLines(
	statusCode: number,
	headers: Record<string, string | string[] | undefined>,
): string[] {
	const lines = [`HTTP/1.1 ${statusCode}`];
	for (const [name, value] of Object.entries(headers)) {
		if (value === undefined) continue;
		const values = Array.isArray(value) ? value : [value];
		for (const entry of values) {
			lines.push(`${name}: ${entry}`);
		}
	}
	return lines;
}

/**
 * GET a URL and return its response as raw header lines, status line
 * first. The body is drained and discarded. Redirects are not followed.
 *
 * @throws HeaderFetchError when the request fails
 */
export async function fetchHeaderLines(
	url: string,
	options: FetchHeadersOptions = {},
): Promise<string[]> {
	let response: Dispatcher.ResponseData;
	try {
		response = await request(url, {
			method: "GET",
			headers:
				options.userAgent === undefined
					? undefined
					: { "user-agent": options.userAgent },
			dispatcher: options.dispatcher,
			headersTimeout: options.headersTimeout ?? K_DEFAULT_HEADERS_TIMEOUT,
			bodyTimeout: options.bodyTimeout ?? K_DEFAULT_BODY_TIMEOUT,
		});
		await response.body.dump();
	} catch (err) {
		throw new HeaderFetchError(url, err);
	}
	return toHeaderLines(response.statusCode, response.headers);
}
