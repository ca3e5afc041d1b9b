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

import { K_HEX_DIGITS } from "./constants.js";

const SUPPORTED_SCHEMES: readonly string[] = ["http:", "https:"];

/**
 * Checks if a character is an ASCII hex digit.
 */
function isHexDigit(ch: string): boolean {
	return /^[0-9A-Fa-f]$/.test(ch);
}

/**
 * True for an absolute http(s) URL with a host. Whitespace around the URL
 * is ignored.
 */
export function isValidUrl(url: string): boolean {
	const trimmed = url.trim();
	if (!URL.canParse(trimmed)) {
		return false;
	}
	const parsed = new URL(trimmed);
	return SUPPORTED_SCHEMES.includes(parsed.protocol) && parsed.hostname !== "";
}

/**
 * Encode a URL for the request line. For example:
 *     http://example.com/SanJoséSellers ==> http://example.com/SanJos%C3%A9Sellers
 *     %aa ==> %AA
 *
 * Operations:
 * 1. Trim surrounding whitespace
 * 2. Normalize percent-encoded sequences (e.g., "%aa" → "%AA")
 * 3. Percent-encode UTF-8 octets of non-ASCII characters
 *
 * Everything else, reserved characters included, is left as is.
 */
export function encodeUrl(url: string): string {
	const src = url.trim();
	const encoder = new TextEncoder();

	let result = "";
	for (let i = 0; i < src.length; i++) {
		const ch = src[i];

		if (
			ch === "%" &&
			i + 2 < src.length &&
			isHexDigit(src[i + 1]) &&
			isHexDigit(src[i + 2])
		) {
			result += ch;
			result += src[i + 1].toUpperCase();
			result += src[i + 2].toUpperCase();
			i += 2;
		} else if (src.charCodeAt(i) > 127) {
			// Take the whole code point so surrogate pairs encode as one character.
			const codePoint = src.codePointAt(i) ?? 0;
			const char = String.fromCodePoint(codePoint);
			for (const byte of encoder.encode(char)) {
				result += "%";
				result += K_HEX_DIGITS[(byte >> 4) & 0xf];
				result += K_HEX_DIGITS[byte & 0xf];
			}
			i += char.length - 1;
		} else {
			result += ch;
		}
	}
	return result;
}
