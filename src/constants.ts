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
 * Header name carrying the rules, compared case-insensitively.
 */
export const HEADER_RULE_IDENTIFIER = "x-robots-tag";

/**
 * The default scope: rules without a user-agent prefix apply to every agent.
 */
export const USER_AGENT_DEFAULT = "";

/**
 * Maximum length of a single header line. Servers commonly cap a header
 * field at 8 KiB; anything past this is cut off before scanning.
 */
export const K_MAX_HEADER_LEN = 8192;

/**
 * Indicates no match in user-agent scope matching.
 */
export const K_NO_MATCH_PRIORITY = -1;

/**
 * Two-digit years below this value belong to the 21st century (RFC 850 dates).
 */
export const K_TWO_DIGIT_YEAR_PIVOT = 70;

/**
 * Time to wait for response headers when fetching them (milliseconds).
 */
export const K_DEFAULT_HEADERS_TIMEOUT = 10_000;

/**
 * Time to wait between body chunks while draining a fetched response.
 */
export const K_DEFAULT_BODY_TIMEOUT = 10_000;

/**
 * Warning code emitted when a URL handed to the parser does not validate.
 */
export const K_INVALID_URL_WARNING = "XROBOTS_INVALID_URL";

/**
 * Hexadecimal digits for percent-encoding.
 */
export const K_HEX_DIGITS = "0123456789ABCDEF";
