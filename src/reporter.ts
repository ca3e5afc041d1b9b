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

import {
	XRobotsTagName,
	XRobotsTagParseHandler,
	createParsedHeaderReport,
	type Directive,
	type DirectiveValueMap,
	type LineMetadata,
	type ParsedHeaderReport,
} from "./types.js";

/**
 * XRobotsTagParsingReporter - A parse handler that collects detailed
 * information about each header line.
 *
 * This is useful for analysis, debugging, or building tools that provide
 * feedback about the X-Robots-Tag headers a site sends.
 */
export class XRobotsTagParsingReporter extends XRobotsTagParseHandler {
	/** Indexed and sorted by line number */
	private parseResultsByLine: Map<number, ParsedHeaderReport> = new Map();
	private lastLineSeenValue: number = 0;
	private validDirectivesValue: number = 0;
	private unknownDirectivesValue: number = 0;

	/**
	 * Get the last line number seen during parsing.
	 */
	public lastLineSeen(): number {
		return this.lastLineSeenValue;
	}

	/**
	 * Get the count of recognized directives found.
	 */
	public validDirectives(): number {
		return this.validDirectivesValue;
	}

	/**
	 * Get the count of skipped, unrecognized directives.
	 */
	public unknownDirectives(): number {
		return this.unknownDirectivesValue;
	}

	/**
	 * Get the parse results as an array sorted by line number.
	 */
	public parseResults(): ParsedHeaderReport[] {
		const sortedKeys = Array.from(this.parseResultsByLine.keys()).sort(
			(a, b) => a - b,
		);
		const results: ParsedHeaderReport[] = [];
		for (const key of sortedKeys) {
			const line = this.parseResultsByLine.get(key);
			if (line) {
				results.push(line);
			}
		}
		return results;
	}

	private lineReport(lineNum: number): ParsedHeaderReport {
		if (lineNum > this.lastLineSeenValue) {
			this.lastLineSeenValue = lineNum;
		}

		let line = this.parseResultsByLine.get(lineNum);
		if (!line) {
			line = createParsedHeaderReport();
			line.lineNum = lineNum;
			this.parseResultsByLine.set(lineNum, line);
		}
		return line;
	}

	public handleHeadersStart(): void {
		this.lastLineSeenValue = 0;
		this.validDirectivesValue = 0;
		this.unknownDirectivesValue = 0;
		this.parseResultsByLine.clear();
	}

	public handleHeadersEnd(): void {
		// Nothing to do
	}

	public handleDirective<D extends Directive>(
		lineNum: number,
		scope: string,
		directive: D,
		_value: DirectiveValueMap[D],
	): void {
		const line = this.lineReport(lineNum);
		line.scope = scope;
		line.directives.push(directive);
		this.validDirectivesValue++;
	}

	public handleUnknownDirective(
		lineNum: number,
		scope: string,
		name: string,
	): void {
		const line = this.lineReport(lineNum);
		line.scope = scope;
		line.unknownDirectives.push(name);
		this.unknownDirectivesValue++;
	}

	public reportLineMetadata(lineNum: number, metadata: LineMetadata): void {
		const line = this.lineReport(lineNum);
		line.metadata = { ...metadata };
		if (!metadata.isRobotsTag) {
			line.tagName = XRobotsTagName.Ignored;
		} else if (metadata.hasDirective) {
			line.tagName = XRobotsTagName.Rule;
		} else {
			line.tagName = XRobotsTagName.Unused;
		}
	}
}
