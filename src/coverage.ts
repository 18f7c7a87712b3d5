/**
 * Static coverage analysis for a command's pattern list.
 *
 * Patterns are tried in declaration order, so an earlier pattern that accepts
 * every input a later one accepts makes the later one dead code. This module
 * detects such pairs; it is a lint and never blocks registration.
 *
 * @example
 * ```typescript
 * const patterns = ["go <dir:str>", "go home"].map(
 *   (source) => new CommandPattern(source, types)
 * );
 * findCoverage("go", patterns);
 * // [{ command: "go", pattern: "go home", coveredBy: "go <dir:str>", ... }]
 * ```
 *
 * @module coverage
 */

import { DEFAULT_ARGUMENT_TYPE } from "./argument-type.js";
import type { CommandPattern, PatternElement } from "./pattern.js";

export interface CoverageWarning {
	command: string;
	/** The unreachable pattern */
	pattern: string;
	/** The earlier pattern that shadows it */
	coveredBy: string;
	/** 0-based index of `pattern` */
	patternIndex: number;
	/** 0-based index of `coveredBy` */
	coveredByIndex: number;
}

/**
 * Whether the element at one position of `earlier` accepts everything the
 * element at the same position of `later` accepts.
 */
function elementCovers(later: PatternElement, earlier: PatternElement): boolean {
	if (later.kind === "literal") {
		if (earlier.kind === "literal") return later.word === earlier.word;
		return earlier.type.isValid(later.word);
	}
	if (earlier.kind === "literal") return false;
	if (
		later.type.name !== earlier.type.name &&
		earlier.type.name !== DEFAULT_ARGUMENT_TYPE
	) {
		return false;
	}
	// an optional slot may skip its token and shift the alignment
	return later.optional || !earlier.optional;
}

/**
 * Whether pattern `earlier` shadows pattern `later`.
 *
 * `earlier` must be at least as long, cover `later` element by element, and
 * only have optional slots past `later`'s length.
 */
export function isCoveredBy(
	later: readonly PatternElement[],
	earlier: readonly PatternElement[]
): boolean {
	if (earlier.length < later.length) return false;
	for (let i = 0; i < later.length; i++) {
		if (!elementCovers(later[i], earlier[i])) return false;
	}
	return earlier
		.slice(later.length)
		.every((element) => element.kind === "slot" && element.optional);
}

/**
 * Find every pattern shadowed by an earlier pattern of the same command.
 */
export function findCoverage(
	command: string,
	patterns: readonly CommandPattern[]
): CoverageWarning[] {
	const warnings: CoverageWarning[] = [];
	for (let i = 1; i < patterns.length; i++) {
		for (let j = 0; j < i; j++) {
			if (patterns[i].isCoveredBy(patterns[j])) {
				warnings.push({
					command,
					pattern: patterns[i].source,
					coveredBy: patterns[j].source,
					patternIndex: i,
					coveredByIndex: j,
				});
			}
		}
	}
	return warnings;
}

/**
 * Human-readable form of a warning, 1-based like the patterns a reader sees.
 */
export function formatCoverageWarning(warning: CoverageWarning): string {
	return (
		`Pattern ${warning.coveredByIndex + 1} ('${warning.coveredBy}') fully covers ` +
		`pattern ${warning.patternIndex + 1} ('${warning.pattern}') of command '${warning.command}'`
	);
}
