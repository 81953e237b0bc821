/**
 * Error types raised while loading inputs and searching routes.
 *
 * Every error carries a `code` so hosts can branch on the kind without
 * `instanceof` chains.
 *
 * @module
 */

import type { NodeLabel } from "./types"

export type RouterErrorCode =
	| "INVALID_WEIGHT"
	| "MALFORMED_LINE"
	| "UNKNOWN_NODE"
	| "MISSING_HEURISTIC"
	| "UNREACHABLE"
	| "INVALID_HEURISTIC"
	| "PATH_INVARIANT"

export class RouterError extends Error {
	readonly code: RouterErrorCode

	constructor(code: RouterErrorCode, message: string) {
		super(message)
		this.name = new.target.name
		this.code = code
	}
}

/** A distance that is negative, non-finite, or too large to encode. */
export class InvalidWeightError extends RouterError {
	constructor(
		readonly value: number,
		readonly lineNumber?: number,
	) {
		super(
			"INVALID_WEIGHT",
			lineNumber === undefined
				? `Invalid distance: ${value}`
				: `Line ${lineNumber}: invalid distance: ${value}`,
		)
	}
}

/** An input line that does not have the expected shape. */
export class MalformedLineError extends RouterError {
	constructor(
		readonly lineNumber: number,
		readonly line: string,
		reason: string,
	) {
		super("MALFORMED_LINE", `Line ${lineNumber}: ${reason}: "${line}"`)
	}
}

/** A search endpoint that is not in the graph. */
export class UnknownNodeError extends RouterError {
	constructor(readonly labels: NodeLabel[]) {
		super(
			"UNKNOWN_NODE",
			`Cannot route: unknown location(s) ${labels.map((l) => `"${l}"`).join(", ")}.`,
		)
	}
}

/** A heuristic lookup that has no entry in the table. */
export class MissingHeuristicError extends RouterError {
	constructor(
		readonly node: NodeLabel,
		readonly goal: NodeLabel,
	) {
		super("MISSING_HEURISTIC", `No heuristic estimate from "${node}" to "${goal}".`)
	}
}

/** The frontier emptied before the goal was reached. */
export class UnreachableError extends RouterError {
	constructor(
		readonly start: NodeLabel,
		readonly goal: NodeLabel,
	) {
		super("UNREACHABLE", `Route could not be completed from "${start}" to "${goal}".`)
	}
}

/** Heuristic data that breaks a table invariant. */
export class InvalidHeuristicError extends RouterError {
	constructor(message: string) {
		super("INVALID_HEURISTIC", message)
	}
}

/** Predecessor walk did not lead back to the start. Indicates a relaxation bug. */
export class PathInvariantError extends RouterError {
	constructor(message: string) {
		super("PATH_INVARIANT", message)
	}
}

export function isRouterError(value: unknown): value is RouterError {
	return value instanceof RouterError
}
