/**
 * Heuristic text import.
 *
 * One ordered estimate per line, whitespace separated:
 *
 * ```
 * Ashby Harwick 30.2
 * ```
 *
 * @module
 */

import {
	HeuristicTable,
	InvalidHeuristicError,
	MalformedLineError,
	type NodeLabel,
	type Weight,
} from "@trailhead/router"
import { contentLines, parseDistance } from "./lines"

/** One parsed heuristic line. */
export interface HeuristicEntry {
	from: NodeLabel
	to: NodeLabel
	weight: Weight
}

/**
 * Parse heuristic text into entries, in input order.
 *
 * @throws MalformedLineError for a line without exactly three fields.
 * @throws InvalidWeightError for a negative or non-finite distance.
 * @throws InvalidHeuristicError for a non-zero estimate from a location to itself.
 */
export function* parseHeuristics(text: string): Generator<HeuristicEntry> {
	for (const line of contentLines(text)) {
		const fields = line.text.split(/\s+/)
		if (fields.length !== 3) {
			throw new MalformedLineError(
				line.lineNumber,
				line.text,
				`expected 3 fields, found ${fields.length}`,
			)
		}

		const [from = "", to = "", distance = ""] = fields
		const weight = parseDistance(distance, line)
		if (from === to && weight !== 0) {
			throw new InvalidHeuristicError(
				`Line ${line.lineNumber}: estimate from "${from}" to itself must be 0`,
			)
		}

		yield { from, to, weight }
	}
}

/**
 * Build a heuristic table from heuristic text.
 */
export function fromHeuristicText(text: string): HeuristicTable {
	const table = new HeuristicTable()
	for (const entry of parseHeuristics(text)) {
		table.set(entry.from, entry.to, entry.weight)
	}
	return table
}
