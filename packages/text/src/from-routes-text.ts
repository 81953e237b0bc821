/**
 * Routes text import.
 *
 * One undirected edge per line:
 *
 * ```
 * (Ashby, Calder, 8.1)
 * ```
 *
 * Surrounding parentheses are optional. Fields are comma separated and
 * trimmed. Distances are decimals encoded as fixed-point tenths.
 *
 * @module
 */

import {
	MalformedLineError,
	type RoadEdge,
	type RoadGraph,
	RoadGraphBuilder,
} from "@trailhead/router"
import { contentLines, parseDistance } from "./lines"

/**
 * Parse routes text into labeled edges, in input order.
 *
 * @throws MalformedLineError for a line without three fields or with an empty label.
 * @throws InvalidWeightError for a negative or non-finite distance.
 */
export function* parseRoutes(text: string): Generator<RoadEdge> {
	for (const line of contentLines(text)) {
		const fields = line.text
			.replace(/^[()]+|[()]+$/g, "")
			.split(",")
			.map((field) => field.trim())

		if (fields.length !== 3) {
			throw new MalformedLineError(
				line.lineNumber,
				line.text,
				`expected 3 fields, found ${fields.length}`,
			)
		}

		const [from = "", to = "", distance = ""] = fields
		if (from === "" || to === "") {
			throw new MalformedLineError(line.lineNumber, line.text, "empty location")
		}

		yield { from, to, weight: parseDistance(distance, line) }
	}
}

/**
 * Build a routing graph from routes text. Later lines replace the weight of
 * an edge given earlier.
 *
 * @example
 * ```ts
 * const graph = fromRoutesText("(Ashby, Calder, 8.1)\n(Calder, Dunmore, 15.2)\n")
 * graph.nodes() // ["Ashby", "Calder", "Dunmore"]
 * ```
 */
export function fromRoutesText(text: string): RoadGraph {
	const builder = new RoadGraphBuilder()
	for (const edge of parseRoutes(text)) {
		builder.addEdge(edge.from, edge.to, edge.weight)
	}
	return builder.build()
}
