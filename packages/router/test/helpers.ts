import { buildGraph, type RoadGraph } from "../src/graph"
import { HeuristicTable } from "../src/heuristic"
import { encodeWeight } from "../src/weight"

/**
 * Build a graph from `[from, to, decimalDistance]` triples.
 */
export function graphOf(edges: [string, string, number][]): RoadGraph {
	return buildGraph(
		edges.map(([from, to, distance]) => ({
			from,
			to,
			weight: encodeWeight(distance),
		})),
	)
}

/**
 * Build a heuristic table from `[node, goal, decimalDistance]` triples.
 */
export function tableOf(entries: [string, string, number][]): HeuristicTable {
	const table = new HeuristicTable()
	for (const [node, goal, distance] of entries) {
		table.set(node, goal, encodeWeight(distance))
	}
	return table
}

/**
 * Return what a function throws, or undefined if it returns.
 */
export function thrown(fn: () => unknown): unknown {
	try {
		fn()
	} catch (error) {
		return error
	}
	return undefined
}

/**
 * Square grid with labels `r{row}c{col}`. Edge weights come from a small
 * Lehmer sequence so runs are reproducible.
 */
export function gridGraph(size: number, seed = 7): RoadGraph {
	let state = seed
	const nextWeight = () => {
		state = (state * 48271) % 2147483647
		return 10 + (state % 90)
	}
	const label = (row: number, col: number) => `r${row}c${col}`
	const edges: { from: string; to: string; weight: number }[] = []
	for (let row = 0; row < size; row++) {
		for (let col = 0; col < size; col++) {
			if (col + 1 < size) {
				edges.push({ from: label(row, col), to: label(row, col + 1), weight: nextWeight() })
			}
			if (row + 1 < size) {
				edges.push({ from: label(row, col), to: label(row + 1, col), weight: nextWeight() })
			}
		}
	}
	return buildGraph(edges)
}
