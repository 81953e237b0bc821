/**
 * Heuristic distance table.
 *
 * Maps ordered (node, goal) pairs to a lower bound on the remaining distance.
 * A* reads estimates from here; a lookup miss is a data error and is raised,
 * never read as 0.
 *
 * @module
 */

import { InvalidHeuristicError, InvalidWeightError, MissingHeuristicError } from "./errors"
import type { RoadGraph } from "./graph"
import type { NodeLabel, Weight } from "./types"
import { isWeight } from "./weight"

/**
 * Ordered table of heuristic estimates. `(a, b)` and `(b, a)` are separate
 * entries.
 */
export class HeuristicTable {
	private readonly estimates = new Map<NodeLabel, Map<NodeLabel, Weight>>()
	private entryCount = 0

	/**
	 * Set the estimate from `node` to `goal`. A node's estimate to itself
	 * must be 0.
	 */
	set(node: NodeLabel, goal: NodeLabel, weight: Weight): this {
		if (!isWeight(weight)) throw new InvalidWeightError(weight)
		if (node === goal && weight !== 0) {
			throw new InvalidHeuristicError(
				`Estimate from "${node}" to itself must be 0, got ${weight}.`,
			)
		}
		let goals = this.estimates.get(node)
		if (!goals) {
			goals = new Map()
			this.estimates.set(node, goals)
		}
		if (!goals.has(goal)) this.entryCount++
		goals.set(goal, weight)
		return this
	}

	has(node: NodeLabel, goal: NodeLabel): boolean {
		return this.estimates.get(node)?.has(goal) ?? false
	}

	/**
	 * Lower-bound estimate from `node` to `goal`. Zero when they are equal.
	 *
	 * @throws MissingHeuristicError when the table has no entry for the pair.
	 */
	estimate(node: NodeLabel, goal: NodeLabel): Weight {
		if (node === goal) return 0
		const weight = this.estimates.get(node)?.get(goal)
		if (weight === undefined) throw new MissingHeuristicError(node, goal)
		return weight
	}

	/**
	 * Number of stored entries.
	 */
	get size(): number {
		return this.entryCount
	}
}

/**
 * The `h ≡ 0` table over every ordered pair of graph nodes. A* over this
 * table expands exactly what Dijkstra expands.
 */
export function zeroHeuristic(graph: RoadGraph): HeuristicTable {
	const table = new HeuristicTable()
	const nodes = graph.nodes()
	for (const node of nodes) {
		for (const goal of nodes) table.set(node, goal, 0)
	}
	return table
}

export type HeuristicViolation =
	| { kind: "missing"; node: NodeLabel; goal: NodeLabel }
	| {
			kind: "inconsistent"
			node: NodeLabel
			neighbor: NodeLabel
			goal: NodeLabel
			/** h(node, goal) */
			estimate: Weight
			/** w(node, neighbor) + h(neighbor, goal) */
			bound: Weight
	  }

/**
 * Check `h(u, g) <= w(u, v) + h(v, g)` for every edge direction and every
 * goal. Reports violations without changing the table.
 *
 * @param goals - Goals to check. Default: every graph node.
 */
export function validateHeuristic(
	graph: RoadGraph,
	table: HeuristicTable,
	goals: Iterable<NodeLabel> = graph.nodes(),
): HeuristicViolation[] {
	const violations: HeuristicViolation[] = []
	const lookup = (node: NodeLabel, goal: NodeLabel): Weight | undefined =>
		node === goal || table.has(node, goal) ? table.estimate(node, goal) : undefined

	for (const goal of goals) {
		for (const node of graph.nodes()) {
			const estimate = lookup(node, goal)
			if (estimate === undefined) {
				violations.push({ kind: "missing", node, goal })
				continue
			}
			for (const { label: neighbor, weight } of graph.neighbors(node)) {
				const neighborEstimate = lookup(neighbor, goal)
				// Reported once under the neighbor's own iteration
				if (neighborEstimate === undefined) continue
				const bound = weight + neighborEstimate
				if (estimate > bound) {
					violations.push({
						kind: "inconsistent",
						node,
						neighbor,
						goal,
						estimate,
						bound,
					})
				}
			}
		}
	}

	return violations
}
