/**
 * Routing algorithm implementations.
 *
 * Provides two algorithms over the same best-first search:
 * - `dijkstra`: Optimal shortest path, explores all directions equally.
 * - `astar`: Optimal with heuristic guidance from a HeuristicTable.
 *
 * @module
 */

import type { RoadGraph } from "../graph"
import type { HeuristicTable } from "../heuristic"
import type { NodeLabel, SearchMode, SearchResult } from "../types"
import { search } from "./shortest-path"

/** Function signature for routing algorithms. */
export type RoutingAlgorithmFn = (
	graph: RoadGraph,
	heuristics: HeuristicTable,
	start: NodeLabel,
	goal: NodeLabel,
) => SearchResult

/**
 * Dijkstra's algorithm. The heuristic table is not consulted.
 */
export const dijkstra: RoutingAlgorithmFn = (graph, _heuristics, start, goal) =>
	search(graph, undefined, start, goal)

/**
 * A* ordered by `dist + h(node, goal)`.
 */
export const astar: RoutingAlgorithmFn = (graph, heuristics, start, goal) =>
	search(graph, heuristics, start, goal)

export const routingAlgorithms: Record<SearchMode, RoutingAlgorithmFn> = {
	astar,
	dijkstra,
}

export {
	type IndexPath,
	reconstructPath,
	SearchRun,
	search,
	shortestPath,
} from "./shortest-path"
