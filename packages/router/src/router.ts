/**
 * High-level router API.
 *
 * Wraps the routing graph, heuristic table, and algorithms to run searches by
 * location name, time them, and compare A* against Dijkstra.
 *
 * @module
 */

import { dequal } from "dequal/lite"
import { routingAlgorithms } from "./algorithms"
import { isRouterError } from "./errors"
import type { RoadGraph } from "./graph"
import type { HeuristicTable } from "./heuristic"
import type {
	NodeLabel,
	RouteComparison,
	RouteLeg,
	RouteOptions,
	SearchMode,
	SearchResult,
	TimedOutcome,
} from "./types"

/** Clock returning milliseconds, `performance.now()` by default. */
export type Clock = () => number

/**
 * Router for finding paths between named locations.
 *
 * @example
 * ```ts
 * const router = new Router(graph, heuristics)
 * const comparison = router.compare("Ashby", "Harwick")
 * if (comparison.astar.ok) {
 *   for (const leg of router.legs(comparison.astar.result.path)) {
 *     console.log(`${leg.from} -> ${leg.to}`)
 *   }
 * }
 * ```
 */
export class Router {
	readonly graph: RoadGraph
	readonly heuristics: HeuristicTable
	private readonly defaults: Required<RouteOptions>
	private readonly clock: Clock

	constructor(
		graph: RoadGraph,
		heuristics: HeuristicTable,
		options: Partial<RouteOptions> = {},
		clock: Clock = () => performance.now(),
	) {
		this.graph = graph
		this.heuristics = heuristics
		this.defaults = {
			mode: options.mode ?? "astar",
		}
		this.clock = clock
	}

	/**
	 * Find a route between two locations.
	 * Throws a RouterError when the search fails.
	 */
	route(
		from: NodeLabel,
		to: NodeLabel,
		options: Partial<RouteOptions> = {},
	): SearchResult {
		const algorithm = routingAlgorithms[options.mode ?? this.defaults.mode]
		return algorithm(this.graph, this.heuristics, from, to)
	}

	/**
	 * Run one search and measure it. Router errors become failed outcomes;
	 * anything else propagates.
	 */
	timedRoute(from: NodeLabel, to: NodeLabel, mode: SearchMode): TimedOutcome {
		const started = this.clock()
		try {
			const result = this.route(from, to, { mode })
			return { ok: true, result, micros: this.elapsedMicros(started) }
		} catch (error) {
			if (!isRouterError(error)) throw error
			return { ok: false, error, micros: this.elapsedMicros(started) }
		}
	}

	/**
	 * Run A* then Dijkstra for the same query. Both outcomes are reported
	 * whether or not either search fails.
	 */
	compare(from: NodeLabel, to: NodeLabel): RouteComparison {
		const astar = this.timedRoute(from, to, "astar")
		const dijkstra = this.timedRoute(from, to, "dijkstra")
		const samePath =
			astar.ok && dijkstra.ok && dequal(astar.result.path, dijkstra.result.path)
		return { from, to, astar, dijkstra, samePath }
	}

	/**
	 * Break a path into legs between consecutive locations.
	 */
	legs(path: NodeLabel[]): RouteLeg[] {
		const legs: RouteLeg[] = []
		for (let i = 0; i < path.length - 1; i++) {
			const from = path[i]!
			const to = path[i + 1]!
			const weight = this.graph.edgeWeight(from, to)
			if (weight === undefined) {
				throw Error(`No edge between "${from}" and "${to}"`)
			}
			legs.push({ from, to, weight })
		}
		return legs
	}

	private elapsedMicros(started: number): number {
		return Math.round((this.clock() - started) * 1_000)
	}
}
