import { BinaryHeap } from "../binary-heap"
import {
	isRouterError,
	PathInvariantError,
	type RouterError,
	UnknownNodeError,
	UnreachableError,
} from "../errors"
import type { RoadGraph } from "../graph"
import type { HeuristicTable } from "../heuristic"
import type {
	HeuristicFn,
	NodeLabel,
	SearchResult,
	SearchStatus,
	Weight,
} from "../types"

/** Search outcome in node indexes. */
export interface IndexPath {
	nodeIndexes: number[]
	distance: Weight
	expanded: number
}

/**
 * Best-first shortest path search ordered by `dist + heuristic`.
 *
 * When the heuristic returns 0 for all nodes this is Dijkstra's algorithm.
 * With an admissible heuristic the first pop of `end` is optimal. Nodes may
 * be expanded again if a cheaper path to them turns up later.
 *
 * Returns null when `end` cannot be reached from `start`.
 */
export function shortestPath(
	graph: RoadGraph,
	start: number,
	end: number,
	heuristic: HeuristicFn,
): IndexPath | null {
	const gScore = new Map<number, Weight>() // Best known distance to reach node
	const fScore = new Map<number, Weight>() // Priority the node was last queued with
	const previous = new Map<number, number>() // How we reached each node
	const heap = new BinaryHeap()
	let expanded = 0

	const enqueue = (nodeIndex: number, g: Weight) => {
		const f = g + heuristic(nodeIndex)
		fScore.set(nodeIndex, f)
		heap.push(nodeIndex, f)
	}

	gScore.set(start, 0)
	enqueue(start, 0)

	while (heap.size > 0) {
		const { item: current, priority } = heap.pop()!

		// Stale entry
		if (priority !== fScore.get(current)) continue
		expanded++

		if (current === end) {
			return {
				nodeIndexes: reconstructPath(previous, start, end, graph.size),
				distance: gScore.get(end)!,
				expanded,
			}
		}

		const currentG = gScore.get(current)!

		for (const edge of graph.getEdges(current)) {
			const neighbor = edge.targetNodeIndex
			const tentativeG = currentG + edge.weight
			const existingG = gScore.get(neighbor)

			if (existingG === undefined || tentativeG < existingG) {
				gScore.set(neighbor, tentativeG)
				previous.set(neighbor, current)
				enqueue(neighbor, tentativeG)
			}
		}
	}

	return null
}

/**
 * Walk predecessors back from `end` and reverse. The walk is bounded by the
 * node count; running past it means the predecessor map has a cycle.
 */
export function reconstructPath(
	previous: Map<number, number>,
	start: number,
	end: number,
	nodeCount: number,
): number[] {
	const path: number[] = [end]
	let current = end

	for (let steps = 0; ; steps++) {
		if (steps > nodeCount) {
			throw new PathInvariantError(
				`Predecessor walk from node ${end} exceeded ${nodeCount} steps`,
			)
		}
		const prev = previous.get(current)
		if (prev === undefined) break
		path.push(prev)
		current = prev
	}

	if (current !== start) {
		throw new PathInvariantError(
			`Predecessor walk ended at node ${current}, expected start node ${start}`,
		)
	}

	return path.reverse()
}

/**
 * Find the shortest route between two labeled nodes.
 *
 * With a heuristic table this is A*, ordered by `dist + h(node, goal)`.
 * Without one it is Dijkstra, ordered by `dist`.
 *
 * @throws UnknownNodeError when start or goal is not in the graph.
 * @throws UnreachableError when no path connects them.
 * @throws MissingHeuristicError when the table lacks an estimate the search needs.
 */
export function search(
	graph: RoadGraph,
	heuristics: HeuristicTable | undefined,
	start: NodeLabel,
	goal: NodeLabel,
): SearchResult {
	const startIndex = graph.indexOf(start)
	const goalIndex = graph.indexOf(goal)
	if (startIndex === undefined || goalIndex === undefined) {
		const unknown = [start, goal].filter((label) => !graph.containsNode(label))
		throw new UnknownNodeError([...new Set(unknown)])
	}

	const heuristic: HeuristicFn = heuristics
		? (nodeIndex) => heuristics.estimate(graph.labelOf(nodeIndex), goal)
		: () => 0

	const found = shortestPath(graph, startIndex, goalIndex, heuristic)
	if (!found) throw new UnreachableError(start, goal)

	return {
		path: found.nodeIndexes.map((nodeIndex) => graph.labelOf(nodeIndex)),
		distance: found.distance,
		expanded: found.expanded,
	}
}

/**
 * A single search with an observable lifecycle:
 * `idle → running → done | failed`. A run cannot be restarted.
 *
 * @example
 * ```ts
 * const run = new SearchRun(graph, table, "Ashby", "Harwick")
 * run.run()
 * run.status // "done"
 * ```
 */
export class SearchRun {
	private state: SearchStatus = "idle"
	private outcome: SearchResult | undefined
	private failure: RouterError | undefined

	constructor(
		readonly graph: RoadGraph,
		readonly heuristics: HeuristicTable | undefined,
		readonly start: NodeLabel,
		readonly goal: NodeLabel,
	) {}

	get status(): SearchStatus {
		return this.state
	}

	get result(): SearchResult | undefined {
		return this.outcome
	}

	get error(): RouterError | undefined {
		return this.failure
	}

	run(): SearchResult {
		if (this.state !== "idle") {
			throw Error(`Search from "${this.start}" to "${this.goal}" already ${this.state}`)
		}
		this.state = "running"
		try {
			this.outcome = search(this.graph, this.heuristics, this.start, this.goal)
			this.state = "done"
			return this.outcome
		} catch (error) {
			this.state = "failed"
			if (isRouterError(error)) this.failure = error
			throw error
		}
	}
}
