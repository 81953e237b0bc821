/**
 * Type definitions for the routing module.
 * @module
 */

import type { RouterError } from "./errors"

/** Location name. Case-sensitive. */
export type NodeLabel = string

/** Distance in fixed-point tenths (a decimal `d` is stored as `round(d * 10)`). */
export type Weight = number

/** Available search modes. */
export type SearchMode = "astar" | "dijkstra"

/** Edge in the routing graph, addressed by dense node index. */
export interface GraphEdge {
	/** Target node index. */
	targetNodeIndex: number
	/** Edge weight in tenths. */
	weight: Weight
}

/** Neighbor of a labeled node. */
export interface Neighbor {
	label: NodeLabel
	weight: Weight
}

/** An edge given by its endpoint labels, as read from the routes input. */
export interface RoadEdge {
	from: NodeLabel
	to: NodeLabel
	weight: Weight
}

/** One step of a route, between consecutive path nodes. */
export interface RouteLeg {
	from: NodeLabel
	to: NodeLabel
	weight: Weight
}

/** Successful search outcome. */
export interface SearchResult {
	/** Labels from start to goal, inclusive. */
	path: NodeLabel[]
	/** Total path weight in tenths. */
	distance: Weight
	/** Number of nodes popped from the frontier and processed. */
	expanded: number
}

/** Lifecycle of a single search. */
export type SearchStatus = "idle" | "running" | "done" | "failed"

/** Estimate of remaining distance from a node index to the goal. */
export type HeuristicFn = (nodeIndex: number) => Weight

/** Router configuration options. */
export interface RouteOptions {
	/** Search mode. Default: "astar". */
	mode: SearchMode
}

/** Outcome of one timed search: either a result or the error it raised. */
export type TimedOutcome =
	| { ok: true; result: SearchResult; micros: number }
	| { ok: false; error: RouterError; micros: number }

/** A* and Dijkstra outcomes for the same query. */
export interface RouteComparison {
	from: NodeLabel
	to: NodeLabel
	astar: TimedOutcome
	dijkstra: TimedOutcome
	/** True when both searches succeeded with identical paths. */
	samePath: boolean
}
