/**
 * @trailhead/router - Shortest paths between named locations.
 *
 * Builds an undirected road graph from labeled edges and finds routes with
 * A* (guided by a heuristic table) or Dijkstra. Distances are fixed-point
 * tenths so every comparison in the search is exact.
 *
 * Key features:
 * - **Weight codec**: `encodeWeight` / `decodeWeight` between decimals and tenths.
 * - **Graph construction**: `RoadGraphBuilder` compacts labeled edges into CSR arrays.
 * - **Heuristic table**: ordered (node, goal) estimates with a consistency validator.
 * - **Deterministic search**: ties pop in insertion order, so repeated runs match.
 * - **Comparison**: `Router.compare` times A* and Dijkstra on the same query.
 *
 * @example
 * ```ts
 * import { buildGraph, encodeWeight, HeuristicTable, Router } from "@trailhead/router"
 *
 * const graph = buildGraph([
 *   { from: "Ashby", to: "Calder", weight: encodeWeight(8.1) },
 * ])
 * const heuristics = new HeuristicTable().set("Ashby", "Calder", encodeWeight(6.0))
 * const router = new Router(graph, heuristics)
 *
 * const result = router.route("Ashby", "Calder")
 * console.log(result.path, result.distance, result.expanded)
 * ```
 *
 * @module @trailhead/router
 */

export * from "./algorithms"
export * from "./errors"
export * from "./graph"
export * from "./heuristic"
export * from "./router"
export * from "./types"
export * from "./weight"
