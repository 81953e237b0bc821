/**
 * @trailhead/text - Read routes and heuristic tables from plain text.
 *
 * @example
 * ```ts
 * import { loadRoutingData } from "@trailhead/text"
 *
 * const { graph, heuristics } = await loadRoutingData({
 *   routesPath: "routes.txt",
 *   heuristicsPath: "euclidian.txt",
 * })
 * ```
 *
 * @module @trailhead/text
 */

export * from "./from-heuristic-text"
export * from "./from-routes-text"
export * from "./lines"
export * from "./load"
