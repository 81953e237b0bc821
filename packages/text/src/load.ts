import { readFile } from "node:fs/promises"
import type { HeuristicTable, RoadGraph } from "@trailhead/router"
import {
	logProgress,
	type ProgressCallback,
	progress,
} from "@trailhead/shared/progress"
import { fromHeuristicText } from "./from-heuristic-text"
import { fromRoutesText } from "./from-routes-text"

export interface RoutingDataPaths {
	routesPath: string
	heuristicsPath: string
}

export interface RoutingData {
	graph: RoadGraph
	heuristics: HeuristicTable
}

/**
 * Read and parse the routes and heuristic files.
 *
 * Parse errors propagate unchanged; nothing is partially loaded.
 *
 * @param onProgress - Progress callback. Default: log to the console.
 */
export async function loadRoutingData(
	{ routesPath, heuristicsPath }: RoutingDataPaths,
	onProgress: ProgressCallback = logProgress,
): Promise<RoutingData> {
	onProgress(progress(`Reading routes from ${routesPath}...`))
	const graph = fromRoutesText(await readFile(routesPath, "utf8"))
	onProgress(
		progress(`Loaded ${graph.size} locations and ${graph.edges} roads.`),
	)

	onProgress(progress(`Reading heuristics from ${heuristicsPath}...`))
	const heuristics = fromHeuristicText(await readFile(heuristicsPath, "utf8"))
	onProgress(progress(`Loaded ${heuristics.size} heuristic estimates.`))

	return { graph, heuristics }
}
