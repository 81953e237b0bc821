import {
	formatWeight,
	type RouteComparison,
	type RouteLeg,
	type TimedOutcome,
} from "@trailhead/router"
import { LOCATION_COLUMNS, LOCATION_COLUMN_WIDTH } from "./settings"

/**
 * Lay out location names in fixed-width columns.
 */
export function formatLocations(
	labels: string[],
	columns = LOCATION_COLUMNS,
	width = LOCATION_COLUMN_WIDTH,
): string[] {
	const rows: string[] = []
	for (let i = 0; i < labels.length; i += columns) {
		const row = labels
			.slice(i, i + columns)
			.map((label) => label.padEnd(width))
			.join("")
		rows.push(row.trimEnd())
	}
	return rows
}

export function formatLeg(leg: RouteLeg): string {
	return `Take ${leg.from} to ${leg.to}: ${formatWeight(leg.weight)} mi.`
}

/**
 * Lines for one search outcome. Legs are listed when given.
 */
export function formatOutcome(
	title: string,
	outcome: TimedOutcome,
	legs?: RouteLeg[],
): string[] {
	const lines = [`Running ${title} algorithm...`]
	if (!outcome.ok) {
		lines.push(outcome.error.message)
		return lines
	}
	lines.push(`${outcome.result.expanded} nodes considered`)
	if (legs) lines.push(...legs.map(formatLeg))
	lines.push(`Total distance: ${formatWeight(outcome.result.distance)} mi.`)
	return lines
}

/**
 * Lines for an A* vs Dijkstra comparison. The A* route is listed leg by leg.
 * An unknown location fails both searches the same way and is reported once.
 */
export function formatComparison(
	comparison: RouteComparison,
	legs: (path: string[]) => RouteLeg[],
): string[] {
	const { astar, dijkstra } = comparison
	if (
		!astar.ok &&
		!dijkstra.ok &&
		astar.error.code === "UNKNOWN_NODE" &&
		dijkstra.error.code === "UNKNOWN_NODE"
	) {
		return [astar.error.message]
	}

	return [
		...formatOutcome("A*", astar, astar.ok ? legs(astar.result.path) : undefined),
		"",
		...formatOutcome("Dijkstra", dijkstra),
		"--",
		`A* time to compute: ${astar.micros} micros.`,
		`Dijkstra time to compute: ${dijkstra.micros} micros.`,
	]
}
