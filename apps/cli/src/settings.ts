import { fileURLToPath } from "node:url"

/** Typed at either prompt to exit. Compared case-insensitively. */
export const QUIT_COMMAND = "quit"
export const PROMPT = "  >> "
export const CONTINUE_PROMPT = "Press ENTER to continue..."

export const LOCATION_COLUMNS = 5
export const LOCATION_COLUMN_WIDTH = 15

export const DEFAULT_ROUTES_PATH = fileURLToPath(
	new URL("../data/routes.txt", import.meta.url),
)
export const DEFAULT_HEURISTICS_PATH = fileURLToPath(
	new URL("../data/euclidian.txt", import.meta.url),
)

export interface Settings {
	routesPath: string
	heuristicsPath: string
	/** Suppress load progress logging. */
	quiet: boolean
}

/**
 * Resolve settings from environment variables, falling back to the bundled
 * sample data.
 *
 * - `TRAILHEAD_ROUTES`: routes file path
 * - `TRAILHEAD_HEURISTICS`: heuristic file path
 * - `TRAILHEAD_QUIET`: `1` or `true` to silence loading messages
 */
export function resolveSettings(
	env: Record<string, string | undefined>,
): Settings {
	const quiet = env["TRAILHEAD_QUIET"]?.toLowerCase()
	return {
		routesPath: env["TRAILHEAD_ROUTES"] || DEFAULT_ROUTES_PATH,
		heuristicsPath: env["TRAILHEAD_HEURISTICS"] || DEFAULT_HEURISTICS_PATH,
		quiet: quiet === "1" || quiet === "true",
	}
}
