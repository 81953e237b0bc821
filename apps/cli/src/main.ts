import { createInterface } from "node:readline"
import process from "node:process"
import { isRouterError, Router, validateHeuristic } from "@trailhead/router"
import { ignoreProgress, logProgress } from "@trailhead/shared/progress"
import { loadRoutingData, type RoutingData } from "@trailhead/text"
import { resolveSettings } from "./settings"
import { createConsoleIO, Shell } from "./shell"

async function load(): Promise<RoutingData | null> {
	const settings = resolveSettings(process.env)
	try {
		return await loadRoutingData(
			settings,
			settings.quiet ? ignoreProgress : logProgress,
		)
	} catch (error) {
		if (!isRouterError(error) && !isFileError(error)) throw error
		console.error(error.message)
		return null
	}
}

function isFileError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error && "path" in error
}

async function main(): Promise<void> {
	const data = await load()
	if (!data) {
		process.exitCode = 1
		return
	}

	const violations = validateHeuristic(data.graph, data.heuristics)
	if (violations.length > 0) {
		console.warn(
			`Warning: ${violations.length} heuristic estimates are missing or inconsistent; A* may expand more nodes or miss the shortest route.`,
		)
	}

	const rl = createInterface({ input: process.stdin, terminal: false })
	try {
		const shell = new Shell(
			new Router(data.graph, data.heuristics),
			createConsoleIO(rl, process.stdout),
		)
		await shell.run()
	} finally {
		rl.close()
	}
}

main().catch((error: unknown) => {
	console.error(error)
	process.exitCode = 1
})
