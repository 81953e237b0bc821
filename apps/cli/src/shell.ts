import type { Interface } from "node:readline"
import type { Router } from "@trailhead/router"
import { formatComparison, formatLocations } from "./render"
import { CONTINUE_PROMPT, PROMPT, QUIT_COMMAND } from "./settings"

/** Console access used by the shell. */
export interface ShellIO {
	/** Show a prompt and read one line. Undefined once input has ended. */
	ask(prompt: string): Promise<string | undefined>
	write(lines: string[]): void
	clear(): void
}

const CLEAR_SCREEN = "\x1B[2J\x1B[H"

/**
 * ShellIO over a readline interface. Screen clearing only happens when the
 * output is a terminal.
 */
export function createConsoleIO(
	rl: Interface,
	output: NodeJS.WritableStream & { isTTY?: boolean },
): ShellIO {
	const lines = rl[Symbol.asyncIterator]()
	return {
		async ask(prompt) {
			output.write(prompt)
			const next = await lines.next()
			return next.done ? undefined : next.value
		},
		write(text) {
			for (const line of text) output.write(`${line}\n`)
		},
		clear() {
			if (output.isTTY) output.write(CLEAR_SCREEN)
		},
	}
}

function isQuit(answer: string): boolean {
	return answer.trim().toLowerCase() === QUIT_COMMAND
}

/**
 * Interactive loop: list locations, read a start and destination, compare
 * A* with Dijkstra, repeat until the user quits or input ends.
 */
export class Shell {
	constructor(
		private readonly router: Router,
		private readonly io: ShellIO,
	) {}

	async run(): Promise<void> {
		while (true) {
			this.io.clear()
			this.io.write([
				"Your Locations:",
				"",
				...formatLocations(this.router.graph.nodes()),
				"--",
				"What city are you starting at?",
				`Type "Quit" at any time to exit.`,
			])
			const from = await this.io.ask(PROMPT)
			if (from === undefined || isQuit(from)) return

			this.io.write(["What city are you going to?"])
			const to = await this.io.ask(PROMPT)
			if (to === undefined || isQuit(to)) return

			this.io.clear()
			const comparison = this.router.compare(from.trim(), to.trim())
			this.io.write([
				"",
				...formatComparison(comparison, (path) => this.router.legs(path)),
				"",
			])

			if ((await this.io.ask(CONTINUE_PROMPT)) === undefined) return
		}
	}
}
