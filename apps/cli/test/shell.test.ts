import { PassThrough } from "node:stream"
import { createInterface } from "node:readline"
import {
	buildGraph,
	type Clock,
	encodeWeight,
	HeuristicTable,
	Router,
} from "@trailhead/router"
import { describe, expect, it } from "vitest"
import { formatLocations } from "../src/render"
import { createConsoleIO, Shell, type ShellIO } from "../src/shell"

/**
 * ShellIO that answers prompts from a script and records everything shown.
 */
class ScriptedIO implements ShellIO {
	readonly screen: string[] = []

	constructor(private readonly answers: (string | undefined)[]) {}

	ask(prompt: string): Promise<string | undefined> {
		this.screen.push(`? ${prompt}`)
		return Promise.resolve(this.answers.shift())
	}

	write(lines: string[]) {
		this.screen.push(...lines)
	}

	clear() {
		this.screen.push("<clear>")
	}
}

function steppedClock(readings: number[]): Clock {
	let index = 0
	return () => readings[index++] ?? 0
}

function createRouter() {
	const graph = buildGraph(
		(
			[
				["S", "X", 2.0],
				["X", "G", 2.0],
				["S", "Y", 1.0],
				["Y", "G", 5.0],
			] as const
		).map(([from, to, distance]) => ({ from, to, weight: encodeWeight(distance) })),
	)
	const heuristics = new HeuristicTable()
		.set("S", "G", 40)
		.set("X", "G", 20)
		.set("Y", "G", 20)
	return new Router(graph, heuristics, {}, steppedClock([0, 0.012, 1, 1.5]))
}

const MENU = [
	"<clear>",
	"Your Locations:",
	"",
	...formatLocations(["S", "X", "G", "Y"]),
	"--",
	"What city are you starting at?",
	'Type "Quit" at any time to exit.',
	"?   >> ",
]

describe("Shell", () => {
	it("lists locations in first-mention order", () => {
		expect(MENU[3]).toBe(
			`${"S".padEnd(15)}${"X".padEnd(15)}${"G".padEnd(15)}Y`,
		)
	})

	it("quits at the first prompt, in any case", async () => {
		const io = new ScriptedIO([" QuIt "])
		await new Shell(createRouter(), io).run()
		expect(io.screen).toEqual(MENU)
	})

	it("quits at the destination prompt", async () => {
		const io = new ScriptedIO(["S", "quit"])
		await new Shell(createRouter(), io).run()
		expect(io.screen).toEqual([...MENU, "What city are you going to?", "?   >> "])
	})

	it("stops when input ends", async () => {
		const io = new ScriptedIO([])
		await new Shell(createRouter(), io).run()
		expect(io.screen).toEqual(MENU)
	})

	it("compares both searches and loops back to the menu", async () => {
		const io = new ScriptedIO(["S", " G ", ""])
		await new Shell(createRouter(), io).run()
		expect(io.screen).toEqual([
			...MENU,
			"What city are you going to?",
			"?   >> ",
			"<clear>",
			"",
			"Running A* algorithm...",
			"4 nodes considered",
			"Take S to X: 2.0 mi.",
			"Take X to G: 2.0 mi.",
			"Total distance: 4.0 mi.",
			"",
			"Running Dijkstra algorithm...",
			"4 nodes considered",
			"Total distance: 4.0 mi.",
			"--",
			"A* time to compute: 12 micros.",
			"Dijkstra time to compute: 500 micros.",
			"",
			"? Press ENTER to continue...",
			...MENU,
		])
	})

	it("reports an unknown location once", async () => {
		const io = new ScriptedIO(["S", "Nowhere"])
		await new Shell(createRouter(), io).run()
		expect(io.screen.slice(MENU.length + 2)).toEqual([
			"<clear>",
			"",
			'Cannot route: unknown location(s) "Nowhere".',
			"",
			"? Press ENTER to continue...",
		])
	})
})

describe("createConsoleIO", () => {
	it("reads lines and writes prompts to the output", async () => {
		const input = new PassThrough()
		const output = new PassThrough()
		output.setEncoding("utf8")

		const rl = createInterface({ input, terminal: false })
		const io = createConsoleIO(rl, output)
		input.end("Ashby\n")

		expect(await io.ask("> ")).toBe("Ashby")
		io.write(["one", "two"])
		io.clear()
		expect(await io.ask("> ")).toBeUndefined()
		rl.close()

		expect(output.read()).toBe("> one\ntwo\n> ")
	})
})
