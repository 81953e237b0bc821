import { describe, expect, it } from "vitest"
import { MissingHeuristicError, UnknownNodeError } from "../src/errors"
import { HeuristicTable } from "../src/heuristic"
import { type Clock, Router } from "../src/router"
import { graphOf, tableOf } from "./helpers"

/**
 * Clock that steps through fixed millisecond readings.
 */
function steppedClock(readings: number[]): Clock {
	let index = 0
	return () => readings[index++] ?? 0
}

function createRouter(clock?: Clock) {
	const graph = graphOf([
		["S", "X", 2.0],
		["X", "G", 2.0],
		["S", "Y", 1.0],
		["Y", "G", 5.0],
		["P", "Q", 1.0],
	])
	const heuristics = tableOf([
		["S", "G", 4],
		["X", "G", 2],
		["Y", "G", 2],
	])
	return new Router(graph, heuristics, {}, clock)
}

describe("Router", () => {
	it("routes with A* by default", () => {
		const router = createRouter()
		expect(router.route("S", "G")).toEqual({
			path: ["S", "X", "G"],
			distance: 40,
			expanded: 4,
		})
	})

	it("honours a default mode from options", () => {
		const graph = graphOf([["A", "B", 1.0]])
		// Empty table: A* would fail, Dijkstra does not consult it
		const router = new Router(graph, new HeuristicTable(), { mode: "dijkstra" })

		expect(router.route("A", "B").distance).toBe(10)
		expect(() => router.route("A", "B", { mode: "astar" })).toThrow(
			MissingHeuristicError,
		)
	})

	it("throws router errors from route()", () => {
		expect(() => createRouter().route("S", "Nowhere")).toThrow(UnknownNodeError)
	})

	it("breaks a path into legs", () => {
		const router = createRouter()
		expect(router.legs(["S", "X", "G"])).toEqual([
			{ from: "S", to: "X", weight: 20 },
			{ from: "X", to: "G", weight: 20 },
		])
		expect(router.legs(["S"])).toEqual([])
	})

	it("rejects legs that are not edges", () => {
		expect(() => createRouter().legs(["S", "G"])).toThrow(
			'No edge between "S" and "G"',
		)
	})
})

describe("Router.compare", () => {
	it("times both searches and reports matching paths", () => {
		const router = createRouter(steppedClock([0, 0.012, 1, 1.5]))
		const comparison = router.compare("S", "G")

		expect(comparison).toEqual({
			from: "S",
			to: "G",
			astar: {
				ok: true,
				result: { path: ["S", "X", "G"], distance: 40, expanded: 4 },
				micros: 12,
			},
			dijkstra: {
				ok: true,
				result: { path: ["S", "X", "G"], distance: 40, expanded: 4 },
				micros: 500,
			},
			samePath: true,
		})
	})

	it("reports failures of both modes symmetrically", () => {
		const comparison = createRouter(steppedClock([0, 0, 0, 0])).compare(
			"S",
			"Nowhere",
		)

		expect(comparison.samePath).toBe(false)
		expect(comparison.astar.ok).toBe(false)
		expect(comparison.dijkstra.ok).toBe(false)
		if (!comparison.astar.ok && !comparison.dijkstra.ok) {
			expect(comparison.astar.error.code).toBe("UNKNOWN_NODE")
			expect(comparison.dijkstra.error.code).toBe("UNKNOWN_NODE")
		}
	})

	it("reports unreachable goals from both modes", () => {
		const comparison = createRouter().compare("S", "Q")

		expect(comparison.astar.ok || comparison.dijkstra.ok).toBe(false)
		if (!comparison.astar.ok && !comparison.dijkstra.ok) {
			expect(comparison.astar.error.message).toBe(
				'No heuristic estimate from "S" to "Q".',
			)
			expect(comparison.dijkstra.error.code).toBe("UNREACHABLE")
		}
	})

	it("keeps going after an A* failure", () => {
		const graph = graphOf([["A", "B", 1.0]])
		const router = new Router(graph, new HeuristicTable())
		const comparison = router.compare("A", "B")

		expect(comparison.astar.ok).toBe(false)
		expect(comparison.dijkstra.ok).toBe(true)
		expect(comparison.samePath).toBe(false)
	})
})
