import { describe, expect, it, vi } from "vitest"
import { assertValue, at } from "../src/assert"
import { ignoreProgress, logProgress, progress } from "../src/progress"

describe("assertValue", () => {
	it("passes for defined values including falsy ones", () => {
		expect(() => assertValue(0)).not.toThrow()
		expect(() => assertValue("")).not.toThrow()
		expect(() => assertValue(false)).not.toThrow()
	})

	it("throws for null and undefined", () => {
		expect(() => assertValue(undefined)).toThrow("Value is undefined or null")
		expect(() => assertValue(null, "missing slot")).toThrow("missing slot")
	})
})

describe("at", () => {
	it("reads present slots of typed arrays", () => {
		expect(at(new Uint32Array([4, 5, 6]), 2)).toBe(6)
	})

	it("throws past the end", () => {
		expect(() => at([1, 2], 2)).toThrow("Index 2 out of bounds (length 2)")
	})
})

describe("progress", () => {
	it("stamps messages with the current time", () => {
		vi.spyOn(Date, "now").mockReturnValue(1234)
		expect(progress("Reading routes")).toEqual({
			msg: "Reading routes",
			timestamp: 1234,
		})
		vi.restoreAllMocks()
	})

	it("logs the message to the console", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {})
		logProgress(progress("Loaded 3 nodes"))
		expect(log).toHaveBeenCalledWith("Loaded 3 nodes")
		log.mockRestore()
	})

	it("can discard updates", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => {})
		ignoreProgress(progress("quiet"))
		expect(log).not.toHaveBeenCalled()
		log.mockRestore()
	})
})
