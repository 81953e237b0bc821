import {
	encodeWeight,
	InvalidWeightError,
	MalformedLineError,
	type Weight,
} from "@trailhead/router"

/** A non-blank input line with its 1-based number. */
export interface SourceLine {
	lineNumber: number
	text: string
}

/**
 * Iterate content lines. Blank lines (including a trailing one) are skipped;
 * anything else is data.
 */
export function* contentLines(text: string): Generator<SourceLine> {
	for (const [index, raw] of text.split(/\r?\n/).entries()) {
		const trimmed = raw.trim()
		if (trimmed === "") continue
		yield { lineNumber: index + 1, text: trimmed }
	}
}

/** Optional sign, digits, optional fraction. */
const DECIMAL = /^[+-]?\d+(\.\d+)?$/

/**
 * Parse a plain decimal distance field and encode it as tenths.
 */
export function parseDistance(field: string, line: SourceLine): Weight {
	if (!DECIMAL.test(field)) {
		throw new MalformedLineError(
			line.lineNumber,
			line.text,
			`distance "${field}" is not a number`,
		)
	}
	const value = Number(field)
	try {
		return encodeWeight(value)
	} catch (error) {
		if (error instanceof InvalidWeightError) {
			throw new InvalidWeightError(value, line.lineNumber)
		}
		throw error
	}
}
