/**
 * Fixed-point distance codec.
 *
 * Input distances carry one fractional digit. Storing them as integer tenths
 * keeps every comparison inside the search exact, so heap ordering and
 * relaxation never depend on floating-point rounding.
 *
 * @module
 */

import { InvalidWeightError } from "./errors"
import type { Weight } from "./types"

/** Fixed-point scale: tenths. */
export const WEIGHT_SCALE = 10

/**
 * Encode a decimal distance as integer tenths.
 *
 * Rounds half away from zero, which for the non-negative inputs accepted here
 * is `Math.round`.
 *
 * @throws InvalidWeightError for negative, non-finite, or unrepresentable values.
 */
export function encodeWeight(decimal: number): Weight {
	if (!Number.isFinite(decimal) || decimal < 0) {
		throw new InvalidWeightError(decimal)
	}
	const weight = Math.round(decimal * WEIGHT_SCALE)
	if (!Number.isSafeInteger(weight)) throw new InvalidWeightError(decimal)
	return weight
}

/** Decode integer tenths back to a decimal distance. */
export function decodeWeight(weight: Weight): number {
	return weight / WEIGHT_SCALE
}

/** Display a weight with exactly one fractional digit, e.g. `125` → `"12.5"`. */
export function formatWeight(weight: Weight): string {
	return decodeWeight(weight).toFixed(1)
}

/** Check that a value is already a valid encoded weight. */
export function isWeight(value: number): value is Weight {
	return Number.isSafeInteger(value) && value >= 0
}
