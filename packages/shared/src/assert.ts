/**
 * Assertion utilities.
 *
 * Typed helpers that throw when a value the caller relies on is missing,
 * commonly used on heap slots and CSR array reads where the index is known
 * to be in range.
 *
 * @module
 */

/**
 * Assert that a value is neither null nor undefined.
 *
 * @example
 * ```ts
 * const target = edgeTargets[i]
 * assertValue(target, `No edge target at ${i}`)
 * ```
 */
export function assertValue<T>(
	value?: T,
	message?: string,
): asserts value is NonNullable<T> {
	if (value === undefined || value === null) {
		throw Error(message ?? "Value is undefined or null")
	}
}

/**
 * Read an array slot that must exist.
 */
export function at<T>(array: ArrayLike<T>, index: number): T {
	const value = array[index]
	assertValue(value, `Index ${index} out of bounds (length ${array.length})`)
	return value
}
