/**
 * Min-heap priority queue optimized for pathfinding.
 *
 * Uses a binary heap stored in flat arrays and tracks item positions to
 * support O(log n) priority decreases. Equal priorities pop in first-insertion
 * order, so searches over identical inputs expand identical sequences.
 */
export class BinaryHeap {
	private heap: number[] = []
	private priorities: number[] = []
	private sequences: number[] = []
	private positions: Map<number, number> = new Map()
	private nextSequence = 0

	get size(): number {
		return this.heap.length
	}

	/**
	 * Add an item with given priority. If item exists, updates priority if lower.
	 * A lowered item keeps its original insertion sequence for tie-breaking.
	 */
	push(item: number, priority: number): void {
		const existing = this.positions.get(item)
		if (existing !== undefined) {
			if (priority < this.priorities[existing]!) {
				this.priorities[existing] = priority
				this.bubbleUp(existing)
			}
			return
		}

		const index = this.heap.length
		this.heap.push(item)
		this.priorities.push(priority)
		this.sequences.push(this.nextSequence++)
		this.positions.set(item, index)
		this.bubbleUp(index)
	}

	/**
	 * Remove and return the minimum-priority item with its priority.
	 */
	pop(): { item: number; priority: number } | undefined {
		if (this.heap.length === 0) return undefined

		const min = this.heap[0]!
		const minPriority = this.priorities[0]!
		this.positions.delete(min)

		const last = this.heap.pop()!
		const lastPriority = this.priorities.pop()!
		const lastSequence = this.sequences.pop()!

		if (this.heap.length > 0) {
			this.heap[0] = last
			this.priorities[0] = lastPriority
			this.sequences[0] = lastSequence
			this.positions.set(last, 0)
			this.bubbleDown(0)
		}

		return { item: min, priority: minPriority }
	}

	/**
	 * Current priority of a queued item.
	 */
	priorityOf(item: number): number | undefined {
		const index = this.positions.get(item)
		return index === undefined ? undefined : this.priorities[index]
	}

	/**
	 * Check if item is in the heap.
	 */
	has(item: number): boolean {
		return this.positions.has(item)
	}

	/**
	 * Clear all items.
	 */
	clear(): void {
		this.heap.length = 0
		this.priorities.length = 0
		this.sequences.length = 0
		this.positions.clear()
		this.nextSequence = 0
	}

	/** Strict ordering: lower priority first, then earlier insertion. */
	private precedes(
		priority: number,
		sequence: number,
		otherIndex: number,
	): boolean {
		const otherPriority = this.priorities[otherIndex]!
		if (priority !== otherPriority) return priority < otherPriority
		return sequence < this.sequences[otherIndex]!
	}

	private bubbleUp(startIndex: number): void {
		const item = this.heap[startIndex]!
		const priority = this.priorities[startIndex]!
		const sequence = this.sequences[startIndex]!
		let index = startIndex

		while (index > 0) {
			const parentIndex = (index - 1) >> 1
			if (!this.precedes(priority, sequence, parentIndex)) break

			// Swap with parent
			this.heap[index] = this.heap[parentIndex]!
			this.priorities[index] = this.priorities[parentIndex]!
			this.sequences[index] = this.sequences[parentIndex]!
			this.positions.set(this.heap[index]!, index)

			index = parentIndex
		}

		this.heap[index] = item
		this.priorities[index] = priority
		this.sequences[index] = sequence
		this.positions.set(item, index)
	}

	private bubbleDown(startIndex: number): void {
		const length = this.heap.length
		const item = this.heap[startIndex]!
		const priority = this.priorities[startIndex]!
		const sequence = this.sequences[startIndex]!
		let index = startIndex

		while (true) {
			const leftIndex = (index << 1) + 1
			const rightIndex = leftIndex + 1
			let smallest = -1
			let smallestPriority = priority
			let smallestSequence = sequence

			if (
				leftIndex < length &&
				!this.precedes(smallestPriority, smallestSequence, leftIndex)
			) {
				smallest = leftIndex
				smallestPriority = this.priorities[leftIndex]!
				smallestSequence = this.sequences[leftIndex]!
			}

			if (
				rightIndex < length &&
				!this.precedes(smallestPriority, smallestSequence, rightIndex)
			) {
				smallest = rightIndex
			}

			if (smallest === -1) break

			// Move smallest child up
			this.heap[index] = this.heap[smallest]!
			this.priorities[index] = this.priorities[smallest]!
			this.sequences[index] = this.sequences[smallest]!
			this.positions.set(this.heap[index]!, index)

			index = smallest
		}

		this.heap[index] = item
		this.priorities[index] = priority
		this.sequences[index] = sequence
		this.positions.set(item, index)
	}
}
