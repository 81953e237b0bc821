/**
 * Routing graph construction.
 *
 * Builds an undirected weighted graph from labeled edges. Labels are interned
 * to dense node indexes in first-insertion order, and adjacency is compacted
 * into CSR (Compressed Sparse Row) arrays once building is complete. The
 * compacted graph is immutable.
 *
 * @module
 */

import { at } from "@trailhead/shared/assert"
import { InvalidWeightError } from "./errors"
import type { GraphEdge, Neighbor, NodeLabel, RoadEdge, Weight } from "./types"
import { isWeight } from "./weight"

/**
 * Mutable edge collector. Each unordered pair holds at most one weight;
 * re-adding a pair replaces its weight.
 *
 * @example
 * ```ts
 * const graph = new RoadGraphBuilder()
 * 	.addEdge("Ashby", "Calder", 81)
 * 	.addEdge("Calder", "Dunmore", 152)
 * 	.build()
 * ```
 */
export class RoadGraphBuilder {
	private readonly indexes = new Map<NodeLabel, number>()
	private readonly labels: NodeLabel[] = []
	private readonly adjacency: Map<number, Weight>[] = []

	/**
	 * Insert or replace the edge {from, to}. Adds both endpoints if absent.
	 */
	addEdge(from: NodeLabel, to: NodeLabel, weight: Weight): this {
		if (!isWeight(weight)) throw new InvalidWeightError(weight)
		const fromIndex = this.intern(from)
		const toIndex = this.intern(to)
		at(this.adjacency, fromIndex).set(toIndex, weight)
		at(this.adjacency, toIndex).set(fromIndex, weight)
		return this
	}

	containsNode(label: NodeLabel): boolean {
		return this.indexes.has(label)
	}

	get size(): number {
		return this.labels.length
	}

	/**
	 * Compact into an immutable RoadGraph.
	 */
	build(): RoadGraph {
		const nodeCount = this.labels.length
		let edgeSlots = 0
		for (const neighbors of this.adjacency) edgeSlots += neighbors.size

		const edgeOffsets = new Uint32Array(nodeCount + 1)
		const edgeTargets = new Uint32Array(edgeSlots)
		const edgeWeights = new Float64Array(edgeSlots)

		let edgeIndex = 0
		for (let nodeIndex = 0; nodeIndex < nodeCount; nodeIndex++) {
			edgeOffsets[nodeIndex] = edgeIndex
			for (const [target, weight] of at(this.adjacency, nodeIndex)) {
				edgeTargets[edgeIndex] = target
				edgeWeights[edgeIndex] = weight
				edgeIndex++
			}
		}
		edgeOffsets[nodeCount] = edgeIndex

		return new RoadGraph([...this.labels], edgeOffsets, edgeTargets, edgeWeights)
	}

	private intern(label: NodeLabel): number {
		const existing = this.indexes.get(label)
		if (existing !== undefined) return existing
		const index = this.labels.length
		this.indexes.set(label, index)
		this.labels.push(label)
		this.adjacency.push(new Map())
		return index
	}
}

/**
 * Immutable undirected routing graph in CSR form.
 *
 * Each undirected edge is stored once per endpoint, so `getEdges(i)` lists
 * every edge incident to node `i` exactly once. A self-loop is stored once.
 */
export class RoadGraph {
	private readonly indexes: Map<NodeLabel, number>
	private readonly edgeCount: number

	constructor(
		private readonly labels: readonly NodeLabel[],
		private readonly edgeOffsets: Uint32Array,
		private readonly edgeTargets: Uint32Array,
		private readonly edgeWeights: Float64Array,
	) {
		this.indexes = new Map(labels.map((label, index) => [label, index]))

		let loops = 0
		for (let nodeIndex = 0; nodeIndex < labels.length; nodeIndex++) {
			for (const edge of this.getEdges(nodeIndex)) {
				if (edge.targetNodeIndex === nodeIndex) loops++
			}
		}
		this.edgeCount = (edgeTargets.length - loops) / 2 + loops
	}

	/**
	 * Number of nodes in the graph.
	 */
	get size(): number {
		return this.labels.length
	}

	/**
	 * Number of undirected edges in the graph.
	 */
	get edges(): number {
		return this.edgeCount
	}

	containsNode(label: NodeLabel): boolean {
		return this.indexes.has(label)
	}

	/**
	 * Node labels in first-insertion order.
	 */
	nodes(): NodeLabel[] {
		return [...this.labels]
	}

	indexOf(label: NodeLabel): number | undefined {
		return this.indexes.get(label)
	}

	labelOf(nodeIndex: number): NodeLabel {
		return at(this.labels, nodeIndex)
	}

	/**
	 * Get edges incident to a node index.
	 */
	getEdges(nodeIndex: number): GraphEdge[] {
		if (nodeIndex < 0 || nodeIndex >= this.labels.length) return []

		const start = at(this.edgeOffsets, nodeIndex)
		const end = at(this.edgeOffsets, nodeIndex + 1)
		const edges: GraphEdge[] = []

		for (let i = start; i < end; i++) {
			edges.push({
				targetNodeIndex: at(this.edgeTargets, i),
				weight: at(this.edgeWeights, i),
			})
		}

		return edges
	}

	/**
	 * Neighbors of a labeled node with edge weights. Empty for unknown labels.
	 */
	neighbors(label: NodeLabel): Neighbor[] {
		const nodeIndex = this.indexes.get(label)
		if (nodeIndex === undefined) return []
		return this.getEdges(nodeIndex).map((edge) => ({
			label: this.labelOf(edge.targetNodeIndex),
			weight: edge.weight,
		}))
	}

	/**
	 * Weight of the edge {from, to}, or undefined if there is none.
	 * Scans the shorter of the two adjacency ranges.
	 */
	edgeWeight(from: NodeLabel, to: NodeLabel): Weight | undefined {
		const fromIndex = this.indexes.get(from)
		const toIndex = this.indexes.get(to)
		if (fromIndex === undefined || toIndex === undefined) return undefined

		const fromDegree = this.degree(fromIndex)
		const toDegree = this.degree(toIndex)
		const [source, target] =
			fromDegree <= toDegree ? [fromIndex, toIndex] : [toIndex, fromIndex]

		const start = at(this.edgeOffsets, source)
		const end = at(this.edgeOffsets, source + 1)
		for (let i = start; i < end; i++) {
			if (at(this.edgeTargets, i) === target) return at(this.edgeWeights, i)
		}
		return undefined
	}

	private degree(nodeIndex: number): number {
		return at(this.edgeOffsets, nodeIndex + 1) - at(this.edgeOffsets, nodeIndex)
	}
}

/**
 * Build a routing graph from labeled edges.
 *
 * Convenience function over RoadGraphBuilder.
 */
export function buildGraph(edges: Iterable<RoadEdge>): RoadGraph {
	const builder = new RoadGraphBuilder()
	for (const edge of edges) builder.addEdge(edge.from, edge.to, edge.weight)
	return builder.build()
}
