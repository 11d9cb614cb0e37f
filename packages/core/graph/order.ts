import type { BundleName } from "../types/branded"
import type { CircularDependencyError, Result } from "../types/error"

export interface GraphNode {
	key: string
	name: BundleName
	/** Keys of the node's dependencies, in declaration order. */
	dependencies: string[]
}

type VisitState = "visiting" | "visited"

/**
 * Orders the graph reachable from `rootKey` so that every node follows its
 * dependencies. Siblings keep declaration order and the root comes last.
 */
export function orderGraph(
	rootKey: string,
	nodes: ReadonlyMap<string, GraphNode>,
): Result<GraphNode[], CircularDependencyError> {
	const state = new Map<string, VisitState>()
	const path: GraphNode[] = []
	const order: GraphNode[] = []

	const visit = (key: string): CircularDependencyError | null => {
		const node = nodes.get(key)
		if (!node) return null

		const current = state.get(key)
		if (current === "visited") return null
		if (current === "visiting") {
			const start = path.findIndex((entry) => entry.key === key)
			const chain = [...path.slice(start).map((entry) => entry.name), node.name]
			return {
				chain,
				message: `Circular dependency: ${formatChain(chain)}`,
				type: "circular_dependency",
			}
		}

		state.set(key, "visiting")
		path.push(node)
		for (const dependency of node.dependencies) {
			const error = visit(dependency)
			if (error) return error
		}
		path.pop()
		state.set(key, "visited")
		order.push(node)
		return null
	}

	const error = visit(rootKey)
	if (error) {
		return { error, ok: false }
	}

	return { ok: true, value: order }
}

export function formatChain(chain: ReadonlyArray<string>): string {
	return chain.join(" → ")
}
