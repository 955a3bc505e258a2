import type { CanonicalNode, ClipRect, VisibleRecord } from '../model/types.js'
import type { CanonicalState } from '../roles/extractStates.js'
import { DEFAULT_PIPELINE_CONFIG, type SubtreePolicy } from '../config.js'
import { intersectRects, rectArea, rectFromBounds } from '../model/geometry.js'

export type WalkVisibleOptions = {
	minVisibleArea?: number
	subtreePolicy?: SubtreePolicy
}

/** States that drop a subtree under the `state-pruning` policy. */
const PRUNING_STATES: ReadonlySet<CanonicalState> = new Set(['collapsed', 'hidden', 'invisible'])

/**
 * Collect every node that is actually on screen, in pre-order.
 *
 * Each node's visible rect is its bounds clipped by its parent's visible rect, so the
 * clip only ever shrinks. A node with no positive size, no overlap, or less than
 * `minVisibleArea` of overlap is dropped together with its subtree.
 *
 * The returned order is the paint order used for occlusion: later records are on top.
 */
export const walkVisible = (root: CanonicalNode | null, screen: ClipRect, options: WalkVisibleOptions = {}): VisibleRecord[] => {
	const minVisibleArea = options.minVisibleArea ?? DEFAULT_PIPELINE_CONFIG.minVisibleArea
	const subtreePolicy = options.subtreePolicy ?? DEFAULT_PIPELINE_CONFIG.subtreePolicy
	const records: VisibleRecord[] = []

	if (!root) {
		return records
	}

	const visit = (node: CanonicalNode, clip: ClipRect, depth: number): void => {
		const { bounds } = node
		if (bounds.width <= 0 || bounds.height <= 0) {
			return
		}

		const visibleRect = intersectRects(rectFromBounds(bounds), clip)
		const visibleArea = rectArea(visibleRect)
		if (!visibleRect || visibleArea < minVisibleArea) {
			return
		}

		if (subtreePolicy === 'state-pruning' && node.states.some((state) => PRUNING_STATES.has(state))) {
			return
		}

		records.push({
			id: node.id,
			role: node.role,
			name: node.name,
			states: node.states,
			bounds,
			visibleRect,
			visibleArea,
			depth,
		})

		for (const child of node.children) {
			visit(child, visibleRect, depth + 1)
		}
	}

	visit(root, screen, 0)
	return records
}
