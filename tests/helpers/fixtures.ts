import type { AXProperty, Bounds, CanonicalNode, RawAXNode, VisibleRecord } from '../../packages/uiground-core/src/index.js'
import { rectArea, rectFromBounds } from '../../packages/uiground-core/src/index.js'

type AXNodeExtras = {
	childIds?: string[]
	ignored?: boolean
	properties?: AXProperty[]
	ignoredReasons?: RawAXNode['ignoredReasons']
}

/** Flat CDP-style node with role/name wrapped in AXValues. */
export const axNode = (nodeId: string, role: string, name: string, bounds: Bounds | undefined, extras: AXNodeExtras = {}): RawAXNode => {
	const node: RawAXNode = {
		nodeId,
		role: { type: 'role', value: role },
		name: { type: 'computedString', value: name },
		...extras,
	}
	if (bounds) {
		node.bounds = bounds
	}
	return node
}

export const flag = (name: string, value: unknown): AXProperty => ({ name, value: { type: 'boolean', value } })

export const canonicalNode = (
	id: string,
	role: string,
	bounds: Bounds,
	children: CanonicalNode[] = [],
	extras: Partial<Pick<CanonicalNode, 'name' | 'states'>> = {},
): CanonicalNode => ({
	id,
	role,
	name: extras.name ?? '',
	bounds,
	states: extras.states ?? [],
	children,
})

/** Visible record whose visible rect equals its bounds. */
export const visibleRecord = (id: string, role: string, name: string, bounds: Bounds, depth: number): VisibleRecord => {
	const visibleRect = rectFromBounds(bounds)
	return { id, role, name, states: [], bounds, visibleRect, visibleArea: rectArea(visibleRect), depth }
}

export const SCREEN = { width: 1920, height: 1080 }
