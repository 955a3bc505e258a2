import type { CanonicalRole } from '../roles/normalizeRole.js'
import type { CanonicalState } from '../roles/extractStates.js'

// ─────────────────────────────────────────────────────────────────────────────
// Raw snapshot (CDP Accessibility.getFullAXTree + attached box model)
// ─────────────────────────────────────────────────────────────────────────────

/** CDP AXValue wrapper. */
export type AXValue = {
	type?: string
	value?: unknown
}

/** CDP AXProperty. */
export type AXProperty = {
	name: string
	value?: AXValue
}

/** CDP AXIgnoredReason, kept as a raw property list. */
export type AXIgnoredReason = {
	name: string
	value?: AXValue
}

/** Screen-space rectangle in CSS pixels. */
export type Bounds = {
	x: number
	y: number
	width: number
	height: number
}

/**
 * One node of a flat accessibility snapshot.
 * Shape follows CDP's AXNode with `bounds` attached by the collector.
 */
export type RawAXNode = {
	nodeId: string
	parentId?: string
	childIds?: string[]
	ignored?: boolean
	ignoredReasons?: AXIgnoredReason[]
	role?: AXValue
	name?: AXValue
	properties?: AXProperty[]
	/** Left untyped: collectors occasionally emit junk here, see `readBounds`. */
	bounds?: unknown
	backendDOMNodeId?: number
}

/** Nested form of the same snapshot, for callers that already hold a tree. */
export type RawTreeNode = Omit<RawAXNode, 'nodeId' | 'parentId' | 'childIds'> & {
	nodeId?: string
	children?: RawTreeNode[]
}

// ─────────────────────────────────────────────────────────────────────────────
// Canonical tree
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A node in the canonical element tree.
 * Children are in snapshot order, which doubles as paint order (back to front).
 */
export type CanonicalNode = {
	/** Fresh sequential id (`node_<n>`), independent of the snapshot's node ids. */
	id: string
	role: CanonicalRole
	name: string
	/** Verbatim snapshot bounds. May exceed the parent's; the walker clips. */
	bounds: Bounds
	states: CanonicalState[]
	children: CanonicalNode[]
}

export type ScreenSize = {
	width: number
	height: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Visibility
// ─────────────────────────────────────────────────────────────────────────────

/** Axis-aligned rectangle as corner coordinates. */
export type ClipRect = {
	x1: number
	y1: number
	x2: number
	y2: number
}

/** A node that survived the visibility walk. */
export type VisibleRecord = {
	id: string
	role: CanonicalRole
	name: string
	states: readonly CanonicalState[]
	bounds: Bounds
	/** `bounds` intersected with every ancestor's visible rect. */
	visibleRect: ClipRect
	visibleArea: number
	/** Tree depth (root = 0). */
	depth: number
}

// ─────────────────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────────────────

/** A grounding sample: one clickable element with its click point. */
export type Sample = {
	id: string
	category: CanonicalRole
	name: string
	bbox: [number, number, number, number]
	point: [number, number]
}

/** `filtered.json` payload. */
export type SampleDocument = {
	image_filename: string
	image_width: number
	image_height: number
	sample_count: number
	test_samples: Sample[]
}
