import type { AXValue, Bounds, CanonicalNode, RawAXNode, RawTreeNode, ScreenSize } from '../model/types.js'
import { DEFAULT_PIPELINE_CONFIG } from '../config.js'
import { createDiagnostics, type Diagnostics } from '../diagnostics.js'
import { PreconditionError } from '../errors.js'
import { normalizeRole } from '../roles/normalizeRole.js'
import { extractStates } from '../roles/extractStates.js'

// ─────────────────────────────────────────────────────────────────────────────
// Options
// ─────────────────────────────────────────────────────────────────────────────

export type BuildTreeOptions = {
	/** Size of the synthetic desktop root. Defaults to 1920×1080. */
	screen?: ScreenSize
	/** Accumulator to record findings into. A fresh one is created when omitted. */
	diagnostics?: Diagnostics
}

export type BuildTreeResult = {
	/** Synthetic `desktop` root wrapping the snapshot, or `null` for an empty snapshot. */
	root: CanonicalNode | null
	diagnostics: Diagnostics
}

export const ROOT_ROLE = 'desktop'

// ─────────────────────────────────────────────────────────────────────────────
// Public API
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reconstruct the flat snapshot into a canonical tree.
 *
 * 1. Index all nodes by nodeId.
 * 2. Root = first node nobody lists as a child (first node when every node is someone's child).
 * 3. Convert top-down; ignored nodes are spliced out and their children take their place.
 * 4. Wrap the result in a `desktop` root sized to the screen; ids are assigned in pre-order.
 *
 * Each raw node is attached at most once, so duplicate parents and cycles terminate.
 */
export const buildTree = (rawNodes: readonly RawAXNode[], options: BuildTreeOptions = {}): BuildTreeResult => {
	const diagnostics = options.diagnostics ?? createDiagnostics()
	if (rawNodes.length === 0) {
		diagnostics.emptyInput = true
		return { root: null, diagnostics }
	}

	const nodeMap = new Map<string, RawAXNode>()
	for (const node of rawNodes) {
		if (!nodeMap.has(node.nodeId)) {
			nodeMap.set(node.nodeId, node)
		}
	}

	const childIdSet = new Set<string>()
	for (const node of rawNodes) {
		for (const childId of node.childIds ?? []) {
			childIdSet.add(childId)
		}
	}

	const rawRoot = rawNodes.find((node) => !childIdSet.has(node.nodeId)) ?? rawNodes[0]

	const nextId = createIdSequence()
	const root = createRoot(nextId(), options.screen)
	const visited = new Set<string>()

	const collectChildren = (childIds: readonly string[]): CanonicalNode[] => {
		const results: CanonicalNode[] = []
		for (const childId of childIds) {
			if (visited.has(childId)) {
				diagnostics.duplicateReferences++
				continue
			}
			const child = nodeMap.get(childId)
			if (!child) {
				diagnostics.unresolvedReferences++
				continue
			}
			results.push(...convertNode(child))
		}
		return results
	}

	const convertNode = (raw: RawAXNode): CanonicalNode[] => {
		visited.add(raw.nodeId)

		// Ignored nodes produce no element; their children take their place
		if (raw.ignored) {
			return collectChildren(raw.childIds ?? [])
		}

		const node = toCanonicalNode(raw, nextId(), diagnostics)
		node.children = collectChildren(raw.childIds ?? [])
		return [node]
	}

	root.children = convertNode(rawRoot)
	return { root, diagnostics }
}

/**
 * Same conversion for a snapshot that is already nested.
 * Splicing of ignored nodes is identical; a node object reachable twice is attached once.
 */
export const buildTreeFromNested = (rawRoot: RawTreeNode | null | undefined, options: BuildTreeOptions = {}): BuildTreeResult => {
	const diagnostics = options.diagnostics ?? createDiagnostics()
	if (!rawRoot) {
		diagnostics.emptyInput = true
		return { root: null, diagnostics }
	}

	const nextId = createIdSequence()
	const root = createRoot(nextId(), options.screen)
	const visited = new Set<RawTreeNode>()

	const convertNode = (raw: RawTreeNode): CanonicalNode[] => {
		if (visited.has(raw)) {
			diagnostics.duplicateReferences++
			return []
		}
		visited.add(raw)

		if (raw.ignored) {
			return collectChildren(raw.children ?? [])
		}

		const node = toCanonicalNode(raw, nextId(), diagnostics)
		node.children = collectChildren(raw.children ?? [])
		return [node]
	}

	const collectChildren = (children: readonly RawTreeNode[]): CanonicalNode[] => {
		const results: CanonicalNode[] = []
		for (const child of children) {
			results.push(...convertNode(child))
		}
		return results
	}

	root.children = convertNode(rawRoot)
	return { root, diagnostics }
}

/** Count nodes in a canonical tree, root included. */
export const countTreeNodes = (node: CanonicalNode): number => {
	let count = 1
	for (const child of node.children) {
		count += countTreeNodes(child)
	}
	return count
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const createIdSequence = (): (() => string) => {
	let next = 0
	return () => `node_${next++}`
}

const createRoot = (id: string, screen: ScreenSize = DEFAULT_PIPELINE_CONFIG.defaultScreen): CanonicalNode => ({
	id,
	role: ROOT_ROLE,
	name: '',
	bounds: { x: 0, y: 0, width: screen.width, height: screen.height },
	states: [],
	children: [],
})

type ConvertibleNode = Pick<RawTreeNode, 'nodeId' | 'role' | 'name' | 'bounds' | 'ignored' | 'ignoredReasons' | 'properties'>

const toCanonicalNode = (raw: ConvertibleNode, id: string, diagnostics: Diagnostics): CanonicalNode => {
	const rawRole = extractStringValue(raw.role)
	const bounds = readBounds(raw.bounds, raw.nodeId)
	if (bounds === null || rawRole === undefined) {
		diagnostics.malformedNodes++
	}

	return {
		id,
		role: normalizeRole(rawRole, diagnostics),
		name: extractStringValue(raw.name) ?? '',
		bounds: bounds ?? { x: 0, y: 0, width: 0, height: 0 },
		states: extractStates(raw),
		children: [],
	}
}

const extractStringValue = (axValue?: AXValue): string | undefined => {
	if (!axValue || axValue.value == null) {
		return undefined
	}
	return String(axValue.value)
}

const BOUNDS_FIELDS = ['x', 'y', 'width', 'height'] as const

/**
 * Read a snapshot bounds value.
 * Absent bounds → `null` (node counts as not visible). Missing fields default to 0.
 * Anything that is not a rectangle-shaped object is a caller bug.
 */
export const readBounds = (value: unknown, nodeId?: string): Bounds | null => {
	if (value == null) {
		return null
	}
	const label = nodeId !== undefined ? `node ${JSON.stringify(nodeId)}` : 'node'
	if (typeof value !== 'object' || Array.isArray(value)) {
		throw new PreconditionError(`Invalid bounds for ${label}: expected { x, y, width, height }, got ${JSON.stringify(value)}.`)
	}

	const bounds: Bounds = { x: 0, y: 0, width: 0, height: 0 }
	for (const field of BOUNDS_FIELDS) {
		const fieldValue: unknown = Reflect.get(value, field)
		if (fieldValue === undefined) {
			continue
		}
		if (typeof fieldValue !== 'number' || !Number.isFinite(fieldValue)) {
			throw new PreconditionError(`Invalid bounds for ${label}: "${field}" must be a finite number, got ${JSON.stringify(fieldValue)}.`)
		}
		bounds[field] = fieldValue
	}
	return bounds
}
