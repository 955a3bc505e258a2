import type { Bounds, CanonicalNode, ScreenSize } from '../model/types.js'
import { createDiagnostics, type Diagnostics } from '../diagnostics.js'
import { PreconditionError } from '../errors.js'
import { normalizeRole } from '../roles/normalizeRole.js'
import { isCanonicalState, type CanonicalState } from '../roles/extractStates.js'
import { readBounds, ROOT_ROLE } from '../tree/buildTree.js'
import { isRecord } from './layout.js'

/** Serialised canonical node. Empty `states`/`children` are omitted. */
export type UiTreeNode = {
	id: string
	role: string
	name: string
	bounds: Bounds
	states?: CanonicalState[]
	children?: UiTreeNode[]
}

/** `ui_tree.json` payload. */
export type UiTreeDocument = {
	timestamp: string
	screen: ScreenSize
	root: UiTreeNode
}

/**
 * Serialise a canonical tree. An empty snapshot becomes a childless desktop root
 * so consumers always find `root`.
 */
export const toUiTreeDocument = (root: CanonicalNode | null, screen: ScreenSize, now: Date = new Date()): UiTreeDocument => {
	const tree: CanonicalNode = root ?? {
		id: 'node_0',
		role: ROOT_ROLE,
		name: '',
		bounds: { x: 0, y: 0, width: screen.width, height: screen.height },
		states: [],
		children: [],
	}
	return {
		timestamp: now.toISOString(),
		screen: { width: screen.width, height: screen.height },
		root: serializeNode(tree),
	}
}

const serializeNode = (node: CanonicalNode): UiTreeNode => {
	const result: UiTreeNode = {
		id: node.id,
		role: node.role,
		name: node.name,
		bounds: { ...node.bounds },
	}
	if (node.states.length > 0) {
		result.states = [...node.states]
	}
	if (node.children.length > 0) {
		result.children = node.children.map(serializeNode)
	}
	return result
}

export const isUiTreeDocument = (value: unknown): boolean => isRecord(value) && isRecord(value.root) && isRecord(value.screen)

export type ParseUiTreeOptions = {
	/** Accumulator to record findings into. A fresh one is created when omitted. */
	diagnostics?: Diagnostics
}

/** Read a `ui_tree.json` payload back into a canonical tree. */
export const parseUiTreeDocument = (
	value: unknown,
	options: ParseUiTreeOptions = {},
): { screen: ScreenSize; root: CanonicalNode; diagnostics: Diagnostics } => {
	const diagnostics = options.diagnostics ?? createDiagnostics()
	if (!isRecord(value)) {
		throw new PreconditionError('ui tree document must be an object.')
	}
	const screen = readScreen(value.screen)
	if (!isRecord(value.root)) {
		throw new PreconditionError('ui tree document has no "root" object.')
	}
	return { screen, root: parseNode(value.root, 'root', diagnostics), diagnostics }
}

const readScreen = (value: unknown): ScreenSize => {
	if (!isRecord(value) || typeof value.width !== 'number' || typeof value.height !== 'number') {
		throw new PreconditionError('ui tree "screen" must be { width: number, height: number }.')
	}
	return { width: value.width, height: value.height }
}

const parseNode = (value: Record<string, unknown>, path: string, diagnostics: Diagnostics): CanonicalNode => {
	if (typeof value.id !== 'string') {
		throw new PreconditionError(`ui tree node at ${path} has no string "id".`)
	}

	const states: CanonicalState[] = []
	if (Array.isArray(value.states)) {
		for (const state of value.states) {
			if (typeof state === 'string' && isCanonicalState(state) && !states.includes(state)) {
				states.push(state)
			}
		}
	}

	const children: CanonicalNode[] = []
	if (Array.isArray(value.children)) {
		value.children.forEach((child: unknown, index) => {
			if (!isRecord(child)) {
				throw new PreconditionError(`ui tree node at ${path}.children[${index}] must be an object.`)
			}
			children.push(parseNode(child, `${path}.children[${index}]`, diagnostics))
		})
	}

	const bounds = readBounds(value.bounds, value.id)
	if (bounds === null || typeof value.role !== 'string') {
		diagnostics.malformedNodes++
	}

	return {
		id: value.id,
		role: normalizeRole(typeof value.role === 'string' ? value.role : undefined, diagnostics),
		name: typeof value.name === 'string' ? value.name : '',
		bounds: bounds ?? { x: 0, y: 0, width: 0, height: 0 },
		states,
		children,
	}
}
