import type { AXProperty, AXValue, RawAXNode, ScreenSize } from '../model/types.js'
import { PreconditionError } from '../errors.js'

/** Result of reading a collector payload. */
export type LayoutSnapshot = {
	nodes: RawAXNode[]
	/** Viewport size reported by the collector, if any. */
	screen: ScreenSize | null
	/** Tab the snapshot came from, when the payload lists tabs. */
	tab: { url: string | null; title: string | null } | null
	/** Collector-side error for the tab (the snapshot is then empty). */
	error: string | null
}

export const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Read a collector payload into raw nodes.
 *
 * Accepted shapes:
 * - `{ tabs: [{ url, title, layout: { nodes, viewport } }] }` (first tab is used)
 * - `{ nodes, viewport? }`
 * - `RawAXNode[]`
 */
export const readLayoutSnapshot = (value: unknown): LayoutSnapshot => {
	if (Array.isArray(value)) {
		return { nodes: readNodes(value), screen: null, tab: null, error: null }
	}
	if (!isRecord(value)) {
		throw new PreconditionError('Layout payload must be an object or an array of AX nodes.')
	}

	if (Array.isArray(value.tabs)) {
		const first: unknown = value.tabs[0]
		if (first === undefined) {
			return { nodes: [], screen: null, tab: null, error: null }
		}
		if (!isRecord(first)) {
			throw new PreconditionError('"tabs[0]" must be an object.')
		}
		const tab = { url: readOptionalString(first.url), title: readOptionalString(first.title) }
		if (!isRecord(first.layout)) {
			return { nodes: [], screen: null, tab, error: 'tab has no layout' }
		}
		return { ...readLayout(first.layout), tab }
	}

	if (Array.isArray(value.nodes) || 'error' in value) {
		return { ...readLayout(value), tab: null }
	}

	throw new PreconditionError('Layout payload must contain "tabs" or "nodes".')
}

const readLayout = (layout: Record<string, unknown>): Omit<LayoutSnapshot, 'tab'> => {
	if (typeof layout.error === 'string') {
		return { nodes: [], screen: readViewport(layout.viewport), error: layout.error }
	}
	const nodes = layout.nodes ?? []
	if (!Array.isArray(nodes)) {
		throw new PreconditionError('"layout.nodes" must be an array.')
	}
	return { nodes: readNodes(nodes), screen: readViewport(layout.viewport), error: null }
}

/** `viewport.visualViewport.{width,height}`, truncated to whole pixels. */
const readViewport = (viewport: unknown): ScreenSize | null => {
	if (!isRecord(viewport) || !isRecord(viewport.visualViewport)) {
		return null
	}
	const { width, height } = viewport.visualViewport
	if (typeof width !== 'number' || typeof height !== 'number' || !(width > 0) || !(height > 0)) {
		return null
	}
	return { width: Math.trunc(width), height: Math.trunc(height) }
}

const readNodes = (values: unknown[]): RawAXNode[] => values.map((value, index) => readNode(value, index))

const readNode = (value: unknown, index: number): RawAXNode => {
	if (!isRecord(value)) {
		throw new PreconditionError(`AX node at index ${index} must be an object.`)
	}
	const nodeId = readId(value.nodeId)
	if (nodeId === undefined) {
		throw new PreconditionError(`AX node at index ${index} has no "nodeId".`)
	}

	const node: RawAXNode = { nodeId }
	const parentId = readId(value.parentId)
	if (parentId !== undefined) {
		node.parentId = parentId
	}
	if (Array.isArray(value.childIds)) {
		node.childIds = value.childIds.map(readId).filter((id): id is string => id !== undefined)
	}
	if (value.ignored === true) {
		node.ignored = true
	}
	const ignoredReasons = readPropertyList(value.ignoredReasons)
	if (ignoredReasons.length > 0) {
		node.ignoredReasons = ignoredReasons
	}
	const role = readAXValue(value.role)
	if (role) {
		node.role = role
	}
	const name = readAXValue(value.name)
	if (name) {
		node.name = name
	}
	const properties = readPropertyList(value.properties)
	if (properties.length > 0) {
		node.properties = properties
	}
	if (value.bounds !== undefined) {
		node.bounds = value.bounds
	}
	if (typeof value.backendDOMNodeId === 'number') {
		node.backendDOMNodeId = value.backendDOMNodeId
	}
	return node
}

/** CDP ids are strings; some collectors emit numbers. */
const readId = (value: unknown): string | undefined => {
	if (typeof value === 'string' && value !== '') {
		return value
	}
	if (typeof value === 'number' && Number.isFinite(value)) {
		return String(value)
	}
	return undefined
}

/** Accepts a CDP AXValue or a bare primitive. */
const readAXValue = (value: unknown): AXValue | undefined => {
	if (value == null) {
		return undefined
	}
	if (isRecord(value)) {
		return typeof value.type === 'string' ? { type: value.type, value: value.value } : { value: value.value }
	}
	return { value }
}

const readPropertyList = (value: unknown): AXProperty[] => {
	if (!Array.isArray(value)) {
		return []
	}
	const properties: AXProperty[] = []
	for (const item of value) {
		if (!isRecord(item) || typeof item.name !== 'string') {
			continue
		}
		properties.push({ name: item.name, value: readAXValue(item.value) })
	}
	return properties
}

const readOptionalString = (value: unknown): string | null => (typeof value === 'string' ? value : null)
