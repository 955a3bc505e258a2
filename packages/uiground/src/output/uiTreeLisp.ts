import type { UiTreeDocument, UiTreeNode } from '@uiground/core'

export type LispOptions = {
	bounds?: boolean
	states?: boolean
	compact?: boolean
	/** Skip nodes with no name and no children. */
	skipEmpty?: boolean
	maxDepth?: number
	/** Skip nodes narrower AND shorter than N px. */
	minSize?: number
}

/**
 * Render a ui tree as S-expressions.
 *
 * Per node:
 *   (role "name" [x,y wxh] :state1 :state2
 *     <children>)
 *
 * Examples:
 *   (button "Submit" [100,200 80x32] :focused)
 *   (panel [0,40 1920x1040]
 *     (textfield "Search" [10,10 200x30] :editable))
 */
export const formatUiTreeLisp = (document: UiTreeDocument, options: LispOptions = {}): string => {
	const lines: string[] = []

	if (!options.compact) {
		lines.push(';; UI Tree')
		if (document.timestamp) {
			lines.push(`;; timestamp: ${document.timestamp}`)
		}
		lines.push(`;; screen: ${document.screen.width}x${document.screen.height}`)
		lines.push('')
	}

	const root = formatNode(document.root, 0, options)
	if (root) {
		lines.push(root)
	}
	return lines.join('\n')
}

const formatNode = (node: UiTreeNode, depth: number, options: LispOptions): string | null => {
	if (options.maxDepth != null && depth > options.maxDepth) {
		return null
	}

	const children = node.children ?? []
	if (options.minSize && node.bounds.width < options.minSize && node.bounds.height < options.minSize) {
		return null
	}
	if (options.skipEmpty && !node.name && children.length === 0) {
		return null
	}

	const header = formatNodeLabel(node, options)
	const childTexts = children.map((child) => formatNode(child, depth + 1, options)).filter((text): text is string => text !== null)

	if (childTexts.length === 0) {
		return `(${header})`
	}
	if (options.compact) {
		return `(${header} ${childTexts.join('')})`
	}

	const indent = '  '
	const body = childTexts.map((text) => indent + text.replaceAll('\n', `\n${indent}`)).join('\n')
	return `(${header}\n${body})`
}

const formatNodeLabel = (node: UiTreeNode, options: LispOptions): string => {
	const parts: string[] = [node.role]

	if (node.name) {
		parts.push(escapeString(node.name))
	}

	if (options.bounds !== false) {
		const { x, y, width, height } = node.bounds
		parts.push(`[${x},${y} ${width}x${height}]`)
	}

	if (options.states !== false && node.states && node.states.length > 0) {
		parts.push(node.states.map((state) => `:${state}`).join(' '))
	}

	return parts.join(' ')
}

const escapeString = (value: string): string =>
	`"${value.replaceAll('\\', '\\\\').replaceAll('"', '\\"').replaceAll('\n', '\\n').replaceAll('\t', '\\t')}"`
