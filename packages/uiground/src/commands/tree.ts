import { buildTree, countTreeNodes, DEFAULT_PIPELINE_CONFIG, readLayoutSnapshot, toUiTreeDocument, type UiTreeDocument } from '@uiground/core'
import { formatError, parseScreenSize } from '../cli/parse.js'
import { createOutput } from '../output/io.js'
import { writeDiagnostics } from '../output/format.js'
import { readJsonInput, writeJsonOut } from '../utils/input.js'

export type TreeOptions = {
	out?: string
	screen?: string
	json?: boolean
	quiet?: boolean
}

/** Convert a collector payload into a `ui_tree.json` document. */
export const runTree = async (input: string, options: TreeOptions): Promise<void> => {
	const output = createOutput(options)

	const fallbackScreen = options.screen !== undefined ? parseScreenSize(options.screen) : DEFAULT_PIPELINE_CONFIG.defaultScreen
	if (!fallbackScreen) {
		output.writeWarn('--screen must look like 1920x1080')
		process.exitCode = 2
		return
	}

	const read = await readJsonInput(input)
	if (!read.ok) {
		output.writeWarn(`failed to read input: ${read.error.message}`)
		process.exitCode = 1
		return
	}

	let uiTree: UiTreeDocument
	let nodeCount = 0
	try {
		const snapshot = readLayoutSnapshot(read.value)
		if (snapshot.error) {
			output.writeWarn(`collector reported an error: ${snapshot.error}`)
		}
		const screen = snapshot.screen ?? fallbackScreen
		const { root, diagnostics } = buildTree(snapshot.nodes, { screen })
		writeDiagnostics(output, diagnostics)
		uiTree = toUiTreeDocument(root, screen)
		nodeCount = root ? countTreeNodes(root) : 0
	} catch (error) {
		output.writeWarn(`failed to build tree: ${formatError(error)}`)
		process.exitCode = 1
		return
	}

	if (!options.out) {
		output.writeJson(uiTree)
		return
	}

	try {
		const target = await writeJsonOut(options.out, uiTree)
		if (options.json) {
			output.writeJson({ path: target, nodes: nodeCount, screen: uiTree.screen })
		} else {
			output.writeHuman(`Wrote ${nodeCount} node(s) to ${target}`)
		}
	} catch (error) {
		output.writeWarn(`failed to write ${options.out}: ${formatError(error)}`)
		process.exitCode = 1
	}
}
