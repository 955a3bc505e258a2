import { DEFAULT_PIPELINE_CONFIG, isRecord, toUiTreeDocument, type ScreenSize, type UiTreeDocument } from '@uiground/core'
import { loadTree } from '@uiground/dataset'
import { formatError, parsePositiveInt, parseScreenSize } from '../cli/parse.js'
import { createOutput } from '../output/io.js'
import { formatUiTreeLisp } from '../output/uiTreeLisp.js'
import { readJsonInput, writeTextOut } from '../utils/input.js'

export type LispCommandOptions = {
	bounds?: boolean
	states?: boolean
	compact?: boolean
	empty?: boolean
	maxDepth?: string
	minSize?: string
	screen?: string
	out?: string
}

/** Print a ui tree (or a collector payload) as S-expressions. */
export const runLisp = async (input: string, options: LispCommandOptions): Promise<void> => {
	const output = createOutput({})

	const maxDepth = parsePositiveInt(options.maxDepth, { allowZero: true })
	if (options.maxDepth !== undefined && maxDepth === undefined) {
		output.writeWarn('--max-depth must be a non-negative integer')
		process.exitCode = 2
		return
	}
	const minSize = parsePositiveInt(options.minSize, { allowZero: true })
	if (options.minSize !== undefined && minSize === undefined) {
		output.writeWarn('--min-size must be a non-negative integer')
		process.exitCode = 2
		return
	}
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

	let text: string
	try {
		text = formatUiTreeLisp(toDocument(read.value, fallbackScreen), {
			bounds: options.bounds,
			states: options.states,
			compact: options.compact,
			skipEmpty: options.empty === false,
			maxDepth,
			minSize,
		})
	} catch (error) {
		output.writeWarn(`failed to render tree: ${formatError(error)}`)
		process.exitCode = 1
		return
	}

	if (!options.out) {
		output.writeText(text)
		return
	}
	try {
		const target = await writeTextOut(options.out, text)
		output.writeWarn(`Wrote ${target}`)
	} catch (error) {
		output.writeWarn(`failed to write ${options.out}: ${formatError(error)}`)
		process.exitCode = 1
	}
}

/** Keep a ui tree document as-is (timestamp included); build one from a collector payload. */
const toDocument = (value: unknown, fallbackScreen: ScreenSize): UiTreeDocument => {
	const loaded = loadTree(value, fallbackScreen)
	const uiTree = toUiTreeDocument(loaded.root, loaded.screen)
	if (isRecord(value) && typeof value.timestamp === 'string') {
		return { ...uiTree, timestamp: value.timestamp }
	}
	return uiTree
}
