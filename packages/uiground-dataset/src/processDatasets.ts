import path from 'node:path'
import Emittery from 'emittery'
import {
	buildSampleDocument,
	buildTree,
	extractSamplesFromTree,
	isUiTreeDocument,
	parseUiTreeDocument,
	readLayoutSnapshot,
	resolvePipelineConfig,
	type CanonicalNode,
	type Diagnostics,
	type PipelineConfigOverrides,
	type ScreenSize,
} from '@uiground/core'
import type { DatasetEventMap, DatasetFinishedEvent } from './events.js'
import { fileExists, filteredPath, listDatasetDirs, screenshotPath, SCREENSHOT_FILENAME, UI_TREE_FILENAME, uiTreePath } from './paths.js'
import { formatError, readJsonFile, writeJsonFile } from './json.js'

/** Options for processing every dataset under a root directory. */
export type ProcessDatasetsOptions = {
	/** Directory holding one sub-directory per capture. */
	root: string
	/**
	 * Prefix for `image_filename` in the written samples.
	 * Defaults to the root's basename, giving `<root>/<name>/screenshot_cropped.png`.
	 */
	imagePrefix?: string
	/** Pipeline overrides (thresholds, role sets, subtree policy). */
	config?: PipelineConfigOverrides
}

/** Handle returned by createDatasetProcessor. */
export type DatasetProcessor = {
	/**
	 * Event emitter for per-dataset results.
	 * Subscribe to 'processed', 'skipped', 'failed' and 'finished'.
	 */
	events: Emittery<DatasetEventMap>
	/** Process all datasets sequentially. Resolves with the same summary as the 'finished' event. */
	run: () => Promise<DatasetFinishedEvent>
}

/**
 * Create a processor that turns each `<root>/<name>/ui_tree.json` into a `filtered.json`.
 * Datasets without a tree or screenshot are skipped; unreadable ones fail without stopping the run.
 */
export const createDatasetProcessor = (options: ProcessDatasetsOptions): DatasetProcessor => {
	const events = new Emittery<DatasetEventMap>()
	const config = resolvePipelineConfig(options.config)
	const imagePrefix = options.imagePrefix ?? path.basename(path.resolve(options.root))

	const run = async (): Promise<DatasetFinishedEvent> => {
		const names = await listDatasetDirs(options.root)
		let succeeded = 0
		let skipped = 0
		let failed = 0

		for (const name of names) {
			const datasetDir = path.join(options.root, name)

			if (!(await fileExists(uiTreePath(datasetDir)))) {
				skipped++
				await events.emit('skipped', { name, reason: `${UI_TREE_FILENAME} not found` })
				continue
			}
			if (!(await fileExists(screenshotPath(datasetDir)))) {
				skipped++
				await events.emit('skipped', { name, reason: `${SCREENSHOT_FILENAME} not found` })
				continue
			}

			const read = await readJsonFile(uiTreePath(datasetDir))
			if (!read.ok) {
				failed++
				await events.emit('failed', { name, error: read.error.message })
				continue
			}

			let loaded: { root: CanonicalNode | null; screen: ScreenSize; diagnostics: Diagnostics }
			try {
				loaded = loadTree(read.value, config.defaultScreen)
			} catch (error) {
				failed++
				await events.emit('failed', { name, error: formatError(error) })
				continue
			}

			const result = extractSamplesFromTree(loaded.root, { screen: loaded.screen, config, diagnostics: loaded.diagnostics })
			const document = buildSampleDocument(result.samples, {
				filename: path.posix.join(imagePrefix, name, SCREENSHOT_FILENAME),
				size: result.screen,
			})
			const outputPath = path.resolve(filteredPath(datasetDir))
			try {
				await writeJsonFile(outputPath, document)
			} catch (error) {
				failed++
				await events.emit('failed', { name, error: formatError(error) })
				continue
			}

			succeeded++
			await events.emit('processed', { name, outputPath, sampleCount: result.samples.length, diagnostics: result.diagnostics })
		}

		const summary: DatasetFinishedEvent = { total: names.length, succeeded, skipped, failed }
		await events.emit('finished', summary)
		return summary
	}

	return { events, run }
}

/**
 * Accept either a `ui_tree.json` document or a raw collector payload.
 * Throws PreconditionError when neither shape matches.
 */
export const loadTree = (
	value: unknown,
	defaultScreen: ScreenSize,
): { root: CanonicalNode | null; screen: ScreenSize; diagnostics: Diagnostics } => {
	if (isUiTreeDocument(value)) {
		return parseUiTreeDocument(value)
	}
	const snapshot = readLayoutSnapshot(value)
	const screen = snapshot.screen ?? defaultScreen
	const { root, diagnostics } = buildTree(snapshot.nodes, { screen })
	return { root, screen, diagnostics }
}
