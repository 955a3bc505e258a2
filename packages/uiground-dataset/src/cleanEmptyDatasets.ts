import fs from 'node:fs/promises'
import path from 'node:path'
import { isRecord } from '@uiground/core'
import { fileExists, listDatasetDirs, uiTreePath } from './paths.js'
import { readJsonFile } from './json.js'

export type CleanEmptyDatasetsOptions = {
	root: string
	/** Report what would be removed without deleting anything. */
	dryRun?: boolean
}

export type CleanEmptyDatasetsResult = {
	removed: string[]
	kept: string[]
	errors: Array<{ name: string; error: string }>
}

/**
 * Remove dataset directories whose `ui_tree.json` root has no children
 * (captures of blank or failed pages). Directories without a tree are left alone.
 */
export const cleanEmptyDatasets = async (options: CleanEmptyDatasetsOptions): Promise<CleanEmptyDatasetsResult> => {
	const result: CleanEmptyDatasetsResult = { removed: [], kept: [], errors: [] }

	for (const name of await listDatasetDirs(options.root)) {
		const datasetDir = path.join(options.root, name)
		const treeFile = uiTreePath(datasetDir)
		if (!(await fileExists(treeFile))) {
			continue
		}

		const read = await readJsonFile(treeFile)
		if (!read.ok) {
			result.errors.push({ name, error: read.error.message })
			continue
		}

		if (!isEmptyTree(read.value)) {
			result.kept.push(name)
			continue
		}

		if (!options.dryRun) {
			await fs.rm(datasetDir, { recursive: true, force: true })
		}
		result.removed.push(name)
	}

	return result
}

const isEmptyTree = (value: unknown): boolean => {
	if (!isRecord(value) || !isRecord(value.root)) {
		return true
	}
	const children = value.root.children
	return !Array.isArray(children) || children.length === 0
}
