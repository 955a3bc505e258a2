import { cleanEmptyDatasets, dirExists, type CleanEmptyDatasetsResult } from '@uiground/dataset'
import { formatError } from '../cli/parse.js'
import { createOutput } from '../output/io.js'
import { resolveOutPath } from '../utils/input.js'

export type DatasetCleanOptions = {
	dryRun?: boolean
	json?: boolean
	quiet?: boolean
}

/** Delete captures whose ui tree has nothing under the root. */
export const runDatasetClean = async (root: string, options: DatasetCleanOptions): Promise<void> => {
	const output = createOutput(options)
	const rootPath = resolveOutPath(root)

	if (!(await dirExists(rootPath))) {
		output.writeWarn(`Dataset root not found: ${rootPath}`)
		process.exitCode = 1
		return
	}

	let result: CleanEmptyDatasetsResult
	try {
		result = await cleanEmptyDatasets({ root: rootPath, dryRun: options.dryRun })
	} catch (error) {
		output.writeWarn(`failed to clean ${rootPath}: ${formatError(error)}`)
		process.exitCode = 1
		return
	}

	for (const { name, error } of result.errors) {
		output.writeWarn(`${name}: failed (${error})`)
	}

	if (options.json) {
		output.writeJson({ dryRun: options.dryRun === true, ...result })
	} else {
		const verb = options.dryRun ? 'Would remove' : 'Removed'
		for (const name of result.removed) {
			output.writeHuman(`${verb} ${name}`)
		}
		output.writeHuman(`${verb} ${result.removed.length} empty dataset(s), kept ${result.kept.length}`)
	}

	if (result.errors.length > 0) {
		process.exitCode = 1
	}
}
