import { dirExists, packageBenchmark, type PackageBenchmarkResult } from '@uiground/dataset'
import { formatError } from '../cli/parse.js'
import { createOutput } from '../output/io.js'
import { resolveOutPath } from '../utils/input.js'

export type DatasetBuildOptions = {
	json?: boolean
	quiet?: boolean
}

/** Package processed captures into `images/` + `test.jsonl`. */
export const runDatasetBuild = async (source: string, target: string, options: DatasetBuildOptions): Promise<void> => {
	const output = createOutput(options)
	const sourceRoot = resolveOutPath(source)
	const targetRoot = resolveOutPath(target)

	if (!(await dirExists(sourceRoot))) {
		output.writeWarn(`Dataset root not found: ${sourceRoot}`)
		process.exitCode = 1
		return
	}

	let result: PackageBenchmarkResult
	try {
		result = await packageBenchmark({ sourceRoot, targetRoot })
	} catch (error) {
		output.writeWarn(`failed to build ${targetRoot}: ${formatError(error)}`)
		process.exitCode = 1
		return
	}

	for (const name of result.missing) {
		output.writeWarn(`${name}: skipped (no filtered.json or screenshot)`)
	}
	for (const { name, error } of result.errors) {
		output.writeWarn(`${name}: failed (${error})`)
	}

	if (options.json) {
		output.writeJson(result)
	} else {
		output.writeHuman(`Wrote ${result.records} record(s) to ${result.jsonlPath}`)
	}

	if (result.errors.length > 0) {
		process.exitCode = 1
	}
}
