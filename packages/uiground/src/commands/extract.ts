import type { Command } from 'commander'
import { buildSampleDocument, extractSamplesFromTree, resolvePipelineConfig, type SampleDocument } from '@uiground/core'
import { loadTree, SCREENSHOT_FILENAME } from '@uiground/dataset'
import { resolvePipelineOptions, type PipelineOptions } from '../cli/pipelineOptions.js'
import { formatError } from '../cli/parse.js'
import { createOutput } from '../output/io.js'
import { formatSampleLine, writeDiagnostics } from '../output/format.js'
import { readJsonInput, writeJsonOut } from '../utils/input.js'

export type ExtractOptions = PipelineOptions & {
	image?: string
	out?: string
	json?: boolean
	quiet?: boolean
}

/** Run the sample pipeline on one snapshot and print or write the `filtered.json` document. */
export const runExtract = async (input: string, options: ExtractOptions, command: Command): Promise<void> => {
	const output = createOutput(options)

	const resolved = resolvePipelineOptions(options, command, output)
	if (!resolved) {
		return
	}
	const config = resolvePipelineConfig(resolved.overrides)

	const read = await readJsonInput(input)
	if (!read.ok) {
		output.writeWarn(`failed to read input: ${read.error.message}`)
		process.exitCode = 1
		return
	}

	let sampleDocument: SampleDocument
	try {
		const loaded = loadTree(read.value, config.defaultScreen)
		const result = extractSamplesFromTree(loaded.root, { screen: loaded.screen, config, diagnostics: loaded.diagnostics })
		writeDiagnostics(output, result.diagnostics)
		sampleDocument = buildSampleDocument(result.samples, { filename: options.image ?? SCREENSHOT_FILENAME, size: result.screen })
	} catch (error) {
		output.writeWarn(`failed to extract samples: ${formatError(error)}`)
		process.exitCode = 1
		return
	}

	if (options.out) {
		try {
			const target = await writeJsonOut(options.out, sampleDocument)
			output.writeHuman(`Wrote ${sampleDocument.sample_count} sample(s) to ${target}`)
		} catch (error) {
			output.writeWarn(`failed to write ${options.out}: ${formatError(error)}`)
			process.exitCode = 1
			return
		}
	}

	if (options.json) {
		output.writeJson(sampleDocument)
		return
	}
	if (options.out) {
		return
	}

	if (sampleDocument.sample_count === 0) {
		output.writeWarn('No samples found.')
		return
	}
	output.writeText(sampleDocument.test_samples.map(formatSampleLine).join('\n'))
}
