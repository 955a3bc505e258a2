import type { Command } from 'commander'
import { createDatasetProcessor, dirExists, type DatasetFinishedEvent, type DatasetProcessedEvent } from '@uiground/dataset'
import { resolvePipelineOptions, type PipelineOptions } from '../cli/pipelineOptions.js'
import { formatError } from '../cli/parse.js'
import { createOutput } from '../output/io.js'
import { diagnosticsToJson, writeDiagnostics } from '../output/format.js'
import { resolveOutPath } from '../utils/input.js'

export type DatasetProcessOptions = PipelineOptions & {
	imagePrefix?: string
	json?: boolean
	quiet?: boolean
}

/** Write `filtered.json` for every capture under a dataset root. */
export const runDatasetProcess = async (root: string, options: DatasetProcessOptions, command: Command): Promise<void> => {
	const output = createOutput(options)

	const resolved = resolvePipelineOptions(options, command, output)
	if (!resolved) {
		return
	}

	const rootPath = resolveOutPath(root)
	if (!(await dirExists(rootPath))) {
		output.writeWarn(`Dataset root not found: ${rootPath}`)
		process.exitCode = 1
		return
	}

	const imagePrefix = options.imagePrefix ?? resolved.configResult?.config.dataset?.imagePrefix
	const processor = createDatasetProcessor({ root: rootPath, imagePrefix, config: resolved.overrides })
	const processed: DatasetProcessedEvent[] = []

	processor.events.on('processed', (event) => {
		processed.push(event)
		output.writeHuman(`${event.name}: ${event.sampleCount} sample(s) -> ${event.outputPath}`)
		writeDiagnostics(output, event.diagnostics, event.name)
	})
	processor.events.on('skipped', (event) => {
		output.writeWarn(`${event.name}: skipped (${event.reason})`)
	})
	processor.events.on('failed', (event) => {
		output.writeWarn(`${event.name}: failed (${event.error})`)
	})

	let summary: DatasetFinishedEvent
	try {
		summary = await processor.run()
	} catch (error) {
		output.writeWarn(`failed to process ${rootPath}: ${formatError(error)}`)
		process.exitCode = 1
		return
	} finally {
		processor.events.clearListeners()
	}

	if (options.json) {
		output.writeJson({
			...summary,
			datasets: processed.map((event) => ({
				name: event.name,
				outputPath: event.outputPath,
				sampleCount: event.sampleCount,
				diagnostics: diagnosticsToJson(event.diagnostics),
			})),
		})
	} else {
		output.writeHuman(`Processed ${summary.succeeded}/${summary.total} dataset(s), ${summary.skipped} skipped, ${summary.failed} failed`)
	}

	if (summary.failed > 0) {
		process.exitCode = 1
	}
}
