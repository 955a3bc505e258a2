import type { Command } from 'commander'
import { runExtract } from '../../commands/extract.js'
import { addPipelineOptions } from '../pipelineOptions.js'

export function registerExtract(program: Command): void {
	const extract = program
		.command('extract')
		.alias('samples')
		.argument('<input>', 'ui_tree.json or collector payload, or - for stdin')
		.description('Extract visible, unoccluded click targets from one snapshot')
		.option('--image <filename>', 'image_filename to record (default: screenshot_cropped.png)')
		.option('--out <file>', 'Write filtered.json to a file')
		.option('--json', 'Print the samples document as JSON')
		.option('-q, --quiet', 'Suppress progress lines')

	addPipelineOptions(extract)
		.addHelpText(
			'after',
			'\nExamples:\n  $ uiground extract captures/home/ui_tree.json\n  $ uiground extract layout.json --json --screen 1280x720\n  $ uiground extract ui_tree.json --policy state-pruning --min-area 100\n  $ uiground extract ui_tree.json --out filtered.json --image home.png\n',
		)
		.action(async (input, options, command) => {
			await runExtract(input, options, command)
		})
}
