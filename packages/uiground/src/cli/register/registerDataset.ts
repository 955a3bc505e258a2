import type { Command } from 'commander'
import { runDatasetProcess } from '../../commands/datasetProcess.js'
import { runDatasetBuild } from '../../commands/datasetBuild.js'
import { runDatasetClean } from '../../commands/datasetClean.js'
import { addPipelineOptions } from '../pipelineOptions.js'

export function registerDataset(program: Command): void {
	const dataset = program.command('dataset').alias('ds').description('Process and package capture directories')

	const processCommand = dataset
		.command('process')
		.argument('<root>', 'Directory with one sub-directory per capture')
		.description('Write filtered.json beside every ui_tree.json + screenshot_cropped.png')
		.option('--image-prefix <prefix>', 'Prefix for image_filename (default: root directory name)')
		.option('--json', 'Print a JSON summary')
		.option('-q, --quiet', 'Suppress per-dataset lines')

	addPipelineOptions(processCommand)
		.addHelpText('after', '\nExamples:\n  $ uiground dataset process ./captures\n  $ uiground dataset process ./captures --image-prefix bench --json\n')
		.action(async (root, options, command) => {
			await runDatasetProcess(root, options, command)
		})

	dataset
		.command('build')
		.argument('<source>', 'Directory of processed captures')
		.argument('<target>', 'Output directory for images/ and test.jsonl')
		.description('Package processed captures into a benchmark')
		.option('--json', 'Print a JSON summary')
		.option('-q, --quiet', 'Suppress progress lines')
		.addHelpText('after', '\nExamples:\n  $ uiground dataset build ./captures ./benchmark\n')
		.action(async (source, target, options) => {
			await runDatasetBuild(source, target, options)
		})

	dataset
		.command('clean')
		.argument('<root>', 'Directory with one sub-directory per capture')
		.description('Remove captures whose ui tree root has no children')
		.option('--dry-run', 'List what would be removed')
		.option('--json', 'Print a JSON summary')
		.option('-q, --quiet', 'Suppress progress lines')
		.addHelpText('after', '\nExamples:\n  $ uiground dataset clean ./captures --dry-run\n  $ uiground dataset clean ./captures\n')
		.action(async (root, options) => {
			await runDatasetClean(root, options)
		})
}
