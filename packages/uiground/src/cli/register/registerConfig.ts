import type { Command } from 'commander'
import { runConfigInit } from '../../commands/configInit.js'

export function registerConfig(program: Command): void {
	const config = program.command('config').alias('cfg').description('Manage uiground config files')

	config
		.command('init')
		.description('Create a uiground config file')
		.option('--path <file>', 'Path to write the config file (default: .uiground/config.json)')
		.option('--force', 'Overwrite existing config file')
		.addHelpText('after', '\nExamples:\n  $ uiground config init\n  $ uiground config init --path uiground.config.json\n')
		.action(async (options) => {
			await runConfigInit(options)
		})
}
