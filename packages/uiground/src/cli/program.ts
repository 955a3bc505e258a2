import { Command } from 'commander'

export const CLI_VERSION = '0.1.0'

export function createProgram(): Command {
	const program = new Command()

	program
		.name('uiground')
		.description('Extract GUI grounding samples from accessibility snapshots')
		.version(CLI_VERSION)
		.configureOutput({
			outputError: (str, write) => write(str),
		})
		.showSuggestionAfterError(true)
		.exitOverride((error) => {
			if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
				process.exit(0)
			}
			console.error(error.message)
			process.exit(2)
		})

	return program
}
