#!/usr/bin/env -S node --import tsx
import { createProgram } from './cli/program.js'
import { registerTree } from './cli/register/registerTree.js'
import { registerExtract } from './cli/register/registerExtract.js'
import { registerDataset } from './cli/register/registerDataset.js'
import { registerConfig } from './cli/register/registerConfig.js'

const main = async (): Promise<void> => {
	const program = createProgram()
	registerTree(program)
	registerExtract(program)
	registerDataset(program)
	registerConfig(program)
	await program.parseAsync(process.argv)
}

main().catch((error) => {
	console.error(error)
	process.exit(1)
})
