import fs from 'node:fs/promises'
import path from 'node:path'
import { fileURLToPath, pathToFileURL } from 'node:url'
import { DEFAULT_PIPELINE_CONFIG } from '@uiground/core'
import { formatError } from '../cli/parse.js'
import { createOutput } from '../output/io.js'

export type ConfigInitOptions = {
	path?: string
	force?: boolean
}

const DEFAULT_CONFIG_PATH = '.uiground/config.json'

export const buildConfigTemplate = (schemaRef: string) => ({
	$schema: schemaRef,
	pipeline: {
		minVisibleArea: DEFAULT_PIPELINE_CONFIG.minVisibleArea,
		coverageRatio: DEFAULT_PIPELINE_CONFIG.coverageRatio,
		subtreePolicy: DEFAULT_PIPELINE_CONFIG.subtreePolicy,
		defaultScreen: { ...DEFAULT_PIPELINE_CONFIG.defaultScreen },
	},
	dataset: {
		imagePrefix: 'benchmark',
	},
})

const resolveConfigPath = (cwd: string, targetPath?: string): string => {
	if (!targetPath) {
		return path.resolve(cwd, DEFAULT_CONFIG_PATH)
	}
	return path.isAbsolute(targetPath) ? targetPath : path.resolve(cwd, targetPath)
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException => error instanceof Error && 'code' in error

export const resolveSchemaPath = (): string =>
	// <packageRoot>/src/commands/configInit.ts -> <packageRoot>/schemas/uiground.config.schema.json
	fileURLToPath(new URL('../../schemas/uiground.config.schema.json', import.meta.url))

export const runConfigInit = async (options: ConfigInitOptions): Promise<void> => {
	const output = createOutput({})
	const targetPath = resolveConfigPath(process.cwd(), options.path)

	try {
		await fs.mkdir(path.dirname(targetPath), { recursive: true })
	} catch (error) {
		output.writeWarn(`Failed to create config directory ${path.dirname(targetPath)}: ${formatError(error)}`)
		process.exitCode = 2
		return
	}

	const schemaPath = resolveSchemaPath()
	try {
		const stats = await fs.stat(schemaPath)
		if (!stats.isFile()) {
			output.writeWarn(`Schema path is not a file: ${schemaPath}`)
			process.exitCode = 2
			return
		}
	} catch (error) {
		output.writeWarn(`Schema not found at ${schemaPath}: ${formatError(error)}`)
		process.exitCode = 2
		return
	}

	const template = buildConfigTemplate(pathToFileURL(schemaPath).href)
	const contents = `${JSON.stringify(template, null, '\t')}\n`
	try {
		await fs.writeFile(targetPath, contents, { encoding: 'utf8', flag: options.force ? 'w' : 'wx' })
	} catch (error) {
		if (isErrnoException(error) && error.code === 'EEXIST') {
			output.writeWarn(`Config already exists at ${targetPath}. Use --force to overwrite.`)
		} else {
			output.writeWarn(`Failed to write config at ${targetPath}: ${formatError(error)}`)
		}
		process.exitCode = 2
		return
	}

	output.writeHuman(`Created uiground config at ${targetPath}`)
}
