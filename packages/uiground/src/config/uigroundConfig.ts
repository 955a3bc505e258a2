import fs from 'node:fs'
import path from 'node:path'
import {
	isCanonicalRole,
	isRecord,
	SUBTREE_POLICIES,
	type CanonicalRole,
	type PipelineConfigOverrides,
	type ScreenSize,
	type SubtreePolicy,
} from '@uiground/core'

export type PipelineSectionConfig = {
	interactiveRoles?: CanonicalRole[]
	nonOccludingRoles?: CanonicalRole[]
	minVisibleArea?: number
	coverageRatio?: number
	subtreePolicy?: SubtreePolicy
	defaultScreen?: ScreenSize
}

export type DatasetSectionConfig = {
	imagePrefix?: string
}

export type UigroundConfig = {
	pipeline?: PipelineSectionConfig
	dataset?: DatasetSectionConfig
}

export type UigroundConfigLoadResult = {
	config: UigroundConfig
	configDir: string
}

type OptionSourceProvider = {
	getOptionValueSource: (key: string) => string | undefined
}

type Validated<T> = { ok: true; value: T } | { ok: false; error: string }
type ValidatedOptional<T> = { ok: true; value?: T } | { ok: false; error: string }

export const AUTO_CONFIG_CANDIDATES = ['.uiground/config.json', '.config/uiground.json', 'uiground.config.json']
const EXPECTED_SHAPE_HINT =
	'Expected shape: { pipeline?: { interactiveRoles?: string[], nonOccludingRoles?: string[], minVisibleArea?: number, coverageRatio?: number, subtreePolicy?: "geometry-first"|"state-pruning", defaultScreen?: { width: number, height: number } }, dataset?: { imagePrefix?: string } }.'

const invalidConfig = (configPath: string, message: string): null => {
	console.error(`Invalid uiground config at ${configPath}: ${message} ${EXPECTED_SHAPE_HINT}`)
	process.exitCode = 2
	return null
}

const invalidConfigPath = (configPath: string, message: string): null => {
	console.error(`uiground config error at ${configPath}: ${message}`)
	process.exitCode = 2
	return null
}

const validateOptionalString = (value: unknown, label: string): ValidatedOptional<string> => {
	if (value === undefined) {
		return { ok: true }
	}
	if (typeof value !== 'string') {
		return { ok: false, error: `${label} must be a string.` }
	}
	return { ok: true, value }
}

const validateOptionalNumber = (value: unknown, label: string, range: { min: number; max?: number }): ValidatedOptional<number> => {
	if (value === undefined) {
		return { ok: true }
	}
	if (typeof value !== 'number' || !Number.isFinite(value)) {
		return { ok: false, error: `${label} must be a number.` }
	}
	if (value < range.min || (range.max !== undefined && value > range.max)) {
		const bounds = range.max !== undefined ? `between ${range.min} and ${range.max}` : `>= ${range.min}`
		return { ok: false, error: `${label} must be ${bounds}.` }
	}
	return { ok: true, value }
}

const validateOptionalRoles = (value: unknown, label: string): ValidatedOptional<CanonicalRole[]> => {
	if (value === undefined) {
		return { ok: true }
	}
	if (!Array.isArray(value)) {
		return { ok: false, error: `${label} must be an array of role names.` }
	}
	const roles: CanonicalRole[] = []
	for (let i = 0; i < value.length; i++) {
		const item: unknown = value[i]
		if (typeof item !== 'string' || !isCanonicalRole(item)) {
			return { ok: false, error: `${label}[${i}] must be a canonical role name.` }
		}
		roles.push(item)
	}
	return { ok: true, value: roles }
}

const isSubtreePolicy = (value: string): value is SubtreePolicy => SUBTREE_POLICIES.some((policy) => policy === value)

const validateOptionalSubtreePolicy = (value: unknown, label: string): ValidatedOptional<SubtreePolicy> => {
	if (value === undefined) {
		return { ok: true }
	}
	if (typeof value !== 'string' || !isSubtreePolicy(value)) {
		return { ok: false, error: `${label} must be one of: ${SUBTREE_POLICIES.join(', ')}.` }
	}
	return { ok: true, value }
}

const validateOptionalScreen = (value: unknown, label: string): ValidatedOptional<ScreenSize> => {
	if (value === undefined) {
		return { ok: true }
	}
	if (!isRecord(value)) {
		return { ok: false, error: `${label} must be an object.` }
	}
	const { width, height } = value
	if (typeof width !== 'number' || !Number.isInteger(width) || width <= 0) {
		return { ok: false, error: `${label}.width must be a positive integer.` }
	}
	if (typeof height !== 'number' || !Number.isInteger(height) || height <= 0) {
		return { ok: false, error: `${label}.height must be a positive integer.` }
	}
	return { ok: true, value: { width, height } }
}

const validatePipelineConfig = (value: unknown): Validated<PipelineSectionConfig> => {
	if (!isRecord(value)) {
		return { ok: false, error: '"pipeline" must be an object.' }
	}

	const interactiveRoles = validateOptionalRoles(value.interactiveRoles, '"pipeline.interactiveRoles"')
	if (!interactiveRoles.ok) {
		return interactiveRoles
	}
	const nonOccludingRoles = validateOptionalRoles(value.nonOccludingRoles, '"pipeline.nonOccludingRoles"')
	if (!nonOccludingRoles.ok) {
		return nonOccludingRoles
	}
	const minVisibleArea = validateOptionalNumber(value.minVisibleArea, '"pipeline.minVisibleArea"', { min: 0 })
	if (!minVisibleArea.ok) {
		return minVisibleArea
	}
	const coverageRatio = validateOptionalNumber(value.coverageRatio, '"pipeline.coverageRatio"', { min: 0, max: 1 })
	if (!coverageRatio.ok) {
		return coverageRatio
	}
	const subtreePolicy = validateOptionalSubtreePolicy(value.subtreePolicy, '"pipeline.subtreePolicy"')
	if (!subtreePolicy.ok) {
		return subtreePolicy
	}
	const defaultScreen = validateOptionalScreen(value.defaultScreen, '"pipeline.defaultScreen"')
	if (!defaultScreen.ok) {
		return defaultScreen
	}

	const config: PipelineSectionConfig = {}
	if (interactiveRoles.value !== undefined) {
		config.interactiveRoles = interactiveRoles.value
	}
	if (nonOccludingRoles.value !== undefined) {
		config.nonOccludingRoles = nonOccludingRoles.value
	}
	if (minVisibleArea.value !== undefined) {
		config.minVisibleArea = minVisibleArea.value
	}
	if (coverageRatio.value !== undefined) {
		config.coverageRatio = coverageRatio.value
	}
	if (subtreePolicy.value !== undefined) {
		config.subtreePolicy = subtreePolicy.value
	}
	if (defaultScreen.value !== undefined) {
		config.defaultScreen = defaultScreen.value
	}
	return { ok: true, value: config }
}

const validateDatasetConfig = (value: unknown): Validated<DatasetSectionConfig> => {
	if (!isRecord(value)) {
		return { ok: false, error: '"dataset" must be an object.' }
	}
	const imagePrefix = validateOptionalString(value.imagePrefix, '"dataset.imagePrefix"')
	if (!imagePrefix.ok) {
		return imagePrefix
	}
	return { ok: true, value: imagePrefix.value !== undefined ? { imagePrefix: imagePrefix.value } : {} }
}

export const validateUigroundConfig = (value: unknown): Validated<UigroundConfig> => {
	if (!isRecord(value)) {
		return { ok: false, error: 'Config root must be an object.' }
	}

	const config: UigroundConfig = {}
	if (value.pipeline !== undefined) {
		const pipeline = validatePipelineConfig(value.pipeline)
		if (!pipeline.ok) {
			return pipeline
		}
		config.pipeline = pipeline.value
	}
	if (value.dataset !== undefined) {
		const dataset = validateDatasetConfig(value.dataset)
		if (!dataset.ok) {
			return dataset
		}
		config.dataset = dataset.value
	}
	return { ok: true, value: config }
}

export const resolveUigroundConfigPath = ({ cliPath, cwd }: { cliPath?: string; cwd: string }): string | null => {
	if (cliPath) {
		const resolved = path.isAbsolute(cliPath) ? cliPath : path.resolve(cwd, cliPath)
		if (!fs.existsSync(resolved)) {
			return invalidConfigPath(resolved, 'File not found.')
		}
		return resolved
	}

	for (const candidate of AUTO_CONFIG_CANDIDATES) {
		const resolved = path.resolve(cwd, candidate)
		if (fs.existsSync(resolved)) {
			return resolved
		}
	}

	return null
}

export const loadUigroundConfig = (resolvedPath: string): UigroundConfigLoadResult | null => {
	let raw: string
	try {
		raw = fs.readFileSync(resolvedPath, 'utf8')
	} catch (error) {
		return invalidConfigPath(resolvedPath, error instanceof Error ? error.message : String(error))
	}

	let parsed: unknown
	try {
		parsed = JSON.parse(raw)
	} catch (error) {
		return invalidConfig(resolvedPath, error instanceof Error ? error.message : String(error))
	}

	const validated = validateUigroundConfig(parsed)
	if (!validated.ok) {
		return invalidConfig(resolvedPath, validated.error)
	}

	return { config: validated.value, configDir: path.dirname(resolvedPath) }
}

/**
 * Resolve and load the config for a command.
 * `undefined` means "no config" (auto-discovery missed); `null` means an error was already reported.
 */
export const loadConfigForCommand = (cliPath: string | undefined, cwd: string = process.cwd()): UigroundConfigLoadResult | undefined | null => {
	const resolvedPath = resolveUigroundConfigPath({ cliPath, cwd })
	if (!resolvedPath) {
		return cliPath ? null : undefined
	}
	return loadUigroundConfig(resolvedPath)
}

const mergeOption = <T>(command: OptionSourceProvider, key: string, cliValue: T | undefined, configValue: T | undefined): T | undefined => {
	if (command.getOptionValueSource(key) === 'cli') {
		return cliValue
	}
	if (configValue !== undefined) {
		return configValue
	}
	return cliValue
}

/** CLI-level pipeline flags, already parsed. */
export type PipelineFlags = {
	minArea?: number
	coverage?: number
	policy?: SubtreePolicy
	screen?: ScreenSize
}

/** Flags win over the config file; the config file wins over core defaults. */
export const mergePipelineOverrides = (
	flags: PipelineFlags,
	command: OptionSourceProvider,
	configResult: UigroundConfigLoadResult | undefined,
): PipelineConfigOverrides => {
	const pipeline = configResult?.config.pipeline ?? {}
	const overrides: PipelineConfigOverrides = {}

	if (pipeline.interactiveRoles) {
		overrides.interactiveRoles = pipeline.interactiveRoles
	}
	if (pipeline.nonOccludingRoles) {
		overrides.nonOccludingRoles = pipeline.nonOccludingRoles
	}

	const minVisibleArea = mergeOption(command, 'minArea', flags.minArea, pipeline.minVisibleArea)
	if (minVisibleArea !== undefined) {
		overrides.minVisibleArea = minVisibleArea
	}
	const coverageRatio = mergeOption(command, 'coverage', flags.coverage, pipeline.coverageRatio)
	if (coverageRatio !== undefined) {
		overrides.coverageRatio = coverageRatio
	}
	const subtreePolicy = mergeOption(command, 'policy', flags.policy, pipeline.subtreePolicy)
	if (subtreePolicy !== undefined) {
		overrides.subtreePolicy = subtreePolicy
	}
	const defaultScreen = mergeOption(command, 'screen', flags.screen, pipeline.defaultScreen)
	if (defaultScreen !== undefined) {
		overrides.defaultScreen = defaultScreen
	}
	return overrides
}

export const parseSubtreePolicy = (value: string | undefined): SubtreePolicy | undefined =>
	value !== undefined && isSubtreePolicy(value) ? value : undefined
