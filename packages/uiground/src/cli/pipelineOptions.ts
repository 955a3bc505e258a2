import type { Command } from 'commander'
import { SUBTREE_POLICIES, type PipelineConfigOverrides } from '@uiground/core'
import {
	loadConfigForCommand,
	mergePipelineOverrides,
	parseSubtreePolicy,
	type PipelineFlags,
	type UigroundConfigLoadResult,
} from '../config/uigroundConfig.js'
import type { Output } from '../output/io.js'
import { parseNumber, parseScreenSize } from './parse.js'

/** Raw pipeline flags as commander hands them over. */
export type PipelineOptions = {
	config?: string
	minArea?: string
	coverage?: string
	policy?: string
	screen?: string
}

export type ResolvedPipelineOptions = {
	overrides: PipelineConfigOverrides
	configResult: UigroundConfigLoadResult | undefined
}

/** Attach the pipeline flags shared by `extract` and `dataset process`. */
export const addPipelineOptions = (command: Command): Command =>
	command
		.option('--config <path>', 'Path to uiground config file')
		.option('--min-area <px>', 'Smallest visible area (px²) a node needs (default: 25)')
		.option('--coverage <ratio>', 'Covered fraction at which a candidate counts as occluded (default: 0.5)')
		.option('--policy <policy>', `Subtree policy: ${SUBTREE_POLICIES.join(' | ')} (default: geometry-first)`)
		.option('--screen <WxH>', 'Screen size used when the snapshot reports none (default: 1920x1080)')

/**
 * Validate flags, load the config file and merge both.
 * Returns null after reporting a usage or config error (exit code 2).
 */
export const resolvePipelineOptions = (options: PipelineOptions, command: Command, output: Output): ResolvedPipelineOptions | null => {
	const flags: PipelineFlags = {}

	if (options.minArea !== undefined) {
		const minArea = parseNumber(options.minArea)
		if (minArea === undefined || minArea < 0) {
			output.writeWarn('--min-area must be a non-negative number')
			process.exitCode = 2
			return null
		}
		flags.minArea = minArea
	}

	if (options.coverage !== undefined) {
		const coverage = parseNumber(options.coverage)
		if (coverage === undefined || coverage < 0 || coverage > 1) {
			output.writeWarn('--coverage must be a number between 0 and 1')
			process.exitCode = 2
			return null
		}
		flags.coverage = coverage
	}

	if (options.policy !== undefined) {
		const policy = parseSubtreePolicy(options.policy)
		if (!policy) {
			output.writeWarn(`--policy must be one of: ${SUBTREE_POLICIES.join(', ')}`)
			process.exitCode = 2
			return null
		}
		flags.policy = policy
	}

	if (options.screen !== undefined) {
		const screen = parseScreenSize(options.screen)
		if (!screen) {
			output.writeWarn('--screen must look like 1920x1080')
			process.exitCode = 2
			return null
		}
		flags.screen = screen
	}

	const configResult = loadConfigForCommand(options.config)
	if (configResult === null) {
		return null
	}

	return { overrides: mergePipelineOverrides(flags, command, configResult), configResult }
}
