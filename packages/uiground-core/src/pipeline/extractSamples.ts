import type { CanonicalNode, RawAXNode, RawTreeNode, Sample, ScreenSize, VisibleRecord } from '../model/types.js'
import { resolvePipelineConfig, type PipelineConfigOverrides } from '../config.js'
import { createDiagnostics, type Diagnostics } from '../diagnostics.js'
import { screenRect } from '../model/geometry.js'
import { buildTree, buildTreeFromNested } from '../tree/buildTree.js'
import { walkVisible } from '../visibility/walkVisible.js'
import { selectCandidates } from '../selection/selectCandidates.js'
import { resolveOcclusion } from '../selection/resolveOcclusion.js'

export type ExtractSamplesOptions = {
	/** Screen the snapshot was captured on. Falls back to `config.defaultScreen`. */
	screen?: ScreenSize
	/** A full `PipelineConfig` or partial overrides of the defaults. */
	config?: PipelineConfigOverrides
}

export type ExtractSamplesResult = {
	samples: Sample[]
	tree: CanonicalNode | null
	records: VisibleRecord[]
	candidates: VisibleRecord[]
	screen: ScreenSize
	diagnostics: Diagnostics
}

/** Flat snapshot → samples. Pure: the same snapshot always yields the same result. */
export const extractSamples = (rawNodes: readonly RawAXNode[], options: ExtractSamplesOptions = {}): ExtractSamplesResult => {
	const config = resolvePipelineConfig(options.config)
	const screen = options.screen ?? config.defaultScreen
	const { root, diagnostics } = buildTree(rawNodes, { screen })
	return extractSamplesFromTree(root, { screen, config, diagnostics })
}

/** Nested snapshot → samples. */
export const extractSamplesFromNested = (rawRoot: RawTreeNode | null, options: ExtractSamplesOptions = {}): ExtractSamplesResult => {
	const config = resolvePipelineConfig(options.config)
	const screen = options.screen ?? config.defaultScreen
	const { root, diagnostics } = buildTreeFromNested(rawRoot, { screen })
	return extractSamplesFromTree(root, { screen, config, diagnostics })
}

/** Canonical tree → samples. Entry point for `ui_tree.json` documents. */
export const extractSamplesFromTree = (
	root: CanonicalNode | null,
	options: ExtractSamplesOptions & { diagnostics?: Diagnostics } = {},
): ExtractSamplesResult => {
	const config = resolvePipelineConfig(options.config)
	const screen = options.screen ?? config.defaultScreen
	const diagnostics = options.diagnostics ?? createDiagnostics()

	const records = walkVisible(root, screenRect(screen), {
		minVisibleArea: config.minVisibleArea,
		subtreePolicy: config.subtreePolicy,
	})
	const candidates = selectCandidates(records, {
		interactiveRoles: config.interactiveRoles,
		minVisibleArea: config.minVisibleArea,
	})
	const samples = resolveOcclusion(candidates, records, {
		nonOccludingRoles: config.nonOccludingRoles,
		coverageRatio: config.coverageRatio,
	})

	return { samples, tree: root, records, candidates, screen, diagnostics }
}
