import type { CanonicalRole } from './roles/normalizeRole.js'
import type { ScreenSize } from './model/types.js'

/**
 * How node states affect traversal.
 * - `geometry-first`: only geometry prunes; states matter at candidate selection.
 * - `state-pruning`: a collapsed/hidden/invisible node drops its whole subtree.
 */
export type SubtreePolicy = 'geometry-first' | 'state-pruning'

export type PipelineConfig = {
	/** Roles a sample may have. */
	interactiveRoles: ReadonlySet<CanonicalRole>
	/** Roles that never occlude an element painted below them. */
	nonOccludingRoles: ReadonlySet<CanonicalRole>
	/** Smallest visible area (px²) a node needs to be kept. */
	minVisibleArea: number
	/** Fraction of a candidate's visible area a later element must cover to occlude it. */
	coverageRatio: number
	subtreePolicy: SubtreePolicy
	/** Screen used when the snapshot does not report a viewport. */
	defaultScreen: ScreenSize
}

export const INTERACTIVE_ROLES: ReadonlySet<CanonicalRole> = new Set([
	'button',
	'link',
	'textfield',
	'textarea',
	'checkbox',
	'radiobutton',
	'menuitem',
	'tab',
	'combobox',
	'listbox',
	'slider',
])

/** Text and layout groups. Overlapping them does not block a click. */
export const NON_OCCLUDING_ROLES: ReadonlySet<CanonicalRole> = new Set([
	'label',
	'panel',
	// Also interactive. `List` and `DescriptionList` map to listbox too, and those wrap whole rows of controls
	'listbox',
	'listitem',
	'window',
	'desktop',
	'separator',
	'unknown',
])

export const SUBTREE_POLICIES: readonly SubtreePolicy[] = ['geometry-first', 'state-pruning']

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
	interactiveRoles: INTERACTIVE_ROLES,
	nonOccludingRoles: NON_OCCLUDING_ROLES,
	minVisibleArea: 25,
	coverageRatio: 0.5,
	subtreePolicy: 'geometry-first',
	defaultScreen: { width: 1920, height: 1080 },
}

/** Overrides as they arrive from a config file or CLI flags. */
export type PipelineConfigOverrides = {
	interactiveRoles?: Iterable<CanonicalRole>
	nonOccludingRoles?: Iterable<CanonicalRole>
	minVisibleArea?: number
	coverageRatio?: number
	subtreePolicy?: SubtreePolicy
	defaultScreen?: ScreenSize
}

export const resolvePipelineConfig = (overrides?: PipelineConfigOverrides): PipelineConfig => ({
	interactiveRoles: overrides?.interactiveRoles ? new Set(overrides.interactiveRoles) : DEFAULT_PIPELINE_CONFIG.interactiveRoles,
	nonOccludingRoles: overrides?.nonOccludingRoles ? new Set(overrides.nonOccludingRoles) : DEFAULT_PIPELINE_CONFIG.nonOccludingRoles,
	minVisibleArea: overrides?.minVisibleArea ?? DEFAULT_PIPELINE_CONFIG.minVisibleArea,
	coverageRatio: overrides?.coverageRatio ?? DEFAULT_PIPELINE_CONFIG.coverageRatio,
	subtreePolicy: overrides?.subtreePolicy ?? DEFAULT_PIPELINE_CONFIG.subtreePolicy,
	defaultScreen: overrides?.defaultScreen ?? DEFAULT_PIPELINE_CONFIG.defaultScreen,
})
