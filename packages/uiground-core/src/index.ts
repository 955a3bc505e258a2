export type {
	AXValue,
	AXProperty,
	AXIgnoredReason,
	Bounds,
	RawAXNode,
	RawTreeNode,
	CanonicalNode,
	ScreenSize,
	ClipRect,
	VisibleRecord,
	Sample,
	SampleDocument,
} from './model/types.js'
export { rectFromBounds, screenRect, intersectRects, rectArea, containsPoint, containsRect, centerOf, rectToTuple } from './model/geometry.js'

export { PreconditionError, isPreconditionError } from './errors.js'
export type { Diagnostics } from './diagnostics.js'
export { createDiagnostics, recordUnmappedRole, topUnmappedRoles, countUnmappedRoles } from './diagnostics.js'

export type { SubtreePolicy, PipelineConfig, PipelineConfigOverrides } from './config.js'
export {
	DEFAULT_PIPELINE_CONFIG,
	INTERACTIVE_ROLES,
	NON_OCCLUDING_ROLES,
	SUBTREE_POLICIES,
	resolvePipelineConfig,
} from './config.js'

export type { CanonicalRole } from './roles/normalizeRole.js'
export { normalizeRole, isCanonicalRole, CANONICAL_ROLES, UNKNOWN_ROLE } from './roles/normalizeRole.js'
export type { CanonicalState, StateSource } from './roles/extractStates.js'
export { extractStates, isCanonicalState, CANONICAL_STATES } from './roles/extractStates.js'

export type { BuildTreeOptions, BuildTreeResult } from './tree/buildTree.js'
export { buildTree, buildTreeFromNested, countTreeNodes, readBounds, ROOT_ROLE } from './tree/buildTree.js'

export type { WalkVisibleOptions } from './visibility/walkVisible.js'
export { walkVisible } from './visibility/walkVisible.js'

export type { SelectCandidatesOptions } from './selection/selectCandidates.js'
export { selectCandidates } from './selection/selectCandidates.js'
export type { ResolveOcclusionOptions } from './selection/resolveOcclusion.js'
export { resolveOcclusion } from './selection/resolveOcclusion.js'

export type { ExtractSamplesOptions, ExtractSamplesResult } from './pipeline/extractSamples.js'
export { extractSamples, extractSamplesFromNested, extractSamplesFromTree } from './pipeline/extractSamples.js'
export type { SampleImage } from './pipeline/sampleDocument.js'
export { buildSampleDocument } from './pipeline/sampleDocument.js'

export type { LayoutSnapshot } from './io/layout.js'
export { readLayoutSnapshot, isRecord } from './io/layout.js'
export type { UiTreeNode, UiTreeDocument, ParseUiTreeOptions } from './io/uiTree.js'
export { toUiTreeDocument, parseUiTreeDocument, isUiTreeDocument } from './io/uiTree.js'
