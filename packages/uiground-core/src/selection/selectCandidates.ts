import type { VisibleRecord } from '../model/types.js'
import type { CanonicalRole } from '../roles/normalizeRole.js'
import { DEFAULT_PIPELINE_CONFIG } from '../config.js'

export type SelectCandidatesOptions = {
	interactiveRoles?: ReadonlySet<CanonicalRole>
	minVisibleArea?: number
}

/**
 * Keep the records that make usable click targets: interactive role, non-blank name,
 * enough visible area, and not strictly invisible.
 *
 * The soft `hidden` tag is tolerated: frameworks mark rendered elements aria-hidden,
 * and geometry already proved the element is on screen.
 */
export const selectCandidates = (records: readonly VisibleRecord[], options: SelectCandidatesOptions = {}): VisibleRecord[] => {
	const interactiveRoles = options.interactiveRoles ?? DEFAULT_PIPELINE_CONFIG.interactiveRoles
	const minVisibleArea = options.minVisibleArea ?? DEFAULT_PIPELINE_CONFIG.minVisibleArea

	return records.filter(
		(record) =>
			interactiveRoles.has(record.role) &&
			record.name.trim() !== '' &&
			record.visibleArea >= minVisibleArea &&
			!record.states.includes('invisible'),
	)
}
