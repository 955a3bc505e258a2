import type { Sample, VisibleRecord } from '../model/types.js'
import type { CanonicalRole } from '../roles/normalizeRole.js'
import { DEFAULT_PIPELINE_CONFIG } from '../config.js'
import { centerOf, containsPoint, intersectRects, rectArea, rectToTuple } from '../model/geometry.js'

export type ResolveOcclusionOptions = {
	nonOccludingRoles?: ReadonlySet<CanonicalRole>
	coverageRatio?: number
}

/**
 * Drop candidates that a later-painted element covers, and turn the rest into samples.
 *
 * A candidate is occluded by any later record outside the non-occluding roles
 * (nested elements included) that covers more than `coverageRatio` of its visible area and contains its centre.
 * Document order is the only z-order signal.
 */
export const resolveOcclusion = (
	candidates: readonly VisibleRecord[],
	allRecords: readonly VisibleRecord[],
	options: ResolveOcclusionOptions = {},
): Sample[] => {
	const nonOccludingRoles = options.nonOccludingRoles ?? DEFAULT_PIPELINE_CONFIG.nonOccludingRoles
	const coverageRatio = options.coverageRatio ?? DEFAULT_PIPELINE_CONFIG.coverageRatio

	const indexById = new Map<string, number>()
	allRecords.forEach((record, index) => {
		indexById.set(record.id, index)
	})

	const samples: Sample[] = []
	for (const candidate of candidates) {
		const start = indexById.get(candidate.id)
		const occluded = start !== undefined && isOccluded(candidate, allRecords, start, nonOccludingRoles, coverageRatio)
		if (!occluded) {
			samples.push(toSample(candidate))
		}
	}
	return samples
}

const isOccluded = (
	candidate: VisibleRecord,
	allRecords: readonly VisibleRecord[],
	start: number,
	nonOccludingRoles: ReadonlySet<CanonicalRole>,
	coverageRatio: number,
): boolean => {
	const area = candidate.visibleArea
	if (area <= 0) {
		return false
	}

	const center = centerOf(candidate.visibleRect)
	for (let j = start + 1; j < allRecords.length; j++) {
		const other = allRecords[j]
		if (nonOccludingRoles.has(other.role)) {
			continue
		}

		const overlap = intersectRects(candidate.visibleRect, other.visibleRect)
		if (!overlap) {
			continue
		}
		if (rectArea(overlap) > coverageRatio * area && containsPoint(other.visibleRect, center)) {
			return true
		}
	}
	return false
}

const toSample = (record: VisibleRecord): Sample => ({
	id: record.id,
	category: record.role,
	name: record.name.trim(),
	bbox: rectToTuple(record.visibleRect),
	point: centerOf(record.visibleRect),
})
