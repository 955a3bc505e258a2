import { countUnmappedRoles, topUnmappedRoles, type Diagnostics, type Sample } from '@uiground/core'
import type { Output } from './io.js'

/** Human-readable data-quality lines; empty when the snapshot was clean. */
export const formatDiagnostics = (diagnostics: Diagnostics, limit = 10): string[] => {
	const lines: string[] = []
	if (diagnostics.emptyInput) {
		lines.push('snapshot is empty')
	}
	if (diagnostics.unresolvedReferences > 0) {
		lines.push(`${diagnostics.unresolvedReferences} unresolved child reference(s) dropped`)
	}
	if (diagnostics.duplicateReferences > 0) {
		lines.push(`${diagnostics.duplicateReferences} duplicate child reference(s) dropped`)
	}
	if (diagnostics.malformedNodes > 0) {
		lines.push(`${diagnostics.malformedNodes} malformed node(s) without bounds or role`)
	}

	const unmapped = countUnmappedRoles(diagnostics)
	if (unmapped > 0) {
		lines.push(`${unmapped} node(s) with unmapped roles:`)
		for (const { role, count } of topUnmappedRoles(diagnostics, limit)) {
			lines.push(`  ${role}: ${count}`)
		}
	}
	return lines
}

export const writeDiagnostics = (output: Output, diagnostics: Diagnostics, prefix?: string): void => {
	for (const line of formatDiagnostics(diagnostics)) {
		output.writeWarn(prefix ? `${prefix}: ${line}` : line)
	}
}

/** JSON-friendly view of the accumulator (the Map becomes a sorted list). */
export const diagnosticsToJson = (diagnostics: Diagnostics) => ({
	unmappedRoles: topUnmappedRoles(diagnostics, Number.POSITIVE_INFINITY),
	unresolvedReferences: diagnostics.unresolvedReferences,
	duplicateReferences: diagnostics.duplicateReferences,
	malformedNodes: diagnostics.malformedNodes,
	emptyInput: diagnostics.emptyInput,
})

/** `button "Save" [10,20,90,50] @ (50,35)` */
export const formatSampleLine = (sample: Sample): string => {
	const name = sample.name ? ` ${JSON.stringify(sample.name)}` : ''
	return `${sample.category}${name} [${sample.bbox.join(',')}] @ (${sample.point.join(',')})`
}
