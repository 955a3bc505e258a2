/**
 * Per-call accumulator for data-quality findings.
 * Never read by the pipeline itself; returned to the caller for reporting.
 */
export type Diagnostics = {
	/** Raw role string → number of nodes that fell back to `unknown`. */
	unmappedRoles: Map<string, number>
	/** Child ids that pointed at no node. */
	unresolvedReferences: number
	/** Child ids pointing at a node that was already attached elsewhere. */
	duplicateReferences: number
	/** Nodes without bounds. */
	malformedNodes: number
	emptyInput: boolean
}

export const createDiagnostics = (): Diagnostics => ({
	unmappedRoles: new Map(),
	unresolvedReferences: 0,
	duplicateReferences: 0,
	malformedNodes: 0,
	emptyInput: false,
})

export const recordUnmappedRole = (diagnostics: Diagnostics, rawRole: string): void => {
	diagnostics.unmappedRoles.set(rawRole, (diagnostics.unmappedRoles.get(rawRole) ?? 0) + 1)
}

/** Unmapped roles sorted by count (desc), then name. */
export const topUnmappedRoles = (diagnostics: Diagnostics, limit = 10): Array<{ role: string; count: number }> =>
	[...diagnostics.unmappedRoles.entries()]
		.map(([role, count]) => ({ role, count }))
		.sort((a, b) => b.count - a.count || a.role.localeCompare(b.role))
		.slice(0, limit)

export const countUnmappedRoles = (diagnostics: Diagnostics): number => {
	let total = 0
	for (const count of diagnostics.unmappedRoles.values()) {
		total += count
	}
	return total
}
