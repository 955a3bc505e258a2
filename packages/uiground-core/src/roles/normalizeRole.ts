import fs from 'node:fs'
import { fileURLToPath } from 'node:url'
import { recordUnmappedRole, type Diagnostics } from '../diagnostics.js'

/** Canonical role vocabulary, plus the `unknown` sentinel. */
export type CanonicalRole = string

export const UNKNOWN_ROLE: CanonicalRole = 'unknown'

type RoleTable = {
	canonicalRoles: Set<string>
	roleMap: Map<string, CanonicalRole>
	/** Lowercased key → role. First spelling in table order wins. */
	roleMapLower: Map<string, CanonicalRole>
}

const isRecord = (value: unknown): value is Record<string, unknown> => typeof value === 'object' && value !== null && !Array.isArray(value)

const loadRoleTable = (): RoleTable => {
	// <packageRoot>/src/roles/normalizeRole.ts → <packageRoot>/data/roles.json
	const tablePath = fileURLToPath(new URL('../../data/roles.json', import.meta.url))
	const parsed: unknown = JSON.parse(fs.readFileSync(tablePath, 'utf8'))
	if (!isRecord(parsed) || !Array.isArray(parsed.canonicalRoles) || !isRecord(parsed.roleMap)) {
		throw new Error(`Invalid role table at ${tablePath}: expected { canonicalRoles: string[], roleMap: Record<string, string> }.`)
	}

	const canonicalRoles = new Set<string>()
	for (const role of parsed.canonicalRoles) {
		if (typeof role !== 'string') {
			throw new Error(`Invalid role table at ${tablePath}: canonicalRoles must contain strings.`)
		}
		canonicalRoles.add(role)
	}

	const roleMap = new Map<string, CanonicalRole>()
	const roleMapLower = new Map<string, CanonicalRole>()
	for (const [raw, role] of Object.entries(parsed.roleMap)) {
		if (typeof role !== 'string' || !canonicalRoles.has(role)) {
			throw new Error(`Invalid role table at ${tablePath}: "${raw}" maps to unknown role ${JSON.stringify(role)}.`)
		}
		roleMap.set(raw, role)
		const lower = raw.toLowerCase()
		if (!roleMapLower.has(lower)) {
			roleMapLower.set(lower, role)
		}
	}

	return { canonicalRoles, roleMap, roleMapLower }
}

const ROLE_TABLE = loadRoleTable()

/** Canonical role names, excluding `unknown`. */
export const CANONICAL_ROLES: ReadonlySet<string> = ROLE_TABLE.canonicalRoles

export const isCanonicalRole = (value: string): boolean => value === UNKNOWN_ROLE || ROLE_TABLE.canonicalRoles.has(value)

/**
 * Map a Chrome accessibility role to the canonical vocabulary.
 *
 * 1. Exact table match
 * 2. Case-insensitive table match
 * 3. Lowercased input that already is a canonical role
 * 4. `unknown`, counted in `diagnostics` when given
 */
export const normalizeRole = (rawRole: string | null | undefined, diagnostics?: Diagnostics): CanonicalRole => {
	if (rawRole == null || rawRole === '') {
		return UNKNOWN_ROLE
	}

	const exact = ROLE_TABLE.roleMap.get(rawRole)
	if (exact) {
		return exact
	}

	const lower = rawRole.toLowerCase()
	const caseInsensitive = ROLE_TABLE.roleMapLower.get(lower)
	if (caseInsensitive) {
		return caseInsensitive
	}

	if (ROLE_TABLE.canonicalRoles.has(lower)) {
		return lower
	}

	if (diagnostics) {
		recordUnmappedRole(diagnostics, rawRole)
	}
	return UNKNOWN_ROLE
}
