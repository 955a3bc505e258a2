import type { AXIgnoredReason, AXProperty } from '../model/types.js'

export type CanonicalState =
	| 'focused'
	| 'selected'
	| 'checked'
	| 'disabled'
	| 'expanded'
	| 'collapsed'
	| 'hidden'
	| 'invisible'
	| 'editable'
	| 'readonly'
	| 'pressed'
	| 'active'

export const CANONICAL_STATES: readonly CanonicalState[] = [
	'focused',
	'selected',
	'checked',
	'disabled',
	'expanded',
	'collapsed',
	'hidden',
	'invisible',
	'editable',
	'readonly',
	'pressed',
	'active',
]

/** Property flags that map to a state when their value is `true`. */
const FLAG_STATES = new Map<string, CanonicalState>([
	['focused', 'focused'],
	['selected', 'selected'],
	['checked', 'checked'],
	['disabled', 'disabled'],
	['expanded', 'expanded'],
	['collapsed', 'collapsed'],
	['hidden', 'hidden'],
	['invisible', 'invisible'],
	['editable', 'editable'],
	['readonly', 'readonly'],
	['pressed', 'pressed'],
	['busy', 'active'],
	['modal', 'active'],
])

/** Tristate properties report "true"/"mixed" as strings. */
const TRISTATE_STATES = new Map<string, CanonicalState>([
	['checked', 'checked'],
	['pressed', 'pressed'],
])

/** Ignored reasons meaning the node is not painted at all. */
const NOT_RENDERED_REASONS = new Set(['notRendered', 'notVisible'])

export type StateSource = {
	ignored?: boolean
	ignoredReasons?: AXIgnoredReason[]
	properties?: AXProperty[]
}

export const isCanonicalState = (value: string): value is CanonicalState => CANONICAL_STATES.some((state) => state === value)

/**
 * Map CDP property flags to canonical state tags.
 * `expanded: false` becomes `collapsed`; an ignored node always carries `hidden`.
 */
export const extractStates = (node: StateSource): CanonicalState[] => {
	const states: CanonicalState[] = []
	const add = (state: CanonicalState): void => {
		if (!states.includes(state)) {
			states.push(state)
		}
	}

	for (const prop of node.properties ?? []) {
		const value = prop.value?.value
		if (value === true) {
			const state = FLAG_STATES.get(prop.name)
			if (state) {
				add(state)
			}
			continue
		}
		if (prop.name === 'expanded' && value === false) {
			add('collapsed')
			continue
		}
		// Chrome reports editable as "plaintext" | "richtext"
		if (prop.name === 'editable' && (value === 'plaintext' || value === 'richtext')) {
			add('editable')
			continue
		}
		if (typeof value === 'string' && (value === 'true' || value === 'mixed')) {
			const state = TRISTATE_STATES.get(prop.name)
			if (state) {
				add(state)
			}
		}
	}

	if (node.ignored) {
		add('hidden')
	}

	for (const reason of node.ignoredReasons ?? []) {
		if (NOT_RENDERED_REASONS.has(reason.name) && reason.value?.value !== false) {
			add('invisible')
		}
	}

	return states
}
