import { test } from 'node:test'
import assert from 'node:assert/strict'
import {
	CANONICAL_ROLES,
	countUnmappedRoles,
	createDiagnostics,
	isCanonicalRole,
	normalizeRole,
	topUnmappedRoles,
} from '../packages/uiground-core/src/index.js'

test('normalizeRole maps exact table entries', () => {
	assert.equal(normalizeRole('Button'), 'button')
	assert.equal(normalizeRole('TextField'), 'textfield')
	assert.equal(normalizeRole('StaticText'), 'label')
	assert.equal(normalizeRole('RootWebArea'), 'window')
	assert.equal(normalizeRole('generic'), 'panel')
})

test('normalizeRole falls back to a case-insensitive match', () => {
	assert.equal(normalizeRole('button'), 'button')
	assert.equal(normalizeRole('CHECKBOX'), 'checkbox')
	assert.equal(normalizeRole('menuitem'), 'menuitem')
	assert.equal(normalizeRole('statictext'), 'label')
})

test('normalizeRole keeps the first spelling when two keys differ only by case', () => {
	assert.equal(normalizeRole('definition'), 'listitem')
	assert.equal(normalizeRole('Definition'), 'label')
	assert.equal(normalizeRole('DEFINITION'), 'listitem')
})

test('normalizeRole passes canonical names through', () => {
	assert.equal(normalizeRole('desktop'), 'desktop')
	assert.equal(normalizeRole('Taskbar'), 'taskbar')
	assert.equal(normalizeRole('tabpanel'), 'tabpanel')
})

test('normalizeRole returns unknown and records unmapped roles', () => {
	const diagnostics = createDiagnostics()
	assert.equal(normalizeRole('Widgetish', diagnostics), 'unknown')
	assert.equal(normalizeRole('Widgetish', diagnostics), 'unknown')
	assert.equal(normalizeRole('Gizmo', diagnostics), 'unknown')
	assert.equal(countUnmappedRoles(diagnostics), 3)
	assert.deepEqual(topUnmappedRoles(diagnostics), [
		{ role: 'Widgetish', count: 2 },
		{ role: 'Gizmo', count: 1 },
	])
})

test('normalizeRole treats missing roles as unknown without recording them', () => {
	const diagnostics = createDiagnostics()
	assert.equal(normalizeRole(undefined, diagnostics), 'unknown')
	assert.equal(normalizeRole('', diagnostics), 'unknown')
	assert.equal(countUnmappedRoles(diagnostics), 0)
})

test('normalizeRole is total over the canonical vocabulary', () => {
	for (const role of CANONICAL_ROLES) {
		assert.equal(normalizeRole(role), role)
		assert.equal(isCanonicalRole(role), true)
	}
	assert.equal(isCanonicalRole('unknown'), true)
	assert.equal(isCanonicalRole('Button'), false)
})

test('topUnmappedRoles breaks count ties by name and honours the limit', () => {
	const diagnostics = createDiagnostics()
	for (const role of ['b', 'a', 'c', 'a']) {
		normalizeRole(`zz-${role}`, diagnostics)
	}
	assert.deepEqual(topUnmappedRoles(diagnostics, 2), [
		{ role: 'zz-a', count: 2 },
		{ role: 'zz-b', count: 1 },
	])
})
