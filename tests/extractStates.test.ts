import { test } from 'node:test'
import assert from 'node:assert/strict'
import { extractStates, isCanonicalState } from '../packages/uiground-core/src/index.js'
import { flag } from './helpers/fixtures.js'

test('extractStates maps true flags', () => {
	const states = extractStates({ properties: [flag('focused', true), flag('disabled', true), flag('selected', false)] })
	assert.deepEqual(states, ['focused', 'disabled'])
})

test('extractStates turns expanded:false into collapsed', () => {
	assert.deepEqual(extractStates({ properties: [flag('expanded', false)] }), ['collapsed'])
	assert.deepEqual(extractStates({ properties: [flag('expanded', true)] }), ['expanded'])
})

test('extractStates reads tristate and editable string values', () => {
	const states = extractStates({
		properties: [
			{ name: 'checked', value: { type: 'tristate', value: 'mixed' } },
			{ name: 'pressed', value: { type: 'tristate', value: 'false' } },
			{ name: 'editable', value: { type: 'token', value: 'plaintext' } },
		],
	})
	assert.deepEqual(states, ['checked', 'editable'])
})

test('extractStates maps busy and modal to active once', () => {
	assert.deepEqual(extractStates({ properties: [flag('busy', true), flag('modal', true)] }), ['active'])
})

test('extractStates ignores unrelated properties', () => {
	assert.deepEqual(extractStates({ properties: [flag('level', 2), flag('required', true), flag('constructor', true)] }), [])
})

test('extractStates marks ignored nodes hidden and not-rendered nodes invisible', () => {
	const states = extractStates({
		ignored: true,
		ignoredReasons: [{ name: 'notRendered', value: { type: 'boolean', value: true } }],
	})
	assert.deepEqual(states, ['hidden', 'invisible'])
})

test('extractStates skips a not-rendered reason explicitly set to false', () => {
	assert.deepEqual(extractStates({ ignoredReasons: [{ name: 'notVisible', value: { type: 'boolean', value: false } }] }), [])
})

test('extractStates keeps hidden and invisible distinct', () => {
	assert.deepEqual(extractStates({ properties: [flag('hidden', true)] }), ['hidden'])
	assert.deepEqual(extractStates({ properties: [flag('invisible', true)] }), ['invisible'])
})

test('isCanonicalState accepts only the vocabulary', () => {
	assert.equal(isCanonicalState('focused'), true)
	assert.equal(isCanonicalState('busy'), false)
})
