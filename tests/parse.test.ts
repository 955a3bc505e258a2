import { test } from 'node:test'
import assert from 'node:assert/strict'
import { formatError, parseNumber, parsePositiveInt, parseScreenSize } from '../packages/uiground/src/cli/parse.js'

test('parseScreenSize reads WxH', () => {
	assert.deepEqual(parseScreenSize('1280x720'), { width: 1280, height: 720 })
	assert.deepEqual(parseScreenSize(' 800X600 '), { width: 800, height: 600 })
	assert.equal(parseScreenSize('0x600'), undefined)
	assert.equal(parseScreenSize('1280*720'), undefined)
	assert.equal(parseScreenSize(undefined), undefined)
})

test('parsePositiveInt rejects fractions and, by default, zero', () => {
	assert.equal(parsePositiveInt('3'), 3)
	assert.equal(parsePositiveInt('0'), undefined)
	assert.equal(parsePositiveInt('0', { allowZero: true }), 0)
	assert.equal(parsePositiveInt('2.5'), undefined)
	assert.equal(parsePositiveInt('-1', { allowZero: true }), undefined)
})

test('parseNumber accepts finite numbers only', () => {
	assert.equal(parseNumber('0.25'), 0.25)
	assert.equal(parseNumber('abc'), undefined)
	assert.equal(parseNumber(''), undefined)
})

test('formatError handles non-Error values', () => {
	assert.equal(formatError(new Error('boom')), 'boom')
	assert.equal(formatError('plain'), 'plain')
	assert.equal(formatError(undefined), 'unknown error')
})
