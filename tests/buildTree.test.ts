import { test } from 'node:test'
import assert from 'node:assert/strict'
import { buildTree, buildTreeFromNested, countTreeNodes, isPreconditionError, readBounds, type CanonicalNode } from '../packages/uiground-core/src/index.js'
import { axNode, flag, SCREEN } from './helpers/fixtures.js'

const collectIds = (node: CanonicalNode): string[] => [node.id, ...node.children.flatMap(collectIds)]

test('buildTree wraps the snapshot in a desktop root sized to the screen', () => {
	const { root, diagnostics } = buildTree(
		[
			axNode('1', 'RootWebArea', 'Page', { x: 0, y: 0, width: 1280, height: 720 }, { childIds: ['2', '3'] }),
			axNode('2', 'button', 'OK', { x: 10, y: 10, width: 80, height: 30 }),
			axNode('3', 'link', 'Docs', { x: 100, y: 10, width: 60, height: 20 }),
		],
		{ screen: { width: 1280, height: 720 } },
	)

	assert.ok(root)
	assert.equal(root.id, 'node_0')
	assert.equal(root.role, 'desktop')
	assert.deepEqual(root.bounds, { x: 0, y: 0, width: 1280, height: 720 })
	assert.equal(root.children.length, 1)

	const page = root.children[0]
	assert.equal(page.role, 'window')
	assert.equal(page.name, 'Page')
	assert.deepEqual(
		page.children.map((child) => [child.id, child.role, child.name]),
		[
			['node_2', 'button', 'OK'],
			['node_3', 'link', 'Docs'],
		],
	)
	assert.equal(diagnostics.malformedNodes, 0)
})

test('buildTree assigns ids in pre-order', () => {
	const { root } = buildTree([
		axNode('a', 'generic', '', { x: 0, y: 0, width: 100, height: 100 }, { childIds: ['b', 'd'] }),
		axNode('b', 'generic', '', { x: 0, y: 0, width: 50, height: 50 }, { childIds: ['c'] }),
		axNode('c', 'button', 'Deep', { x: 0, y: 0, width: 10, height: 10 }),
		axNode('d', 'button', 'Late', { x: 60, y: 0, width: 10, height: 10 }),
	])
	assert.ok(root)
	assert.deepEqual(collectIds(root), ['node_0', 'node_1', 'node_2', 'node_3', 'node_4'])
	assert.equal(root.children[0].children[1].name, 'Late')
	assert.equal(countTreeNodes(root), 5)
})

test('buildTree splices ignored containers into their parent', () => {
	const { root } = buildTree([
		axNode('1', 'RootWebArea', 'Page', { x: 0, y: 0, width: 800, height: 600 }, { childIds: ['2', '5'] }),
		axNode('2', 'generic', '', { x: 0, y: 0, width: 800, height: 100 }, { ignored: true, childIds: ['3', '4'] }),
		axNode('3', 'button', 'One', { x: 0, y: 0, width: 50, height: 20 }),
		axNode('4', 'button', 'Two', { x: 60, y: 0, width: 50, height: 20 }),
		axNode('5', 'link', 'After', { x: 0, y: 200, width: 50, height: 20 }),
	])
	assert.ok(root)
	const page = root.children[0]
	assert.deepEqual(
		page.children.map((child) => child.name),
		['One', 'Two', 'After'],
	)
	assert.equal(countTreeNodes(root), 5)
})

test('buildTree splices nested ignored chains and an ignored root', () => {
	const { root } = buildTree([
		axNode('1', 'generic', '', undefined, { ignored: true, childIds: ['2'] }),
		axNode('2', 'generic', '', undefined, { ignored: true, childIds: ['3'] }),
		axNode('3', 'button', 'Only', { x: 0, y: 0, width: 40, height: 40 }),
	])
	assert.ok(root)
	assert.deepEqual(
		root.children.map((child) => [child.id, child.name]),
		[['node_1', 'Only']],
	)
})

test('buildTree attaches a node referenced twice only once', () => {
	const { root, diagnostics } = buildTree([
		axNode('1', 'generic', '', { x: 0, y: 0, width: 100, height: 100 }, { childIds: ['2', '3'] }),
		axNode('2', 'generic', '', { x: 0, y: 0, width: 50, height: 50 }, { childIds: ['4'] }),
		axNode('3', 'generic', '', { x: 50, y: 0, width: 50, height: 50 }, { childIds: ['4'] }),
		axNode('4', 'button', 'Shared', { x: 0, y: 0, width: 10, height: 10 }),
	])
	assert.ok(root)
	assert.equal(countTreeNodes(root), 5)
	assert.equal(diagnostics.duplicateReferences, 1)
})

test('buildTree terminates on cycles', () => {
	const { root, diagnostics } = buildTree([
		axNode('1', 'generic', '', { x: 0, y: 0, width: 100, height: 100 }, { childIds: ['2'] }),
		axNode('2', 'button', 'Loop', { x: 0, y: 0, width: 10, height: 10 }, { childIds: ['1'] }),
	])
	assert.ok(root)
	assert.equal(countTreeNodes(root), 3)
	assert.equal(diagnostics.duplicateReferences, 1)
})

test('buildTree drops unresolved child ids', () => {
	const { root, diagnostics } = buildTree([
		axNode('1', 'generic', '', { x: 0, y: 0, width: 100, height: 100 }, { childIds: ['2', 'missing'] }),
		axNode('2', 'button', 'Here', { x: 0, y: 0, width: 10, height: 10 }),
	])
	assert.ok(root)
	assert.equal(root.children[0].children.length, 1)
	assert.equal(diagnostics.unresolvedReferences, 1)
})

test('buildTree returns a null root for an empty snapshot', () => {
	const { root, diagnostics } = buildTree([])
	assert.equal(root, null)
	assert.equal(diagnostics.emptyInput, true)
})

test('buildTree gives nodes without bounds a zero rectangle and counts them', () => {
	const { root, diagnostics } = buildTree([axNode('1', 'button', 'No box', undefined)])
	assert.ok(root)
	assert.deepEqual(root.children[0].bounds, { x: 0, y: 0, width: 0, height: 0 })
	assert.equal(diagnostics.malformedNodes, 1)
})

test('buildTree counts nodes without a role and records unmapped roles', () => {
	const { root, diagnostics } = buildTree(
		[
			{ nodeId: '1', childIds: ['2'], bounds: { x: 0, y: 0, width: 10, height: 10 } },
			axNode('2', 'FancyWidget', 'x', { x: 0, y: 0, width: 10, height: 10 }),
		],
		{ screen: SCREEN },
	)
	assert.ok(root)
	assert.equal(root.children[0].role, 'unknown')
	assert.equal(root.children[0].children[0].role, 'unknown')
	assert.equal(diagnostics.malformedNodes, 1)
	assert.deepEqual([...diagnostics.unmappedRoles.entries()], [['FancyWidget', 1]])
})

test('buildTree keeps states from properties', () => {
	const { root } = buildTree([axNode('1', 'CheckBox', 'Agree', { x: 0, y: 0, width: 20, height: 20 }, { properties: [flag('checked', true)] })])
	assert.ok(root)
	assert.deepEqual(root.children[0].states, ['checked'])
})

test('buildTree rejects bounds that are not a rectangle', () => {
	assert.throws(
		() => buildTree([axNode('1', 'button', 'Bad', undefined, { childIds: ['2'] }), { nodeId: '2', bounds: [0, 0, 10, 10] }]),
		(error: unknown) => isPreconditionError(error),
	)
	assert.throws(() => buildTree([{ nodeId: '1', bounds: 'wide' }]), (error: unknown) => isPreconditionError(error))
})

test('readBounds defaults missing fields and rejects non-finite ones', () => {
	assert.deepEqual(readBounds({ x: 5, width: 10 }), { x: 5, y: 0, width: 10, height: 0 })
	assert.equal(readBounds(null), null)
	assert.throws(() => readBounds({ x: 0, y: 0, width: Number.NaN, height: 1 }), /"width" must be a finite number/)
})

test('buildTreeFromNested converts a nested snapshot the same way', () => {
	const shared = { role: { value: 'button' }, name: { value: 'Shared' }, bounds: { x: 0, y: 0, width: 10, height: 10 } }
	const { root, diagnostics } = buildTreeFromNested({
		role: { value: 'RootWebArea' },
		name: { value: 'Page' },
		bounds: { x: 0, y: 0, width: 100, height: 100 },
		children: [
			{ ignored: true, children: [shared, { role: { value: 'link' }, name: { value: 'L' }, bounds: { x: 20, y: 0, width: 10, height: 10 } }] },
			shared,
		],
	})
	assert.ok(root)
	const page = root.children[0]
	assert.deepEqual(
		page.children.map((child) => [child.id, child.role, child.name]),
		[
			['node_2', 'button', 'Shared'],
			['node_3', 'link', 'L'],
		],
	)
	assert.equal(diagnostics.duplicateReferences, 1)
	assert.equal(buildTreeFromNested(null).diagnostics.emptyInput, true)
})
