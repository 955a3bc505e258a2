import { test } from 'node:test'
import assert from 'node:assert/strict'
import { buildSampleDocument, extractSamples, extractSamplesFromNested, type RawAXNode, type Sample } from '../packages/uiground-core/src/index.js'
import { axNode, flag } from './helpers/fixtures.js'

const page = (children: RawAXNode[], rootChildIds: string[]): RawAXNode[] => [
	axNode('root', 'RootWebArea', 'Page', { x: 0, y: 0, width: 1920, height: 1080 }, { childIds: rootChildIds }),
	...children,
]

test('extractSamples drops an element outside the screen', () => {
	const result = extractSamples(
		page(
			[
				axNode('off', 'button', 'Far away', { x: 2000, y: 0, width: 10, height: 10 }),
				axNode('on', 'button', 'Here', { x: 10, y: 10, width: 50, height: 20 }),
			],
			['off', 'on'],
		),
	)
	assert.ok(result.tree)
	assert.equal(result.tree.children[0].children.length, 2)
	assert.deepEqual(
		result.records.map((record) => record.id),
		['node_0', 'node_1', 'node_3'],
	)
	assert.deepEqual(result.samples, [{ id: 'node_3', category: 'button', name: 'Here', bbox: [10, 10, 60, 30], point: [35, 20] }])
})

test('extractSamples reparents the children of an ignored container', () => {
	const result = extractSamples(
		page(
			[
				axNode('box', 'generic', '', { x: 0, y: 0, width: 1920, height: 200 }, { ignored: true, childIds: ['b1', 'b2'] }),
				axNode('b1', 'button', 'First', { x: 100, y: 100, width: 80, height: 30 }),
				axNode('b2', 'button', 'Second', { x: 200, y: 100, width: 80, height: 30 }),
			],
			['box'],
		),
	)
	assert.deepEqual(
		result.records.map((record) => [record.id, record.role, record.depth]),
		[
			['node_0', 'desktop', 0],
			['node_1', 'window', 1],
			['node_2', 'button', 2],
			['node_3', 'button', 2],
		],
	)
	assert.deepEqual(result.samples, [
		{ id: 'node_2', category: 'button', name: 'First', bbox: [100, 100, 180, 130], point: [140, 115] },
		{ id: 'node_3', category: 'button', name: 'Second', bbox: [200, 100, 280, 130], point: [240, 115] },
	])
})

test('extractSamples is deterministic', () => {
	const nodes = page(
		[
			axNode('a', 'button', 'A', { x: 0, y: 0, width: 100, height: 100 }),
			axNode('b', 'button', 'B', { x: 10, y: 10, width: 100, height: 100 }),
			axNode('c', 'Widget', 'C', { x: 300, y: 0, width: 100, height: 100 }),
		],
		['a', 'b', 'c'],
	)
	const first = extractSamples(nodes)
	const second = extractSamples(nodes)
	assert.deepEqual(first.samples, second.samples)
	assert.deepEqual(first.samples.map((sample) => sample.name), ['B'])
	assert.deepEqual([...first.diagnostics.unmappedRoles.entries()], [['Widget', 1]])
	assert.deepEqual([...second.diagnostics.unmappedRoles.entries()], [['Widget', 1]])
})

test('extractSamples applies the subtree policy from config', () => {
	const nodes = page(
		[
			axNode('menu', 'Menu', 'File', { x: 0, y: 0, width: 200, height: 300 }, { childIds: ['item'], properties: [flag('expanded', false)] }),
			axNode('item', 'MenuItem', 'Open', { x: 0, y: 20, width: 200, height: 20 }),
		],
		['menu'],
	)
	assert.deepEqual(
		extractSamples(nodes).samples.map((sample) => sample.name),
		['Open'],
	)
	assert.deepEqual(extractSamples(nodes, { config: { subtreePolicy: 'state-pruning' } }).samples, [])
})

test('extractSamples uses the given screen for the root and the clip', () => {
	const result = extractSamples(page([axNode('b', 'button', 'Edge', { x: 780, y: 10, width: 40, height: 20 })], ['b']), {
		screen: { width: 800, height: 600 },
	})
	assert.deepEqual(result.screen, { width: 800, height: 600 })
	assert.deepEqual(result.samples[0].bbox, [780, 10, 800, 30])
	assert.deepEqual(result.samples[0].point, [790, 20])
})

test('extractSamples of an empty snapshot yields nothing', () => {
	const result = extractSamples([])
	assert.equal(result.tree, null)
	assert.deepEqual(result.samples, [])
	assert.equal(result.diagnostics.emptyInput, true)
})

test('extractSamplesFromNested matches the flat pipeline', () => {
	const result = extractSamplesFromNested({
		role: { value: 'RootWebArea' },
		bounds: { x: 0, y: 0, width: 1920, height: 1080 },
		children: [{ role: { value: 'link' }, name: { value: 'Home' }, bounds: { x: 0, y: 0, width: 60, height: 20 } }],
	})
	assert.deepEqual(result.samples, [{ id: 'node_2', category: 'link', name: 'Home', bbox: [0, 0, 60, 20], point: [30, 10] }])
})

test('buildSampleDocument wraps samples with image metadata', () => {
	const samples: Sample[] = [{ id: 'node_2', category: 'link', name: 'Home', bbox: [0, 0, 60, 20], point: [30, 10] }]
	assert.deepEqual(buildSampleDocument(samples, { filename: 'bench/home/screenshot_cropped.png', size: { width: 1920, height: 1080 } }), {
		image_filename: 'bench/home/screenshot_cropped.png',
		image_width: 1920,
		image_height: 1080,
		sample_count: 1,
		test_samples: samples,
	})
})
