import { test } from 'node:test'
import assert from 'node:assert/strict'
import path from 'node:path'
import fs from 'node:fs/promises'
import { cleanEmptyDatasets, packageBenchmark } from '../packages/uiground-dataset/src/index.js'
import { emptyUiTreeDocument, FAKE_PNG, readJson, uiTreeDocument, writeCapture } from './helpers/datasets.js'
import { makeTempDir, runCli } from './helpers/process.js'

const filtered = (name: string) => ({
	image_filename: `captures/${name}/screenshot_cropped.png`,
	image_width: 800,
	image_height: 600,
	sample_count: 1,
	test_samples: [{ id: 'node_1', category: 'button', name, bbox: [100, 100, 200, 150], point: [150, 125] }],
})

const setupProcessed = async (): Promise<{ parent: string; source: string }> => {
	const parent = await makeTempDir('uiground-build-')
	const source = path.join(parent, 'captures')
	for (const name of ['one', 'two']) {
		const dir = await writeCapture(source, name, { screenshot: true })
		await fs.writeFile(path.join(dir, 'filtered.json'), JSON.stringify(filtered(name)))
	}
	await writeCapture(source, 'three', { screenshot: true })
	const broken = await writeCapture(source, 'zz-broken', { screenshot: true })
	await fs.writeFile(path.join(broken, 'filtered.json'), '[')
	return { parent, source }
}

test('packageBenchmark copies images and writes one JSON line per capture', async (t) => {
	const { parent, source } = await setupProcessed()
	t.after(() => fs.rm(parent, { recursive: true, force: true }))

	const target = path.join(parent, 'benchmark')
	const result = await packageBenchmark({ sourceRoot: source, targetRoot: target })

	assert.equal(result.jsonlPath, path.join(target, 'test.jsonl'))
	assert.equal(result.records, 2)
	assert.deepEqual(result.missing, ['three'])
	assert.equal(result.errors.length, 1)
	assert.equal(result.errors[0].name, 'zz-broken')

	const lines = (await fs.readFile(result.jsonlPath, 'utf8')).split('\n')
	assert.equal(lines.length, 3)
	assert.equal(lines[2], '')
	assert.deepEqual(JSON.parse(lines[0]), { ...filtered('one'), image_filename: 'images/one.png', image_id: 'one' })
	assert.deepEqual(JSON.parse(lines[1]), { ...filtered('two'), image_filename: 'images/two.png', image_id: 'two' })

	assert.deepEqual((await fs.readdir(path.join(target, 'images'))).sort(), ['one.png', 'two.png'])
	assert.deepEqual(await fs.readFile(path.join(target, 'images', 'one.png')), FAKE_PNG)
})

test('dataset build command reports missing and broken captures', async (t) => {
	const { parent } = await setupProcessed()
	t.after(() => fs.rm(parent, { recursive: true, force: true }))

	const result = await runCli(['dataset', 'build', 'captures', 'benchmark'], { cwd: parent })
	assert.equal(result.code, 1)
	assert.equal(result.stdout, `Wrote 2 record(s) to ${path.join(parent, 'benchmark', 'test.jsonl')}\n`)
	assert.match(result.stderr, /^three: skipped \(no filtered\.json or screenshot\)$/m)
	assert.match(result.stderr, /^zz-broken: failed \(.*invalid JSON.*\)$/m)
})

const setupForClean = async (): Promise<string> => {
	const root = await makeTempDir('uiground-clean-')
	await writeCapture(root, 'bad', { rawUiTree: 'nope', screenshot: true })
	await writeCapture(root, 'empty', { uiTree: emptyUiTreeDocument(), screenshot: true })
	await writeCapture(root, 'full', { uiTree: uiTreeDocument('Keep'), screenshot: true })
	await writeCapture(root, 'notree', { screenshot: true })
	return root
}

test('cleanEmptyDatasets removes captures whose tree root has no children', async (t) => {
	const root = await setupForClean()
	t.after(() => fs.rm(root, { recursive: true, force: true }))

	const dryRun = await cleanEmptyDatasets({ root, dryRun: true })
	assert.deepEqual(dryRun.removed, ['empty'])
	assert.deepEqual(dryRun.kept, ['full'])
	assert.deepEqual(
		dryRun.errors.map((error) => error.name),
		['bad'],
	)
	assert.deepEqual((await fs.readdir(root)).sort(), ['bad', 'empty', 'full', 'notree'])

	const result = await cleanEmptyDatasets({ root })
	assert.deepEqual(result.removed, ['empty'])
	assert.deepEqual((await fs.readdir(root)).sort(), ['bad', 'full', 'notree'])
})

test('dataset clean command supports --dry-run and --json', async (t) => {
	const root = await setupForClean()
	t.after(() => fs.rm(root, { recursive: true, force: true }))

	const dryRun = await runCli(['dataset', 'clean', root, '--dry-run'], { cwd: root })
	assert.equal(dryRun.code, 1)
	assert.equal(dryRun.stdout, 'Would remove empty\nWould remove 1 empty dataset(s), kept 1\n')
	assert.match(dryRun.stderr, /^bad: failed \(.*invalid JSON.*\)$/m)

	await fs.rm(path.join(root, 'bad'), { recursive: true })
	const cleaned = await runCli(['ds', 'clean', root, '--json'], { cwd: root })
	assert.equal(cleaned.code, 0, cleaned.stderr)
	assert.deepEqual(JSON.parse(cleaned.stdout), { dryRun: false, removed: ['empty'], kept: ['full'], errors: [] })
	assert.deepEqual((await fs.readdir(root)).sort(), ['full', 'notree'])
})
