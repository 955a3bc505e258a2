import fs from 'node:fs/promises'
import path from 'node:path'
import { isRecord } from '@uiground/core'
import { fileExists, filteredPath, IMAGES_DIRNAME, JSONL_FILENAME, listDatasetDirs, screenshotPath } from './paths.js'
import { readJsonFile } from './json.js'

export type PackageBenchmarkOptions = {
	/** Directory of processed datasets (each with `filtered.json` + screenshot). */
	sourceRoot: string
	/** Output directory; receives `images/` and `test.jsonl`. */
	targetRoot: string
}

export type PackageBenchmarkResult = {
	jsonlPath: string
	records: number
	/** Datasets without samples or screenshot. */
	missing: string[]
	/** Datasets whose `filtered.json` could not be read. */
	errors: Array<{ name: string; error: string }>
}

/**
 * Collect processed datasets into a self-contained benchmark:
 * `images/<name>.png` plus one JSON line per dataset with `image_filename` pointing into `images/`.
 */
export const packageBenchmark = async (options: PackageBenchmarkOptions): Promise<PackageBenchmarkResult> => {
	const imagesDir = path.join(options.targetRoot, IMAGES_DIRNAME)
	await fs.mkdir(imagesDir, { recursive: true })

	const names = await listDatasetDirs(options.sourceRoot)
	const lines: string[] = []
	const missing: string[] = []
	const errors: PackageBenchmarkResult['errors'] = []

	for (const name of names) {
		const datasetDir = path.join(options.sourceRoot, name)
		const samplesFile = filteredPath(datasetDir)
		const imageFile = screenshotPath(datasetDir)
		if (!(await fileExists(samplesFile)) || !(await fileExists(imageFile))) {
			missing.push(name)
			continue
		}

		const read = await readJsonFile(samplesFile)
		if (!read.ok) {
			errors.push({ name, error: read.error.message })
			continue
		}
		if (!isRecord(read.value)) {
			errors.push({ name, error: `${samplesFile}: expected an object` })
			continue
		}

		const imageName = `${name}.png`
		await fs.copyFile(imageFile, path.join(imagesDir, imageName))
		lines.push(JSON.stringify({ ...read.value, image_filename: `${IMAGES_DIRNAME}/${imageName}`, image_id: name }))
	}

	const jsonlPath = path.join(options.targetRoot, JSONL_FILENAME)
	await fs.writeFile(jsonlPath, lines.map((line) => `${line}\n`).join(''), 'utf8')
	return { jsonlPath, records: lines.length, missing, errors }
}
