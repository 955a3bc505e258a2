import fs from 'node:fs/promises'
import path from 'node:path'

/** Canonical tree dumped by the collector. */
export const UI_TREE_FILENAME = 'ui_tree.json'
/** Screenshot cropped to the viewport the tree was captured in. */
export const SCREENSHOT_FILENAME = 'screenshot_cropped.png'
/** Samples written next to the tree. */
export const FILTERED_FILENAME = 'filtered.json'
/** Packaged benchmark annotations. */
export const JSONL_FILENAME = 'test.jsonl'
/** Packaged benchmark images. */
export const IMAGES_DIRNAME = 'images'

export const uiTreePath = (datasetDir: string): string => path.join(datasetDir, UI_TREE_FILENAME)
export const screenshotPath = (datasetDir: string): string => path.join(datasetDir, SCREENSHOT_FILENAME)
export const filteredPath = (datasetDir: string): string => path.join(datasetDir, FILTERED_FILENAME)

/**
 * Dataset directories directly under `root`, sorted by name.
 * @returns Directory names (not paths).
 */
export const listDatasetDirs = async (root: string): Promise<string[]> => {
	const entries = await fs.readdir(root, { withFileTypes: true })
	return entries
		.filter((entry) => entry.isDirectory())
		.map((entry) => entry.name)
		.sort()
}

export const fileExists = async (filePath: string): Promise<boolean> => {
	try {
		const stats = await fs.stat(filePath)
		return stats.isFile()
	} catch {
		return false
	}
}

export const dirExists = async (dirPath: string): Promise<boolean> => {
	try {
		const stats = await fs.stat(dirPath)
		return stats.isDirectory()
	} catch {
		return false
	}
}
