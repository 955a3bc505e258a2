export type { DatasetEventMap, DatasetProcessedEvent, DatasetSkippedEvent, DatasetFailedEvent, DatasetFinishedEvent } from './events.js'
export type { ProcessDatasetsOptions, DatasetProcessor } from './processDatasets.js'
export { createDatasetProcessor, loadTree } from './processDatasets.js'
export type { PackageBenchmarkOptions, PackageBenchmarkResult } from './packageBenchmark.js'
export { packageBenchmark } from './packageBenchmark.js'
export type { CleanEmptyDatasetsOptions, CleanEmptyDatasetsResult } from './cleanEmptyDatasets.js'
export { cleanEmptyDatasets } from './cleanEmptyDatasets.js'
export type { ReadJsonResult } from './json.js'
export { readJsonFile, writeJsonFile, formatError } from './json.js'
export {
	UI_TREE_FILENAME,
	SCREENSHOT_FILENAME,
	FILTERED_FILENAME,
	JSONL_FILENAME,
	IMAGES_DIRNAME,
	uiTreePath,
	screenshotPath,
	filteredPath,
	listDatasetDirs,
	fileExists,
	dirExists,
} from './paths.js'
