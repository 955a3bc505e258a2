import type { Diagnostics } from '@uiground/core'

/**
 * Event payload for a dataset that produced a `filtered.json`.
 */
export type DatasetProcessedEvent = {
	/** Dataset directory name. */
	name: string
	/** Absolute path of the written samples file. */
	outputPath: string
	/** Number of samples written. */
	sampleCount: number
	/** Data-quality findings for the snapshot. */
	diagnostics: Diagnostics
}

/**
 * Event payload for a dataset missing one of its input files.
 */
export type DatasetSkippedEvent = {
	name: string
	/** Human-readable reason (e.g. "ui_tree.json not found"). */
	reason: string
}

/**
 * Event payload for a dataset whose input could not be read or converted.
 */
export type DatasetFailedEvent = {
	name: string
	error: string
}

/**
 * Event payload emitted once after the last dataset.
 */
export type DatasetFinishedEvent = {
	total: number
	succeeded: number
	skipped: number
	failed: number
}

export type DatasetEventMap = {
	processed: DatasetProcessedEvent
	skipped: DatasetSkippedEvent
	failed: DatasetFailedEvent
	finished: DatasetFinishedEvent
}
