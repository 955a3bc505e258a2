import type { Sample, SampleDocument, ScreenSize } from '../model/types.js'

export type SampleImage = {
	filename: string
	size: ScreenSize
}

/** Wrap samples into the `filtered.json` payload. */
export const buildSampleDocument = (samples: readonly Sample[], image: SampleImage): SampleDocument => ({
	image_filename: image.filename,
	image_width: image.size.width,
	image_height: image.size.height,
	sample_count: samples.length,
	test_samples: [...samples],
})
