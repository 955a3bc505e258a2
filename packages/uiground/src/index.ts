export { createProgram, CLI_VERSION } from './cli/program.js'
export type { Output } from './output/io.js'
export { createOutput } from './output/io.js'
export type { LispOptions } from './output/uiTreeLisp.js'
export { formatUiTreeLisp } from './output/uiTreeLisp.js'
export { formatDiagnostics, formatSampleLine, diagnosticsToJson } from './output/format.js'
export type { UigroundConfig, UigroundConfigLoadResult, PipelineSectionConfig, DatasetSectionConfig } from './config/uigroundConfig.js'
export {
	AUTO_CONFIG_CANDIDATES,
	validateUigroundConfig,
	resolveUigroundConfigPath,
	loadUigroundConfig,
	mergePipelineOverrides,
} from './config/uigroundConfig.js'
