export { ConfigComparator, compare } from "./comparator.js";
export {
  ConfigParseError,
  detectFormat,
  loadConfigFile,
  parseConfig,
  parseDocuments,
} from "./loader.js";
export type { ParseOptions } from "./loader.js";
export {
  collectSteps,
  getStageIdentifier,
  parsePipeline,
  parsePipelineYaml,
  validateStageConfiguration,
  validateStepsInStage,
  validateWorkspaceConfiguration,
} from "./pipeline.js";
export { printReport, summarize } from "./reporter.js";
export type { ReportSummary } from "./reporter.js";
export { ConfigCheckRunner } from "./runner.js";
export { resolveSettings } from "./settings.js";
export type { CliOptions, Settings } from "./settings.js";
export type * from "./types.js";
export {
  formatValue,
  isConfigMapping,
  isConfigScalar,
  isConfigSequence,
  isDeepEqual,
  selectPath,
} from "./values.js";
