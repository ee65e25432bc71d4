export type {
  Config,
  ConfigInput,
  ConfigResolution,
  ConfigSource,
  ConfigSources,
  EngineConfig,
} from "./config.js";
export {
  ConfigInputSchema,
  ConfigSchema,
  ConfigValidationError,
  decodeConfigInput,
  decodeConfigInputJson,
  defaultConfig,
  defaultSources,
  mergeConfig,
} from "./config.js";
export type { AnnotationSummary } from "./correction.js";
export {
  Correction,
  createCorrection,
  reviseCorrection,
  summarizeAnnotations,
} from "./correction.js";
export type { DiffOptions } from "./diff.js";
export {
  checkInputSize,
  computeDiff,
  computeDiffEffect,
  DEFAULT_MAX_INPUT_LENGTH,
} from "./diff.js";
export type { EditKind, EditOp, IndexRange, MatchingBlock } from "./diff-align.js";
export { align, alignValues, matchingBlocks } from "./diff-align.js";
export type { EncodeOptions, Segment, SegmentKind } from "./diff-encode.js";
export { encode } from "./diff-encode.js";
export type { TokenClass, TokenSpan } from "./diff-tokenize.js";
export { textForTokens, tokenize } from "./diff-tokenize.js";
export { InputTooLargeError } from "./errors.js";
export type { Logger, LogLevel, LogSink } from "./logger.js";
export {
  getLogLevel,
  initialLogLevel,
  isLogLevel,
  LOG_LEVELS,
  logger,
  setLoggerSink,
  setLogLevel,
} from "./logger.js";
export type { CorrectionReport } from "./render-json.js";
export { correctionReport, renderCorrectionJson } from "./render-json.js";
export type {
  MarkerKind,
  TagBalanceIssue,
  TagCounts,
} from "./tag-balance.js";
export {
  countTags,
  repairTags,
  tagBalanceIssues,
  validateTags,
} from "./tag-balance.js";
export { extractFinal, stripTags } from "./tag-extract.js";
export type { MarkerType, TagToken } from "./tag-scan.js";
export {
  FALSE_CLOSE,
  FALSE_OPEN,
  scanTags,
  TRUE_CLOSE,
  TRUE_OPEN,
} from "./tag-scan.js";
export type {
  TelemetryAttributes,
  TelemetryExporter,
  TelemetryOptions,
  TelemetryService,
} from "./telemetry.js";
export {
  DEFAULT_SLOW_THRESHOLD_MS,
  deriveEndpoint,
  Telemetry,
  TelemetryLive,
} from "./telemetry.js";
