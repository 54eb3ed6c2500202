/**
 * lrcscribe — library entry point
 *
 * The CLI lives in cli.ts; this module exposes the same building blocks
 * for programmatic use.
 */

export * from './core/types.js';
export * from './core/errors.js';
export { DEFAULT_GROUPING_POLICY, endsSentence, groupWords, mergePolicy, resolvePolicy } from './core/lrc/grouper.js';
export { formatLine, formatLines, formatTimestamp, renderLrc } from './core/lrc/formatter.js';
export { loadTranscript, parseTranscript, saveTranscript, toTranscriptDocument } from './core/transcript/loader.js';
export { formatSeconds, previewLine, previewLines, wordData } from './core/transcript/preview.js';
export type { WordDatum } from './core/transcript/preview.js';
export { DEFAULT_BASE_URL, loadConfig, parseModel, readConfigFile, requireApiKey } from './core/config.js';
export type { AppConfig, ConfigOverrides, LoadConfigOptions } from './core/config.js';
export { createLogger } from './services/logger.js';
export type { LoggerOptions } from './services/logger.js';
export { AssemblyAIProvider } from './services/transcription/assemblyai.js';
export type { AssemblyAIOptions, FetchLike } from './services/transcription/assemblyai.js';
export { Orchestrator, lrcPathFor, transcriptPathFor, TRANSCRIPT_SUFFIX } from './orchestrator/index.js';
export type {
  AutoLrcRequest,
  ExportLrcOutcome,
  ExportLrcRequest,
  OrchestratorOptions,
  PreviewRequest,
  TranscribeOutcome,
  TranscribeRequest,
} from './orchestrator/index.js';
