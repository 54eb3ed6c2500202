/**
 * Orchestrator
 *
 * Wires config, logger, transcription provider and output sink into the
 * five CLI workflows: transcribe, parse, parse-lrc, auto and auto-lrc.
 */

import { writeFileSync } from 'fs';
import { extname } from 'path';
import { requireApiKey } from '../core/config.js';
import type { AppConfig } from '../core/config.js';
import { OutputError, errorMessage } from '../core/errors.js';
import { formatLines, renderLrc } from '../core/lrc/formatter.js';
import { groupWords, mergePolicy } from '../core/lrc/grouper.js';
import { loadTranscript, saveTranscript, toTranscriptDocument } from '../core/transcript/loader.js';
import { previewLines, wordData } from '../core/transcript/preview.js';
import { createLogger } from '../services/logger.js';
import { AssemblyAIProvider } from '../services/transcription/assemblyai.js';
import type {
  GroupingPolicy,
  Line,
  Logger,
  LrcEntry,
  LrcTags,
  SpeechModel,
  Transcript,
  TranscriptDocument,
  TranscriptionProvider,
  Word,
} from '../core/types.js';

export const TRANSCRIPT_SUFFIX = '.transcript.json';
const RULE = '='.repeat(60);

export interface OrchestratorOptions {
  config: AppConfig;
  logger?: Logger;
  provider?: TranscriptionProvider;
  print?: (line: string) => void;
}

export interface TranscribeRequest {
  model?: SpeechModel;
  output?: string;
}

export interface TranscribeOutcome {
  jsonPath: string;
  document: TranscriptDocument;
  words: Word[];
}

export interface PreviewRequest {
  limit?: number;
  wordData?: boolean;
}

export interface ExportLrcRequest {
  output?: string;
  /** Print the word listing before exporting. */
  showWords?: boolean;
  policy?: Partial<GroupingPolicy>;
  tags?: LrcTags;
}

export interface AutoLrcRequest extends TranscribeRequest {
  lrcOutput?: string;
  policy?: Partial<GroupingPolicy>;
  tags?: LrcTags;
}

export interface ExportLrcOutcome {
  lrcPath: string;
  lines: Line[];
  entries: LrcEntry[];
}

function stripExtension(path: string): string {
  const ext = extname(path);
  return ext ? path.slice(0, -ext.length) : path;
}

export function transcriptPathFor(audioPath: string): string {
  return stripExtension(audioPath) + TRANSCRIPT_SUFFIX;
}

export function lrcPathFor(jsonPath: string): string {
  const base = jsonPath.endsWith(TRANSCRIPT_SUFFIX)
    ? jsonPath.slice(0, -TRANSCRIPT_SUFFIX.length)
    : stripExtension(jsonPath);
  return `${base}.lrc`;
}

export class Orchestrator {
  private config: AppConfig;
  private logger: Logger;
  private provider?: TranscriptionProvider;
  private print: (line: string) => void;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.logger = options.logger ?? createLogger({ level: options.config.logLevel, logDir: options.config.logDir });
    this.provider = options.provider;
    this.print = options.print ?? (line => process.stdout.write(line + '\n'));
  }

  // Created on first use so commands that only parse need no API key
  private getProvider(): TranscriptionProvider {
    if (!this.provider) {
      this.provider = new AssemblyAIProvider({
        apiKey: requireApiKey(this.config),
        baseUrl: this.config.baseUrl,
        pollIntervalMs: this.config.pollIntervalMs,
        timeoutMs: this.config.timeoutMs,
        logger: this.logger,
      });
    }
    return this.provider;
  }

  async transcribe(audioPath: string, request: TranscribeRequest = {}): Promise<TranscribeOutcome> {
    const model = request.model ?? this.config.model;
    const jsonPath = request.output ?? transcriptPathFor(audioPath);
    const provider = this.getProvider();

    this.logger.info('Transcribing', { audio: audioPath, output: jsonPath, model, provider: provider.name });
    const result = await provider.transcribe(audioPath, { model });

    if (result.words.length === 0) {
      if (model === 'slam-1') {
        this.logger.warn('No word-level data returned; the slam-1 model is still in beta');
      } else {
        this.logger.warn('No word-level data found in transcript');
      }
    }

    const document = toTranscriptDocument(audioPath, result, model);
    saveTranscript(jsonPath, document);
    this.logger.info('Saved transcript', { path: jsonPath, words: result.words.length });

    return { jsonPath, document, words: result.words };
  }

  printPreview(words: readonly Word[], request: PreviewRequest = {}): void {
    if (request.wordData) {
      this.print(JSON.stringify(wordData(words), null, 2));
      return;
    }

    const heading = request.limit !== undefined && request.limit < words.length
      ? `WORD-LEVEL TIMESTAMPS (first ${request.limit} words)`
      : 'WORD-LEVEL TIMESTAMPS';

    this.print(RULE);
    this.print(heading);
    this.print(RULE);
    for (const line of previewLines(words, request.limit)) {
      this.print(line);
    }
    this.print(`total words: ${words.length}`);
  }

  preview(jsonPath: string, request: PreviewRequest = {}): Transcript {
    const transcript = loadTranscript(jsonPath);
    this.logger.debug('Loaded transcript', { path: jsonPath, words: transcript.words.length });
    this.printPreview(transcript.words, request);
    return transcript;
  }

  exportLrc(jsonPath: string, request: ExportLrcRequest = {}): ExportLrcOutcome {
    const transcript = loadTranscript(jsonPath);
    const lrcPath = request.output ?? lrcPathFor(jsonPath);
    if (request.showWords) {
      this.printPreview(transcript.words);
    }

    const lines = groupWords(transcript.words, mergePolicy(this.config.grouping, request.policy));
    const entries = formatLines(lines);
    const content = renderLrc(entries, request.tags);

    try {
      writeFileSync(lrcPath, content, 'utf-8');
    } catch (error) {
      throw new OutputError(`Failed to write LRC file ${lrcPath}: ${errorMessage(error)}`, { cause: error });
    }

    this.logger.info(`LRC exported to: ${lrcPath} (${entries.length} lines)`, { words: transcript.words.length });
    return { lrcPath, lines, entries };
  }

  async auto(audioPath: string, request: TranscribeRequest & PreviewRequest = {}): Promise<Transcript> {
    const { jsonPath } = await this.transcribe(audioPath, request);
    return this.preview(jsonPath, request);
  }

  async autoLrc(audioPath: string, request: AutoLrcRequest = {}): Promise<ExportLrcOutcome> {
    const { jsonPath } = await this.transcribe(audioPath, request);
    return this.exportLrc(jsonPath, { policy: request.policy, tags: request.tags, output: request.lrcOutput });
  }
}
