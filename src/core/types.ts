/**
 * lrcscribe — Core Type Definitions
 */

// ─── Transcript Types ─────────────────────────────────────────

export interface Word {
  text: string;
  startMs: number;
  endMs: number;
  confidence?: number;
  speaker?: string;
}

export interface Transcript {
  id?: string;
  status?: string;
  text: string;
  words: Word[];
  sourceFile?: string;
  model?: string;
}

/** On-disk shape written by `transcribe`. Times are integer milliseconds. */
export interface TranscriptDocument {
  source_file: string;
  text: string;
  words: TranscriptDocumentWord[];
  meta: {
    id: string;
    status: string;
    model: SpeechModel;
  };
}

export interface TranscriptDocumentWord {
  text: string;
  start: number;
  end: number;
  confidence?: number;
  speaker?: string;
}

// ─── LRC Types ────────────────────────────────────────────────

export interface Line {
  words: readonly Word[];
  startMs: number;
}

export interface LrcEntry {
  timestamp: string;   // "[MM:SS.CC]"
  text: string;
}

export interface GroupingPolicy {
  maxWordsPerLine: number;
  maxGapMs: number | null;   // null disables gap breaks
  sentenceBoundary: boolean;
}

export type LrcTagKey = 'ti' | 'ar' | 'al' | 'by';

export type LrcTags = Partial<Record<LrcTagKey, string>>;

// ─── Transcription Provider ───────────────────────────────────

export const SPEECH_MODELS = ['universal', 'slam-1'] as const;

export type SpeechModel = typeof SPEECH_MODELS[number];

export interface TranscribeOptions {
  model: SpeechModel;
}

export interface TranscriptResult {
  id: string;
  status: string;
  text: string;
  words: Word[];
}

export interface TranscriptionProvider {
  readonly name: string;
  transcribe(audioPath: string, options: TranscribeOptions): Promise<TranscriptResult>;
}

// ─── Logging ──────────────────────────────────────────────────

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
  debug(msg: string, meta?: Record<string, unknown>): void;
}
