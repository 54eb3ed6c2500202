/**
 * Orchestrator Test Suite
 *
 * Runs the CLI workflows against a fake transcription provider and a
 * temporary directory.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Orchestrator, lrcPathFor, transcriptPathFor } from '../src/orchestrator/index.js';
import { loadConfig } from '../src/core/config.js';
import { ConfigError, ParseError } from '../src/core/errors.js';
import type {
  Logger,
  TranscribeOptions,
  TranscriptResult,
  TranscriptionProvider,
} from '../src/core/types.js';

// ─── Test Fixtures ────────────────────────────────────────────

const RULE = '='.repeat(60);

const sampleDocument = {
  source_file: 'song.mp3',
  text: 'Hello world. This is lrcscribe',
  words: [
    { text: 'Hello', start: 0, end: 300 },
    { text: 'world.', start: 350, end: 700 },
    { text: 'This', start: 2500, end: 2700 },
    { text: 'is', start: 2750, end: 2900 },
    { text: 'lrcscribe', start: 2950, end: 3400 },
  ],
  meta: { id: 'tr-1', status: 'completed', model: 'universal' },
};

class FakeProvider implements TranscriptionProvider {
  readonly name = 'fake';
  calls: Array<{ audioPath: string; options: TranscribeOptions }> = [];

  constructor(private result: TranscriptResult) {}

  async transcribe(audioPath: string, options: TranscribeOptions): Promise<TranscriptResult> {
    this.calls.push({ audioPath, options });
    return this.result;
  }
}

function mockLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

describe('path conventions', () => {
  it('derives the transcript path from the audio path', () => {
    expect(transcriptPathFor('music/song.mp3')).toBe('music/song.transcript.json');
    expect(transcriptPathFor('take1')).toBe('take1.transcript.json');
  });

  it('derives the LRC path from the transcript path', () => {
    expect(lrcPathFor('music/song.transcript.json')).toBe('music/song.lrc');
    expect(lrcPathFor('music/other.json')).toBe('music/other.lrc');
    expect(lrcPathFor('noext')).toBe('noext.lrc');
  });
});

describe('Orchestrator', () => {
  let dir: string;
  let printed: string[];
  let logger: Logger;

  const createOrchestrator = (provider?: TranscriptionProvider) => new Orchestrator({
    config: loadConfig({ env: {} }),
    logger,
    provider,
    print: line => printed.push(line),
  });

  const writeTranscript = (name: string, body: unknown): string => {
    const path = join(dir, name);
    writeFileSync(path, typeof body === 'string' ? body : JSON.stringify(body), 'utf-8');
    return path;
  };

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'lrcscribe-orch-'));
    printed = [];
    logger = mockLogger();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('exportLrc', () => {
    it('groups the words and writes the LRC file beside the transcript', () => {
      const jsonPath = writeTranscript('song.transcript.json', sampleDocument);
      const outcome = createOrchestrator().exportLrc(jsonPath);

      expect(outcome.lrcPath).toBe(join(dir, 'song.lrc'));
      expect(outcome.entries).toEqual([
        { timestamp: '[00:00.00]', text: 'Hello world.' },
        { timestamp: '[00:02.50]', text: 'This is lrcscribe' },
      ]);
      expect(readFileSync(outcome.lrcPath, 'utf-8')).toBe('[00:00.00]Hello world.\n[00:02.50]This is lrcscribe\n');
    });

    it('applies a policy override and ID tags', () => {
      const jsonPath = writeTranscript('song.transcript.json', sampleDocument);
      const output = join(dir, 'custom.lrc');
      createOrchestrator().exportLrc(jsonPath, {
        output,
        policy: { maxWordsPerLine: 2, sentenceBoundary: false, maxGapMs: null },
        tags: { ti: 'Demo' },
      });

      expect(readFileSync(output, 'utf-8')).toBe(
        '[ti:Demo]\n[00:00.00]Hello world.\n[00:02.50]This is\n[00:02.95]lrcscribe\n',
      );
    });

    it('prints the word listing first and logs the exported path', () => {
      const jsonPath = writeTranscript('song.transcript.json', sampleDocument);
      const outcome = createOrchestrator().exportLrc(jsonPath, { showWords: true });

      expect(printed).toEqual([
        RULE,
        'WORD-LEVEL TIMESTAMPS',
        RULE,
        '  0.00s -   0.30s (0.30s) : Hello',
        '  0.35s -   0.70s (0.35s) : world.',
        '  2.50s -   2.70s (0.20s) : This',
        '  2.75s -   2.90s (0.15s) : is',
        '  2.95s -   3.40s (0.45s) : lrcscribe',
        'total words: 5',
      ]);
      expect(logger.info).toHaveBeenCalledWith(`LRC exported to: ${outcome.lrcPath} (2 lines)`, { words: 5 });
    });

    it('writes an empty file for an empty word list', () => {
      const jsonPath = writeTranscript('quiet.transcript.json', { ...sampleDocument, text: '', words: [] });
      const outcome = createOrchestrator().exportLrc(jsonPath);

      expect(outcome.entries).toEqual([]);
      expect(readFileSync(join(dir, 'quiet.lrc'), 'utf-8')).toBe('');
    });

    it('writes nothing when the transcript is malformed', () => {
      const jsonPath = writeTranscript('broken.json', { text: 'no words here' });

      expect(() => createOrchestrator().exportLrc(jsonPath)).toThrow(ParseError);
      expect(existsSync(join(dir, 'broken.lrc'))).toBe(false);
    });
  });

  describe('preview', () => {
    it('prints the word-level listing', () => {
      const jsonPath = writeTranscript('song.transcript.json', sampleDocument);
      createOrchestrator().preview(jsonPath, { limit: 2 });

      expect(printed).toEqual([
        RULE,
        'WORD-LEVEL TIMESTAMPS (first 2 words)',
        RULE,
        '  0.00s -   0.30s (0.30s) : Hello',
        '  0.35s -   0.70s (0.35s) : world.',
        'total words: 5',
      ]);
    });

    it('prints word data as JSON', () => {
      const jsonPath = writeTranscript('song.transcript.json', { words: [{ text: 'Hi', start: 1230, end: 1680 }] });
      createOrchestrator().preview(jsonPath, { wordData: true });

      expect(printed).toHaveLength(1);
      expect(JSON.parse(printed[0])).toEqual([{ word: 'Hi', start: 1.23, end: 1.68, duration: 0.45 }]);
    });
  });

  describe('transcribe', () => {
    const result: TranscriptResult = {
      id: 'tr-9',
      status: 'completed',
      text: 'Hello world.',
      words: [
        { text: 'Hello', startMs: 100, endMs: 400, confidence: 0.9 },
        { text: 'world.', startMs: 450, endMs: 800, confidence: 0.8 },
      ],
    };

    it('saves the provider result as a transcript document', async () => {
      const provider = new FakeProvider(result);
      const audioPath = join(dir, 'track.mp3');
      const outcome = await createOrchestrator(provider).transcribe(audioPath, { model: 'slam-1' });

      expect(provider.calls).toEqual([{ audioPath, options: { model: 'slam-1' } }]);
      expect(outcome.jsonPath).toBe(join(dir, 'track.transcript.json'));

      const saved: unknown = JSON.parse(readFileSync(outcome.jsonPath, 'utf-8'));
      expect(saved).toEqual({
        source_file: audioPath,
        text: 'Hello world.',
        words: [
          { text: 'Hello', start: 100, end: 400, confidence: 0.9 },
          { text: 'world.', start: 450, end: 800, confidence: 0.8 },
        ],
        meta: { id: 'tr-9', status: 'completed', model: 'slam-1' },
      });
    });

    it('warns when no word-level data comes back', async () => {
      const provider = new FakeProvider({ ...result, words: [] });
      await createOrchestrator(provider).transcribe(join(dir, 'track.mp3'));

      expect(logger.warn).toHaveBeenCalledWith('No word-level data found in transcript');
    });

    it('needs an API key when no provider is injected', async () => {
      await expect(createOrchestrator().transcribe(join(dir, 'track.mp3'))).rejects.toThrow(ConfigError);
    });

    it('runs transcribe then LRC export in auto-lrc mode', async () => {
      const provider = new FakeProvider(result);
      const outcome = await createOrchestrator(provider).autoLrc(join(dir, 'track.mp3'));

      expect(outcome.lrcPath).toBe(join(dir, 'track.lrc'));
      expect(readFileSync(outcome.lrcPath, 'utf-8')).toBe('[00:00.10]Hello world.\n');
    });

    it('runs transcribe then preview in auto mode', async () => {
      const provider = new FakeProvider(result);
      const transcript = await createOrchestrator(provider).auto(join(dir, 'track.mp3'));

      expect(transcript.words).toHaveLength(2);
      expect(printed.at(-1)).toBe('total words: 2');
    });
  });
});
