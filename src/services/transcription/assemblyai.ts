/**
 * AssemblyAI Transcription Client
 *
 * Upload → request → poll against the AssemblyAI v2 REST API.
 * Requires: ASSEMBLYAI_API_KEY
 *
 * Word timestamps are only returned by the `universal` model; `slam-1`
 * is still in beta and may return none. Audio is streamed to the upload
 * endpoint in 5 MB chunks.
 */

import { constants, createReadStream } from 'fs';
import { access, stat } from 'fs/promises';
import { Readable } from 'stream';
import { z } from 'zod';
import { InputError, TranscriptionError, errorMessage } from '../../core/errors.js';
import type { TranscriptionStage } from '../../core/errors.js';
import type {
  Logger,
  TranscribeOptions,
  TranscriptResult,
  TranscriptionProvider,
  Word,
} from '../../core/types.js';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface AssemblyAIOptions {
  apiKey: string;
  baseUrl: string;
  pollIntervalMs: number;
  timeoutMs: number;
  logger?: Logger;
  fetch?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const UPLOAD_CHUNK_BYTES = 5 * 1024 * 1024;

const REQUEST_TIMEOUT_MS: Record<TranscriptionStage, number> = {
  upload: 120_000,
  request: 180_000,
  poll: 30_000,
};

const uploadResponseSchema = z.object({
  upload_url: z.string().min(1),
});

const createResponseSchema = z.object({
  id: z.string().min(1),
});

const transcriptResponseSchema = z.object({
  id: z.string(),
  status: z.string(),
  text: z.string().nullable().optional(),
  error: z.string().nullable().optional(),
  words: z.array(z.object({
    text: z.string(),
    start: z.number(),
    end: z.number(),
    confidence: z.number().optional(),
    speaker: z.string().nullable().optional(),
  })).nullable().optional(),
});

type TranscriptResponse = z.infer<typeof transcriptResponseSchema>;

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class AssemblyAIProvider implements TranscriptionProvider {
  readonly name = 'assemblyai';
  private options: AssemblyAIOptions;
  private fetch: FetchLike;
  private sleep: (ms: number) => Promise<void>;
  private now: () => number;

  constructor(options: AssemblyAIOptions) {
    this.options = { ...options, baseUrl: options.baseUrl.replace(/\/+$/, '') };
    this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async transcribe(audioPath: string, options: TranscribeOptions): Promise<TranscriptResult> {
    const uploadUrl = await this.upload(audioPath);
    const id = await this.requestTranscript(uploadUrl, options);
    const result = await this.poll(id);

    return {
      id: result.id,
      status: result.status,
      text: result.text ?? '',
      words: (result.words ?? []).filter(w => w.text.trim().length > 0).map((w): Word => ({
        text: w.text,
        startMs: Math.round(w.start),
        endMs: Math.round(w.end),
        ...(w.confidence !== undefined ? { confidence: w.confidence } : {}),
        ...(w.speaker ? { speaker: w.speaker } : {}),
      })),
    };
  }

  async upload(audioPath: string): Promise<string> {
    let bytes: number;
    try {
      await access(audioPath, constants.R_OK);
      const info = await stat(audioPath);
      if (!info.isFile()) throw new InputError(`Not a file: ${audioPath}`);
      bytes = info.size;
    } catch (error) {
      if (error instanceof InputError) throw error;
      const code = errnoCode(error);
      if (code === 'ENOENT') throw new InputError(`File not found: ${audioPath}`, { cause: error });
      if (code === 'EACCES') throw new InputError(`Permission denied: ${audioPath}`, { cause: error });
      throw new InputError(`Cannot read file ${audioPath}: ${errorMessage(error)}`, { cause: error });
    }

    this.options.logger?.info('Uploading audio', { file: audioPath, bytes });
    const stream = createReadStream(audioPath, { highWaterMark: UPLOAD_CHUNK_BYTES });
    const body = await this.call('upload', `${this.options.baseUrl}/upload`, {
      method: 'POST',
      headers: { authorization: this.options.apiKey },
      body: Readable.toWeb(stream),
      duplex: 'half',
    }).finally(() => stream.destroy());

    const uploadUrl = this.validate('upload', uploadResponseSchema, body, 'No upload_url returned by API').upload_url;
    this.options.logger?.debug('Uploaded', { uploadUrl });
    return uploadUrl;
  }

  async requestTranscript(audioUrl: string, options: TranscribeOptions): Promise<string> {
    if (!audioUrl.startsWith('https://')) {
      throw new TranscriptionError('request', `Invalid audio_url: ${JSON.stringify(audioUrl)}`);
    }

    const payload = {
      audio_url: audioUrl,
      speech_model: options.model,
      format_text: true,
      punctuate: true,
    };
    this.options.logger?.info('Requesting transcription', { model: options.model });
    this.options.logger?.debug('Transcript request payload', payload);

    const body = await this.call('request', `${this.options.baseUrl}/transcript`, {
      method: 'POST',
      headers: {
        authorization: this.options.apiKey,
        'content-type': 'application/json',
      },
      body: JSON.stringify(payload),
    });

    const { id } = this.validate('request', createResponseSchema, body, 'No transcript id returned');
    this.options.logger?.info('Transcript queued', { id });
    return id;
  }

  async poll(id: string): Promise<TranscriptResponse> {
    const url = `${this.options.baseUrl}/transcript/${encodeURIComponent(id)}`;
    const startedAt = this.now();
    this.options.logger?.info('Waiting for transcription to complete', { id });

    while (true) {
      const body = await this.call('poll', url, {
        method: 'GET',
        headers: { authorization: this.options.apiKey },
      });
      const result = this.validate('poll', transcriptResponseSchema, body, 'Malformed transcript status');

      if (result.status === 'completed') {
        this.options.logger?.info('Transcription completed', { id });
        return result;
      }
      if (result.status === 'error') {
        throw new TranscriptionError('poll', `Transcription error: ${result.error ?? 'unknown'}`);
      }

      const elapsed = this.now() - startedAt;
      if (elapsed > this.options.timeoutMs) {
        throw new TranscriptionError(
          'poll',
          `Transcription timed out after ${Math.round(this.options.timeoutMs / 1000)} seconds`,
        );
      }

      this.options.logger?.info('Transcription pending', {
        status: result.status,
        elapsedSeconds: Math.floor(elapsed / 1000),
        nextPollMs: this.options.pollIntervalMs,
      });
      await this.sleep(this.options.pollIntervalMs);
    }
  }

  private validate<S extends z.ZodTypeAny>(
    stage: TranscriptionStage,
    schema: S,
    body: unknown,
    message: string,
  ): z.infer<S> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new TranscriptionError(stage, message, { cause: parsed.error });
    }
    return parsed.data;
  }

  private async call(stage: TranscriptionStage, url: string, init: RequestInit): Promise<unknown> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), REQUEST_TIMEOUT_MS[stage]);

    const { status, text } = await this.fetch(url, { ...init, signal: controller.signal })
      .then(async response => ({ status: response.status, text: await response.text() }))
      .catch((error: unknown) => {
        throw new TranscriptionError(stage, `${stage} request failed: ${errorMessage(error)}`, { cause: error });
      })
      .finally(() => clearTimeout(timeout));

    const okStatuses = stage === 'poll' ? [200] : [200, 201];
    if (!okStatuses.includes(status)) {
      throw new TranscriptionError(stage, `${stage} failed (${status}): ${text}`);
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new TranscriptionError(stage, `Invalid JSON response from ${stage} API`, { cause: error });
    }
  }
}
