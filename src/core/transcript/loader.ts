/**
 * Transcript Loader
 *
 * Reads and writes the JSON transcript files `transcribe` produces. Raw
 * provider transcripts (words at the top level, no `meta`) load as well.
 */

import { readFileSync, writeFileSync } from 'fs';
import { ZodError, z } from 'zod';
import { OutputError, ParseError, errorMessage } from '../errors.js';
import type { SpeechModel, Transcript, TranscriptDocument, TranscriptResult, Word } from '../types.js';

const wordSchema = z.object({
  text: z.string().refine(text => text.trim().length > 0, { message: 'text must not be blank' }),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  confidence: z.number().optional(),
  speaker: z.string().nullable().optional(),
}).refine(word => word.end >= word.start, { message: 'end must not precede start' });

const transcriptSchema = z.object({
  source_file: z.string().optional(),
  id: z.string().optional(),
  status: z.string().optional(),
  text: z.string().nullable().optional(),
  words: z.array(wordSchema).superRefine((words, ctx) => {
    for (let i = 1; i < words.length; i++) {
      if (words[i].start < words[i - 1].start) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i, 'start'],
          message: `words must be ordered by start time (${words[i].start} < ${words[i - 1].start})`,
        });
        return;
      }
    }
  }),
  meta: z.object({
    id: z.string().nullable().optional(),
    status: z.string().nullable().optional(),
    model: z.string().nullable().optional(),
  }).optional(),
});

function describeZodError(error: ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function parseTranscript(raw: unknown): Transcript {
  let parsed: z.infer<typeof transcriptSchema>;
  try {
    parsed = transcriptSchema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ParseError(`Invalid transcript: ${describeZodError(error)}`, { cause: error });
    }
    throw error;
  }

  const words: Word[] = parsed.words.map(w => ({
    text: w.text,
    startMs: w.start,
    endMs: w.end,
    ...(w.confidence !== undefined ? { confidence: w.confidence } : {}),
    ...(w.speaker ? { speaker: w.speaker } : {}),
  }));

  return {
    id: parsed.meta?.id ?? parsed.id,
    status: parsed.meta?.status ?? parsed.status,
    model: parsed.meta?.model ?? undefined,
    text: parsed.text ?? '',
    words,
    sourceFile: parsed.source_file,
  };
}

export function loadTranscript(path: string): Transcript {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new ParseError(`Cannot read transcript ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new ParseError(`Failed to parse JSON in ${path}: ${errorMessage(error)}`, { cause: error });
  }

  return parseTranscript(raw);
}

export function toTranscriptDocument(
  sourceFile: string,
  result: TranscriptResult,
  model: SpeechModel,
): TranscriptDocument {
  return {
    source_file: sourceFile,
    text: result.text,
    words: result.words.map(w => ({
      text: w.text,
      start: w.startMs,
      end: w.endMs,
      ...(w.confidence !== undefined ? { confidence: w.confidence } : {}),
      ...(w.speaker ? { speaker: w.speaker } : {}),
    })),
    meta: {
      id: result.id,
      status: result.status,
      model,
    },
  };
}

export function saveTranscript(path: string, document: TranscriptDocument): void {
  try {
    writeFileSync(path, JSON.stringify(document, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw new OutputError(`Failed to write transcript ${path}: ${errorMessage(error)}`, { cause: error });
  }
}
