import type { Word } from '../types.js';

export interface WordDatum {
  word: string;
  start: number;
  end: number;
  duration: number;
}

// Half-up to the nearest centisecond
function centiseconds(ms: number): number {
  return Math.round(ms / 10);
}

export function formatSeconds(ms: number): string {
  const cs = centiseconds(ms);
  const sign = cs < 0 ? '-' : '';
  const abs = Math.abs(cs);
  return `${sign}${Math.floor(abs / 100)}.${String(abs % 100).padStart(2, '0')}`;
}

export function previewLine(word: Word): string {
  const start = formatSeconds(word.startMs).padStart(6);
  const end = formatSeconds(word.endMs).padStart(6);
  const duration = formatSeconds(word.endMs - word.startMs);
  return `${start}s - ${end}s (${duration}s) : ${word.text}`;
}

export function previewLines(words: readonly Word[], limit?: number): string[] {
  const shown = limit === undefined ? words : words.slice(0, limit);
  return shown.map(previewLine);
}

export function wordData(words: readonly Word[]): WordDatum[] {
  return words.map(w => ({
    word: w.text,
    start: centiseconds(w.startMs) / 100,
    end: centiseconds(w.endMs) / 100,
    duration: centiseconds(w.endMs - w.startMs) / 100,
  }));
}
