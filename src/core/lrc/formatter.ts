/**
 * LRC Formatter — turns grouped lines into `[MM:SS.CC]text` entries.
 */

import { FormatError } from '../errors.js';
import type { Line, LrcEntry, LrcTagKey, LrcTags } from '../types.js';

const TAG_ORDER: LrcTagKey[] = ['ti', 'ar', 'al', 'by'];

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatTimestamp(startMs: number): string {
  if (!Number.isInteger(startMs) || startMs < 0) {
    throw new FormatError(`Cannot format timestamp for ${startMs} ms`);
  }

  const minutes = Math.floor(startMs / 60000);
  const seconds = Math.floor((startMs % 60000) / 1000);
  const centiseconds = Math.floor((startMs % 1000) / 10);

  return `[${pad2(minutes)}:${pad2(seconds)}.${pad2(centiseconds)}]`;
}

export function formatLine(line: Line, index = 0): LrcEntry {
  if (line.words.length === 0) {
    throw new FormatError(`Line ${index} has no words`);
  }

  const text = line.words.map(word => word.text).join(' ');
  if (text.trim().length === 0) {
    throw new FormatError(`Line ${index} has no text`);
  }

  return { timestamp: formatTimestamp(line.startMs), text };
}

export function formatLines(lines: readonly Line[]): LrcEntry[] {
  return lines.map((line, index) => formatLine(line, index));
}

export function renderLrc(entries: readonly LrcEntry[], tags: LrcTags = {}): string {
  const header: string[] = [];
  for (const key of TAG_ORDER) {
    const value = tags[key]?.replace(/[\r\n]+/g, ' ').trim();
    if (value) header.push(`[${key}:${value}]\n`);
  }

  const body = entries.map(entry => `${entry.timestamp}${entry.text}\n`);

  return [...header, ...body].join('');
}
