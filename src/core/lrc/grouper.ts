/**
 * Line Grouper
 *
 * Splits an ordered word sequence into display lines. A line closes when
 * it reaches the word cap, when the silence before the next word exceeds
 * the gap threshold, or after a word with terminal punctuation.
 * Boundaries are checked in sequence order, so the first one reached wins.
 */

import { ConfigError } from '../errors.js';
import type { GroupingPolicy, Line, Word } from '../types.js';

export const DEFAULT_GROUPING_POLICY: Readonly<GroupingPolicy> = {
  maxWordsPerLine: 8,
  maxGapMs: 1500,
  sentenceBoundary: true,
};

// Terminal mark, optionally followed by closing quotes or brackets
const SENTENCE_END = /[.!?…。！？]["'”’)\]」』]*$/;

export function resolvePolicy(policy: Partial<GroupingPolicy> = {}): GroupingPolicy {
  const resolved: GroupingPolicy = {
    maxWordsPerLine: policy.maxWordsPerLine ?? DEFAULT_GROUPING_POLICY.maxWordsPerLine,
    maxGapMs: policy.maxGapMs === undefined ? DEFAULT_GROUPING_POLICY.maxGapMs : policy.maxGapMs,
    sentenceBoundary: policy.sentenceBoundary ?? DEFAULT_GROUPING_POLICY.sentenceBoundary,
  };

  if (!Number.isInteger(resolved.maxWordsPerLine) || resolved.maxWordsPerLine < 1) {
    throw new ConfigError(`maxWordsPerLine must be a positive integer, got ${resolved.maxWordsPerLine}`);
  }
  if (resolved.maxGapMs !== null && (!Number.isInteger(resolved.maxGapMs) || resolved.maxGapMs < 0)) {
    throw new ConfigError(`maxGapMs must be a non-negative integer or null, got ${resolved.maxGapMs}`);
  }

  return resolved;
}

/** Overlays the defined fields of `override` on `base`, then validates. */
export function mergePolicy(base: GroupingPolicy, override: Partial<GroupingPolicy> = {}): GroupingPolicy {
  return resolvePolicy({
    maxWordsPerLine: override.maxWordsPerLine ?? base.maxWordsPerLine,
    maxGapMs: override.maxGapMs === undefined ? base.maxGapMs : override.maxGapMs,
    sentenceBoundary: override.sentenceBoundary ?? base.sentenceBoundary,
  });
}

export function endsSentence(text: string): boolean {
  return SENTENCE_END.test(text.trim());
}

export function groupWords(words: readonly Word[], policy: Partial<GroupingPolicy> = {}): Line[] {
  const { maxWordsPerLine, maxGapMs, sentenceBoundary } = resolvePolicy(policy);
  const lines: Line[] = [];
  let current: Word[] = [];

  const flush = () => {
    if (current.length === 0) return;
    lines.push({ words: current, startMs: current[0].startMs });
    current = [];
  };

  for (const word of words) {
    const previous = current[current.length - 1];
    if (previous && maxGapMs !== null && word.startMs - previous.endMs > maxGapMs) {
      flush();
    }

    current.push(word);

    if (current.length >= maxWordsPerLine || (sentenceBoundary && endsSentence(word.text))) {
      flush();
    }
  }
  flush();

  return lines;
}
