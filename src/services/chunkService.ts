import { v4 as uuidv4 } from "uuid";
import { Batch, DocumentUnit } from "../types.js";

const CHARS_PER_TOKEN = 4;
export const UNIT_SEPARATOR = "\n\n";

export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

function assertBudget(maxTokens: number): void {
  if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
    throw new RangeError(`maxTokens must be a positive integer, got ${maxTokens}.`);
  }
}

function buildBatch(index: number, units: DocumentUnit[], maxTokens: number): Batch {
  const estimatedTokens = units.reduce((sum, unit) => sum + estimateTokens(unit.text), 0);
  return {
    id: uuidv4(),
    index,
    units,
    text: units.map((unit) => unit.text).join(UNIT_SEPARATOR),
    estimatedTokens,
    oversized: estimatedTokens > maxTokens
  };
}

/**
 * Greedy packing in document order. A unit that alone exceeds the budget
 * becomes its own oversized batch.
 */
export function chunkUnits(units: readonly DocumentUnit[], maxTokens: number): Batch[] {
  assertBudget(maxTokens);

  const batches: Batch[] = [];
  let current: DocumentUnit[] = [];
  let currentTokens = 0;

  const flush = (): void => {
    if (current.length > 0) {
      batches.push(buildBatch(batches.length, current, maxTokens));
      current = [];
      currentTokens = 0;
    }
  };

  for (const unit of units) {
    const tokens = estimateTokens(unit.text);
    if (tokens > maxTokens) {
      flush();
      batches.push(buildBatch(batches.length, [unit], maxTokens));
      continue;
    }
    if (currentTokens + tokens > maxTokens) {
      flush();
    }
    current.push(unit);
    currentTokens += tokens;
  }
  flush();

  return batches;
}

function splitSentences(text: string): string[] {
  const matches = text.match(/[^.!?]*[.!?]+["')\]]*\s*|[^.!?]+$/g);
  return (matches ?? [text]).map((sentence) => sentence.trim()).filter((sentence) => sentence.length > 0);
}

function splitWords(text: string, maxChars: number): string[] {
  const pieces: string[] = [];
  let current = "";
  for (const word of text.split(/\s+/).filter((item) => item.length > 0)) {
    if (word.length > maxChars) {
      if (current) {
        pieces.push(current);
        current = "";
      }
      for (let start = 0; start < word.length; start += maxChars) {
        pieces.push(word.slice(start, start + maxChars));
      }
      continue;
    }
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > maxChars) {
      pieces.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current) {
    pieces.push(current);
  }
  return pieces;
}

/**
 * Cuts text that is too large for one request into segments within the
 * budget, preferring sentence boundaries, then word boundaries.
 */
export function splitOversizedText(text: string, maxTokens: number): string[] {
  assertBudget(maxTokens);
  const maxChars = maxTokens * CHARS_PER_TOKEN;
  const trimmed = text.trim();
  if (trimmed.length <= maxChars) {
    return trimmed ? [trimmed] : [];
  }

  const segments: string[] = [];
  let current = "";
  for (const sentence of splitSentences(trimmed)) {
    if (sentence.length > maxChars) {
      if (current) {
        segments.push(current);
        current = "";
      }
      segments.push(...splitWords(sentence, maxChars));
      continue;
    }
    const candidate = current ? `${current} ${sentence}` : sentence;
    if (candidate.length > maxChars) {
      segments.push(current);
      current = sentence;
    } else {
      current = candidate;
    }
  }
  if (current) {
    segments.push(current);
  }
  return segments;
}
