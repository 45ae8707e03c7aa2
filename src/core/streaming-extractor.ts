/**
 * Streaming Extractor - budgeted, pull-based text chunks
 *
 * stream() is an async generator: a slice is read from the source only when
 * the consumer asks for the next chunk, plus one slice of look-ahead so the
 * last chunk can be flagged. Chunks concatenate to a prefix of the source
 * text and never exceed floor(maxTokens * charsPerToken) characters in total.
 */

import type { StreamChunk, StreamStopReason } from '../types/index.js';
import type { PageHandle } from '../types/page.js';
import { logger } from '../utils/logger.js';

const log = logger.streaming;

export const DEFAULT_STREAM_SELECTOR = 'main, article, body';

export interface TextSource {
  /** Text from `offset`, at most `length` characters; empty past the end */
  read(offset: number, length: number): Promise<string>;
}

export interface StreamOptions {
  maxTokens?: number;
  charsPerToken?: number;
  chunkChars?: number;
  maxChunks?: number;
}

export interface BudgetedExtraction {
  chunks: string[];
  sectionsExtracted: number;
  estimatedTokens: number;
  truncated: boolean;
  stopReason: StreamStopReason;
}

export function pageTextSource(page: PageHandle, selector: string = DEFAULT_STREAM_SELECTOR): TextSource {
  return {
    read: (offset, length) => page.readTextSlice(selector, offset, length),
  };
}

export function streamBudget(maxTokens: number, charsPerToken: number): number {
  return Math.max(0, Math.floor(maxTokens * charsPerToken));
}

export async function* stream(source: TextSource, options: StreamOptions = {}): AsyncGenerator<StreamChunk> {
  const budget = streamBudget(options.maxTokens ?? 4000, options.charsPerToken ?? 4.0);
  const chunkChars = Math.max(1, options.chunkChars ?? 1800);
  const maxChunks = Math.max(1, options.maxChunks ?? 12);

  const request = (offset: number) => Math.min(chunkChars, budget - offset);

  if (budget === 0) {
    const more = await source.read(0, 1);
    yield { sequence: 0, content: '', isFinal: true, stopReason: more ? 'budget' : 'exhausted' };
    return;
  }

  let offset = 0;
  let sequence = 0;
  let requested = request(0);
  let current = await source.read(0, requested);

  for (;;) {
    offset += current.length;
    const emitted = sequence + 1;

    let stopReason: StreamStopReason | null = null;
    let next = '';

    if (current.length < requested) {
      stopReason = 'exhausted';
    } else if (offset >= budget || emitted >= maxChunks) {
      const more = await source.read(offset, 1);
      stopReason = !more ? 'exhausted' : offset >= budget ? 'budget' : 'chunk_limit';
    } else {
      requested = request(offset);
      next = await source.read(offset, requested);
      if (!next) stopReason = 'exhausted';
    }

    if (stopReason) {
      log.debug('Stream finished', { chunks: emitted, chars: offset, stopReason });
      yield { sequence, content: current, isFinal: true, stopReason };
      return;
    }

    yield { sequence, content: current, isFinal: false };
    sequence++;
    current = next;
  }
}

/**
 * Drain a stream into a result object.
 */
export async function extractWithBudget(
  source: TextSource,
  options: StreamOptions = {}
): Promise<BudgetedExtraction> {
  const charsPerToken = options.charsPerToken ?? 4.0;
  const chunks: string[] = [];
  let stopReason: StreamStopReason = 'exhausted';

  for await (const chunk of stream(source, options)) {
    if (chunk.content) chunks.push(chunk.content);
    if (chunk.isFinal && chunk.stopReason) stopReason = chunk.stopReason;
  }

  const totalChars = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  return {
    chunks,
    sectionsExtracted: chunks.length,
    estimatedTokens: charsPerToken > 0 ? Math.floor(totalChars / charsPerToken) : 0,
    truncated: stopReason !== 'exhausted',
    stopReason,
  };
}
