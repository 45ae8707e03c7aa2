import { describe, it, expect } from 'vitest';
import {
  extractWithBudget,
  pageTextSource,
  stream,
  streamBudget,
  type TextSource,
} from '../../src/core/streaming-extractor.js';
import { StaticPageProvider } from '../../src/core/static-page-provider.js';
import type { StreamChunk } from '../../src/types/index.js';

function textSource(text: string, reads: Array<[number, number]> = []): TextSource {
  return {
    read: async (offset, length) => {
      reads.push([offset, length]);
      return text.slice(offset, offset + length);
    },
  };
}

async function collect(source: TextSource, options: Parameters<typeof stream>[1]): Promise<StreamChunk[]> {
  const chunks: StreamChunk[] = [];
  for await (const chunk of stream(source, options)) chunks.push(chunk);
  return chunks;
}

const LONG_TEXT = 'abcdefghij'.repeat(10);

describe('streaming extractor', () => {
  it('should compute the character budget', () => {
    expect(streamBudget(4000, 4)).toBe(16000);
    expect(streamBudget(7, 1.5)).toBe(10);
    expect(streamBudget(-1, 4)).toBe(0);
  });

  it('should stop at the budget and flag the last chunk', async () => {
    const chunks = await collect(textSource(LONG_TEXT), { maxTokens: 10, charsPerToken: 4, chunkChars: 15 });

    expect(chunks.map((c) => [c.sequence, c.content.length, c.isFinal, c.stopReason])).toEqual([
      [0, 15, false, undefined],
      [1, 15, false, undefined],
      [2, 10, true, 'budget'],
    ]);
    expect(chunks.map((c) => c.content).join('')).toBe(LONG_TEXT.slice(0, 40));
  });

  it('should report exhaustion when the text runs out first', async () => {
    const chunks = await collect(textSource('abcdefghij'), { chunkChars: 4 });
    expect(chunks).toEqual([
      { sequence: 0, content: 'abcd', isFinal: false },
      { sequence: 1, content: 'efgh', isFinal: false },
      { sequence: 2, content: 'ij', isFinal: true, stopReason: 'exhausted' },
    ]);
  });

  it('should report exhaustion when the text ends on a chunk boundary', async () => {
    const chunks = await collect(textSource('abcdefgh'), { chunkChars: 4 });
    expect(chunks.map((c) => [c.content, c.isFinal, c.stopReason])).toEqual([
      ['abcd', false, undefined],
      ['efgh', true, 'exhausted'],
    ]);
  });

  it('should report exhaustion when the text fills the budget exactly', async () => {
    const chunks = await collect(textSource('abcdefgh'), { maxTokens: 2, charsPerToken: 4, chunkChars: 4 });
    expect(chunks[chunks.length - 1]).toEqual({ sequence: 1, content: 'efgh', isFinal: true, stopReason: 'exhausted' });
  });

  it('should stop at the chunk limit', async () => {
    const chunks = await collect(textSource(LONG_TEXT), { chunkChars: 10, maxChunks: 2 });
    expect(chunks.map((c) => [c.content, c.isFinal, c.stopReason])).toEqual([
      ['abcdefghij', false, undefined],
      ['abcdefghij', true, 'chunk_limit'],
    ]);
  });

  it('should yield one empty final chunk for an empty source', async () => {
    await expect(collect(textSource(''), {})).resolves.toEqual([
      { sequence: 0, content: '', isFinal: true, stopReason: 'exhausted' },
    ]);
  });

  it('should yield one empty final chunk for a zero budget', async () => {
    await expect(collect(textSource('abc'), { maxTokens: 0 })).resolves.toEqual([
      { sequence: 0, content: '', isFinal: true, stopReason: 'budget' },
    ]);
  });

  it('should read only one slice ahead of the consumer', async () => {
    const reads: Array<[number, number]> = [];
    const iterator = stream(textSource(LONG_TEXT, reads), { chunkChars: 15 });

    const first = await iterator.next();
    expect(first.value).toEqual({ sequence: 0, content: LONG_TEXT.slice(0, 15), isFinal: false });
    expect(reads).toEqual([
      [0, 15],
      [15, 15],
    ]);

    await iterator.return(undefined);
    expect(reads).toHaveLength(2);
  });

  it.each([
    [1, 1, 3],
    [3, 2.5, 4],
    [25, 4, 7],
    [50, 1, 100],
  ])('should stay within floor(%s * %s) characters with chunks of %s', async (maxTokens, charsPerToken, chunkChars) => {
    const chunks = await collect(textSource(LONG_TEXT), { maxTokens, charsPerToken, chunkChars });
    const joined = chunks.map((c) => c.content).join('');

    expect(joined.length).toBeLessThanOrEqual(Math.floor(maxTokens * charsPerToken));
    expect(LONG_TEXT.startsWith(joined)).toBe(true);
    expect(chunks.filter((c) => c.isFinal)).toHaveLength(1);
    expect(chunks[chunks.length - 1].isFinal).toBe(true);
    expect(chunks.map((c) => c.sequence)).toEqual(chunks.map((_, i) => i));
  });

  it('should drain a stream into a budgeted result', async () => {
    const result = await extractWithBudget(textSource(LONG_TEXT), {
      maxTokens: 10,
      charsPerToken: 4,
      chunkChars: 15,
    });
    expect(result).toEqual({
      chunks: [LONG_TEXT.slice(0, 15), LONG_TEXT.slice(15, 30), LONG_TEXT.slice(30, 40)],
      sectionsExtracted: 3,
      estimatedTokens: 10,
      truncated: true,
      stopReason: 'budget',
    });
  });

  it('should stream the main content of a page', async () => {
    const page = await new StaticPageProvider().open('test');
    page.setContent('<body><nav>Menu</nav><main><p>Alpha beta</p><p>gamma delta</p></main></body>');

    const result = await extractWithBudget(pageTextSource(page), { chunkChars: 5 });
    expect(result.chunks.join('')).toBe('Alpha beta gamma delta');
    expect(result.stopReason).toBe('exhausted');
    expect(result.truncated).toBe(false);
  });
});
