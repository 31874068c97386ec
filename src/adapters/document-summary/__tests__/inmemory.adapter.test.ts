import { describe, it, expect } from 'vitest';
import { InMemoryDocumentSummaryAdapter } from '../inmemory.adapter.js';

describe('InMemoryDocumentSummaryAdapter', () => {
  it('summarizes with the title and the first words by default', async () => {
    const adapter = new InMemoryDocumentSummaryAdapter();
    const request = { title: 'Handbook', text: 'one two three four five six seven eight nine ten', prompt: 'p' };

    const result = await adapter.summarize(request);

    expect(result).toEqual({
      text: 'Handbook: one two three four five six seven eight',
      usage: { inputTokens: 12, outputTokens: 13 },
    });
    expect(adapter.requests).toEqual([request]);
  });

  it('passes the call number to summarizeFn', async () => {
    const adapter = new InMemoryDocumentSummaryAdapter({ summarizeFn: (_request, call) => `summary ${call}` });
    await adapter.summarize({ title: 't', text: 'x', prompt: 'p' });
    expect((await adapter.summarize({ title: 't', text: 'x', prompt: 'p' })).text).toBe('summary 2');
  });
});
