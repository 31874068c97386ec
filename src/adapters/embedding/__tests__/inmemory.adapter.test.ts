import { describe, it, expect } from 'vitest';
import { InMemoryEmbeddingAdapter, hashVector } from '../inmemory.adapter.js';

describe('hashVector', () => {
  it('is deterministic and unit length', () => {
    const vector = hashVector('benefits overview', 16);
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));

    expect(vector).toHaveLength(16);
    expect(hashVector('benefits overview', 16)).toEqual(vector);
    expect(norm).toBeCloseTo(1, 10);
  });

  it('differs for different texts', () => {
    expect(hashVector('a', 8)).not.toEqual(hashVector('b', 8));
  });
});

describe('InMemoryEmbeddingAdapter', () => {
  it('embeds with the configured dimensions and counts tokens', async () => {
    const adapter = new InMemoryEmbeddingAdapter({ dimensions: 6 });

    const result = await adapter.embed('seven c');

    expect(result.embedding).toEqual(hashVector('seven c', 6));
    expect(result.tokenCount).toBe(2);
    expect(adapter.calls).toEqual(['seven c']);
  });

  it('uses embedFn when given', async () => {
    const adapter = new InMemoryEmbeddingAdapter({ embedFn: (_text, call) => [call, 0] });
    await adapter.embed('x');
    expect((await adapter.embed('y')).embedding).toEqual([2, 0]);
  });
});
