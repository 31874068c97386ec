import { describe, it, expect } from 'vitest';
import { InMemoryVectorStore } from '../inmemory.adapter.js';

function doc(id: string, embedding: number[], documentId = 'doc-a') {
  return { id, embedding, content: `content of ${id}`, metadata: { documentId } };
}

describe('InMemoryVectorStore', () => {
  it('fetches documents by id and skips missing ones', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert([doc('a', [1, 0]), doc('b', [0, 1])]);

    const found = await store.get(['b', 'missing', 'a']);

    expect(found.map((d) => d.id)).toEqual(['b', 'a']);
    expect(store.size).toBe(2);
  });

  it('overwrites on upsert and deletes by id', async () => {
    const store = new InMemoryVectorStore();
    await store.upsert([doc('a', [1, 0, 0])]);
    await store.upsert([{ ...doc('a', [0, 1, 0]), content: 'updated' }]);

    expect((await store.get(['a']))[0].content).toBe('updated');
    expect(store.size).toBe(1);

    await store.delete(['a', 'missing']);
    expect(store.size).toBe(0);
  });

  it('returns copies the caller cannot mutate', async () => {
    const store = new InMemoryVectorStore();
    const original = doc('a', [1, 0]);
    await store.upsert([original]);
    original.embedding[0] = 9;

    const [fetched] = await store.get(['a']);
    fetched.metadata.documentId = 'changed';

    expect((await store.get(['a']))[0]).toEqual(doc('a', [1, 0]));
  });
});
