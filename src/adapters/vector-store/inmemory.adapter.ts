// =============================================================================
// InMemoryVectorStore — Map-backed vector storage
// =============================================================================

import type { VectorDocument, VectorStorePort } from "../../ports/vector-store.port.js";

export class InMemoryVectorStore implements VectorStorePort {
  private readonly store = new Map<string, VectorDocument>();

  async upsert(documents: VectorDocument[]): Promise<void> {
    for (const doc of documents) {
      this.store.set(doc.id, cloneDocument(doc));
    }
  }

  async get(ids: string[]): Promise<VectorDocument[]> {
    const found: VectorDocument[] = [];
    for (const id of ids) {
      const doc = this.store.get(id);
      if (doc) found.push(cloneDocument(doc));
    }
    return found;
  }

  async delete(ids: string[]): Promise<void> {
    for (const id of ids) {
      this.store.delete(id);
    }
  }

  get size(): number {
    return this.store.size;
  }
}

function cloneDocument(doc: VectorDocument): VectorDocument {
  return {
    id: doc.id,
    embedding: [...doc.embedding],
    content: doc.content,
    metadata: structuredClone(doc.metadata),
  };
}
