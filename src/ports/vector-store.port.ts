// =============================================================================
// VectorStorePort — Keyed vector storage
// =============================================================================

export interface VectorDocument {
  id: string;
  embedding: number[];
  content: string;
  metadata: Record<string, unknown>;
}

export interface VectorStorePort {
  /** Upsert documents (insert or update) */
  upsert(documents: VectorDocument[]): Promise<void>;

  /** Fetch documents by ID; missing ids are skipped */
  get(ids: string[]): Promise<VectorDocument[]>;

  /** Delete documents by ID */
  delete(ids: string[]): Promise<void>;
}
