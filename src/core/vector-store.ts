export type VectorMetadata = {
  projectId: string;
  filePath: string;
  ordinal: number;
  start: number;
  end: number;
  startLine: number;
  endLine: number;
  text: string;
};

export type VectorEntry = {
  id: string;
  vector: number[];
  metadata: VectorMetadata;
};

export type StoredChunk = {
  id: string;
  metadata: VectorMetadata;
};

export type VectorFilter = {
  filePath?: string;
};

export type VectorMatch = {
  id: string;
  /** Cosine similarity; higher is closer. */
  score: number;
  metadata: VectorMetadata;
};

/**
 * A collection per project. Upserting an existing id overwrites it, deleting
 * a missing id is a no-op, and queries never see another project's entries.
 * Implementations raise StoreError.
 */
export interface VectorStore {
  upsert(projectId: string, entries: VectorEntry[]): Promise<void>;
  delete(projectId: string, ids: string[]): Promise<void>;
  query(projectId: string, vector: number[], k: number, filter?: VectorFilter): Promise<VectorMatch[]>;
  listIds(projectId: string): Promise<string[]>;
  /** One file's entries in ordinal order, without their vectors. */
  listFileChunks(projectId: string, filePath: string): Promise<StoredChunk[]>;
  count(projectId: string): Promise<number>;
  dropCollection(projectId: string): Promise<void>;
  close(): Promise<void>;
}

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length === 0 || b.length === 0) return 0;
  const len = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < len; i += 1) {
    const av = a[i] ?? 0;
    const bv = b[i] ?? 0;
    dot += av * bv;
    normA += av * av;
    normB += bv * bv;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
